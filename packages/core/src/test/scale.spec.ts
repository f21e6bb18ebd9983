import { describe, it, mock } from "node:test";
import assert from "node:assert/strict";
import { Scale, parseScale, resolveModeName } from "../theory/scale.js";
import { BASE_KEYS, formatNamedKey, parseNamedKey } from "../theory/key.js";
import { SCALE_MODES } from "../constants/scale-modes.js";
import { InvalidNotationError } from "../errors.js";
import type { KeyModifier } from "../types.js";
import { parseNamedNote } from "../theory/note.js";
import { notes } from "./test-utils.js";

function spelled(scale: Scale, ascii = false): string {
  return scale.spellings.map((key) => formatNamedKey(key, { ascii })).join(" ");
}

describe("Scale.create", () => {
  it("rejects invalid offsets", () => {
    const c = parseNamedKey("C");
    assert.throws(() => Scale.create(c, []), {
      name: "InvalidNotationError",
      message: "A scale needs at least one offset"
    });
    assert.throws(() => Scale.create(c, [0, 12]), { message: "All offsets must be integers between 0 and 11" });
    assert.throws(() => Scale.create(c, [0, 2.5]), { message: "All offsets must be integers between 0 and 11" });
    assert.throws(() => Scale.create(c, [0, 4, 2]), { message: "Offsets must be in strictly increasing order" });
    assert.throws(() => Scale.create(c, [0, 4, 4]), { message: "Offsets must be in strictly increasing order" });
  });

  it("builds every mode on every key without warnings", () => {
    const warn = mock.method(console, "warn", () => {});
    try {
      const modifiers: KeyModifier[] = ["flat", "natural", "sharp"];
      for (const baseKey of BASE_KEYS) {
        for (const modifier of modifiers) {
          for (const mode of ["major", "minor", "harmonic", "melodic"] as const) {
            const scale = Scale.fromMode({ baseKey, modifier }, mode);
            assert.strictEqual(scale.length, 7);
            assert.strictEqual(new Set(scale.spellings.map((key) => key.baseKey)).size, 7);
          }
        }
      }
      assert.strictEqual(warn.mock.callCount(), 0);
    } finally {
      warn.mock.restore();
    }
  });

  it("names scales without a mode by their offsets", () => {
    const scale = Scale.create(parseNamedKey("D"), [0, 2, 4]);
    assert.strictEqual(scale.name, "D [0 2 4]");
    assert.strictEqual(String(scale), "D [0 2 4]");
  });
});

describe("scale spelling", () => {
  it("uses each letter once in seven-note scales", () => {
    assert.strictEqual(spelled(parseScale("F#maj")), "F♯ G♯ A♯ B C♯ D♯ E♯");
    assert.strictEqual(spelled(parseScale("Ebharmonic")), "E♭ F G♭ A♭ B♭ C♭ D");
  });

  it("reaches for double accidentals when needed", () => {
    assert.strictEqual(spelled(parseScale("G#maj"), true), "G# A# B# C# D# E# Fx");
  });

  it("spells smaller scales like their parent scale", () => {
    assert.strictEqual(spelled(parseScale("Dpentatonic")), "D E F♯ A B");
    assert.strictEqual(spelled(parseScale("C minor-pentatonic")), "C E♭ F G B♭");
  });

  it("spells notes outside the parent with a neighbouring letter", () => {
    assert.strictEqual(spelled(parseScale("Cblues")), "C E♭ F G♭ G B♭");
    assert.strictEqual(spelled(parseScale("Cchromatic")), "C D♭ D E♭ E F G♭ G A♭ A B♭ B");
  });

  it("falls back to the default spelling and warns when no letter fits", () => {
    const warn = mock.method(console, "warn", () => {});
    try {
      const scale = Scale.create(parseNamedKey("C"), [0, 1, 2, 3, 4, 5, 6]);
      assert.strictEqual(spelled(scale), "C D♭ E𝄫 F𝄫 E G𝄫 F♯");
      assert.strictEqual(warn.mock.callCount(), 2);
    } finally {
      warn.mock.restore();
    }
  });
});

describe("Scale notes", () => {
  it("counts positions from the tonic in the given octave", () => {
    const scale = parseScale("Cmaj");
    const positions = [-2, -1, 0, 2, 4, 7, 9];
    assert.deepEqual(
      positions.map((position) => scale.namedNoteAt(position, 4)),
      notes("A3", "B3", "C4", "E4", "G4", "C5", "E5")
    );
    assert.deepEqual(
      positions.map((position) => scale.noteAt(position, 4)),
      [57, 59, 60, 64, 67, 72, 76]
    );
  });

  it("spells notes across the octave boundary", () => {
    const scale = parseScale("Eb harmonic");
    assert.deepEqual(
      [0, 1, 2, 3, 4, 5, 6, 7].map((position) => scale.namedNoteAt(position, 4)),
      notes("Eb4", "F4", "Gb4", "Ab4", "Bb4", "Cb5", "D5", "Eb5")
    );
    assert.deepEqual(
      [0, 1, 2, 3, 4, 5, 6, 7].map((position) => scale.noteAt(position, 4)),
      [63, 65, 66, 68, 70, 71, 74, 75]
    );
  });

  it("writes the tonic in the requested octave", () => {
    const scale = parseScale("Cbmaj");
    assert.strictEqual(scale.noteAt(0, 4), 59);
    assert.deepEqual(scale.namedNoteAt(0, 4), parseNamedNote("Cb4"));
  });

  it("rejects notes outside the MIDI range", () => {
    assert.throws(() => parseScale("Cmaj").noteAt(7, 9), {
      name: "RangeError",
      message: "Position 7 in octave 9 of C major is outside the MIDI range (0-127): 132"
    });
  });

  it("reports semitones and degrees", () => {
    const scale = parseScale("Cmaj");
    assert.strictEqual(scale.semitonesAt(9), 16);
    assert.strictEqual(scale.semitonesAt(-7), -12);
    assert.strictEqual(scale.pitchClassAt(10), 5);
    assert.strictEqual(scale.degreeOf(7), 4);
    assert.strictEqual(scale.degreeOf(1), undefined);
    assert.strictEqual(scale.contains(11), true);
    assert.strictEqual(scale.contains(10), false);
  });
});

describe("parseScale", () => {
  it("reads key and mode", () => {
    assert.strictEqual(parseScale("Cmaj").name, "C major");
    assert.strictEqual(parseScale("Eb harmonic").name, "E♭ harmonic");
    assert.strictEqual(parseScale("F# Dorian").mode, "dorian");
    assert.strictEqual(parseScale("C harmonic minor").mode, "harmonic");
    assert.strictEqual(parseScale("A").name, "A major");
    assert.strictEqual(parseScale("Am").name, "A minor");
  });

  it("prefers an accidental reading only when the mode allows it", () => {
    assert.strictEqual(parseScale("Bbmaj").name, "B♭ major");
    assert.strictEqual(parseScale("Bblues").name, "B blues");
  });

  it("formats scale names with ASCII accidentals on request", () => {
    assert.strictEqual(parseScale("F#min").format({ ascii: true }), "F# minor");
  });

  it("rejects unknown keys and modes", () => {
    assert.throws(() => parseScale("Hmaj"), { name: "InvalidNotationError", message: "Invalid scale: Hmaj" });
    assert.throws(() => parseScale("Cfoo"), InvalidNotationError);
    assert.throws(() => parseScale("Cfoo"), { message: 'Unknown scale mode "foo" in Cfoo' });
  });
});

describe("resolveModeName", () => {
  it("accepts every mode name and common aliases", () => {
    for (const mode of Object.keys(SCALE_MODES)) {
      assert.strictEqual(resolveModeName(mode), mode);
    }
    assert.strictEqual(resolveModeName("Harmonic Minor"), "harmonic");
    assert.strictEqual(resolveModeName("natural_minor"), "minor");
    assert.strictEqual(resolveModeName("ionian"), "major");
    assert.strictEqual(resolveModeName("nope"), undefined);
  });
});
