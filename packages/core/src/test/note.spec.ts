import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  composeNote,
  decomposeNote,
  formatNamedNote,
  formatNote,
  frequencyToMidi,
  midiToFrequency,
  namedNoteToMidi,
  parseNamedNote,
  spellNote,
  transposeNote
} from "../theory/note.js";
import { InvalidNotationError } from "../errors.js";

describe("decomposeNote / composeNote", () => {
  it("splits notes into pitch class and octave", () => {
    assert.deepEqual(decomposeNote(60), { pitchClass: 0, octave: 4 });
    assert.deepEqual(decomposeNote(0), { pitchClass: 0, octave: -1 });
    assert.deepEqual(decomposeNote(127), { pitchClass: 7, octave: 9 });
  });

  it("builds notes back from pitch class and octave", () => {
    assert.strictEqual(composeNote(9, 4), 69);
    assert.strictEqual(composeNote(0, -1), 0);
    assert.throws(() => composeNote(0, 10), RangeError);
  });

  it("transposes within the MIDI range only", () => {
    assert.strictEqual(transposeNote(60, 7), 67);
    assert.throws(() => transposeNote(120, 8), {
      name: "RangeError",
      message: "Note 120 transposed by 8 is outside the MIDI range (0-127): 128"
    });
  });
});

describe("spellNote", () => {
  it("keeps the octave with the letter", () => {
    assert.deepEqual(spellNote(60, "B"), { key: { baseKey: "B", modifier: "sharp" }, octave: 3 });
    assert.deepEqual(spellNote(71, "C"), { key: { baseKey: "C", modifier: "flat" }, octave: 5 });
    assert.deepEqual(spellNote(62, "C"), { key: { baseKey: "C", modifier: "doubleSharp" }, octave: 4 });
  });

  it("gives up beyond a double accidental", () => {
    assert.strictEqual(spellNote(61, "E"), undefined);
  });
});

describe("parseNamedNote", () => {
  it("reads key and octave", () => {
    assert.deepEqual(parseNamedNote("Eb3"), { key: { baseKey: "E", modifier: "flat" }, octave: 3 });
    assert.deepEqual(parseNamedNote("F♯-1"), { key: { baseKey: "F", modifier: "sharp" }, octave: -1 });
    assert.deepEqual(parseNamedNote("Bbb2"), { key: { baseKey: "B", modifier: "doubleFlat" }, octave: 2 });
    assert.deepEqual(parseNamedNote("A4"), { key: { baseKey: "A", modifier: "natural" }, octave: 4 });
  });

  it("rejects text without a valid octave", () => {
    for (const text of ["C10", "C", "H4", "4", "C-2"]) {
      assert.throws(() => parseNamedNote(text), InvalidNotationError, `expected "${text}" to be rejected`);
    }
    assert.throws(() => parseNamedNote("C10"), { message: "Invalid note: C10" });
  });
});

describe("namedNoteToMidi", () => {
  it("applies accidentals across octave boundaries", () => {
    assert.strictEqual(namedNoteToMidi(parseNamedNote("A4")), 69);
    assert.strictEqual(namedNoteToMidi(parseNamedNote("Cb5")), 71);
    assert.strictEqual(namedNoteToMidi(parseNamedNote("B#4")), 72);
    assert.strictEqual(namedNoteToMidi(parseNamedNote("C-1")), 0);
    assert.strictEqual(namedNoteToMidi(parseNamedNote("G9")), 127);
  });

  it("rejects notes outside the MIDI range", () => {
    assert.throws(() => namedNoteToMidi(parseNamedNote("G#9")), RangeError);
    assert.throws(() => namedNoteToMidi(parseNamedNote("Cb-1")), RangeError);
  });
});

describe("formatNote", () => {
  it("uses the default spelling", () => {
    assert.strictEqual(formatNote(61), "C♯4");
    assert.strictEqual(formatNote(61, { ascii: true }), "C#4");
    assert.strictEqual(formatNote(0), "C-1");
  });

  it("formats spelled notes as written", () => {
    assert.strictEqual(formatNamedNote({ key: { baseKey: "B", modifier: "sharp" }, octave: 3 }), "B♯3");
    assert.strictEqual(formatNamedNote(parseNamedNote("Fx2"), { ascii: true }), "Fx2");
  });
});

describe("frequency conversion", () => {
  it("tunes A4 to 440 Hz", () => {
    assert.strictEqual(midiToFrequency(69), 440);
    assert.strictEqual(midiToFrequency(81), 880);
    assert.strictEqual(midiToFrequency(57), 220);
  });

  it("converts frequencies back to note numbers", () => {
    assert.strictEqual(frequencyToMidi(440), 69);
    assert.strictEqual(frequencyToMidi(220), 57);
    assert.strictEqual(frequencyToMidi(880), 81);
  });
});
