import type { FormatOptions, MidiNote, NamedKey, NamedNote, PitchClass } from "../types.js";
import { InvalidNotationError } from "../errors.js";
import { PARENT_MAJOR, PARENT_MINOR, SCALE_MODES, SCALE_MODE_ALIASES } from "../constants/scale-modes.js";
import type { ScaleModeName } from "../constants/scale-modes.js";
import {
  baseKeyPitchClass,
  baseKeysFrom,
  defaultNamedKey,
  formatNamedKey,
  modifierValue,
  namedKeyToPitchClass,
  readKeyPrefixes,
  spellPitchClass,
  toPitchClass,
  transposePitchClass
} from "./key.js";
import { defaultNamedNote, isMidiNote, spellNote } from "./note.js";

/**
 * A scale: a spelled tonic plus the semitone offsets of its degrees.
 *
 * Every degree gets a spelling when the scale is created. Seven-note
 * scales use each letter once, in order from the tonic's letter, so
 * E♭ harmonic minor reads E♭ F G♭ A♭ B♭ C♭ D rather than mixing sharps
 * and flats. Scales of other sizes borrow the spelling of their parent
 * seven-note scale (major when they contain a major third, natural minor
 * otherwise); degrees outside the parent are written with the letter of
 * the parent degree above, so the blues scale on C gets a G♭.
 */
export class Scale {
  readonly tonic: NamedKey;
  readonly offsets: readonly number[];
  readonly spellings: readonly NamedKey[];
  readonly mode: ScaleModeName | undefined;

  private constructor(tonic: NamedKey, offsets: readonly number[], mode: ScaleModeName | undefined) {
    this.tonic = { ...tonic };
    this.offsets = offsets;
    this.mode = mode;
    this.spellings = spellScale(tonic, offsets);
  }

  /**
   * Creates a scale from a tonic and offsets.
   *
   * @throws InvalidNotationError when the offsets are empty, not integers
   *   between 0 and 11, or not strictly increasing
   */
  static create(tonic: NamedKey, offsets: readonly number[], mode?: ScaleModeName): Scale {
    validateOffsets(offsets);
    return new Scale(tonic, [...offsets], mode);
  }

  static fromMode(tonic: NamedKey, mode: ScaleModeName): Scale {
    return Scale.create(tonic, SCALE_MODES[mode], mode);
  }

  get length(): number {
    return this.offsets.length;
  }

  get name(): string {
    return this.format();
  }

  /** `C major`, `E♭ harmonic`, or the offsets for scales without a mode. */
  format(options: FormatOptions = {}): string {
    const tonic = formatNamedKey(this.tonic, options);
    return this.mode ? `${tonic} ${this.mode}` : `${tonic} [${this.offsets.join(" ")}]`;
  }

  toString(): string {
    return this.format();
  }

  /** Semitones from the tonic to a position; 12 for position 7 of a seven-note scale. */
  semitonesAt(position: number): number {
    return this.offsets[this.indexOf(position)] + 12 * Math.floor(position / this.length);
  }

  pitchClassAt(position: number): PitchClass {
    return transposePitchClass(namedKeyToPitchClass(this.tonic), this.offsets[this.indexOf(position)]);
  }

  namedKeyAt(position: number): NamedKey {
    return { ...this.spellings[this.indexOf(position)] };
  }

  /**
   * MIDI note of a scale position. Position 0 of octave 4 is the tonic
   * written in octave 4 (C♭4 is 59); positions past the scale length
   * continue into the next octaves, negative ones into the previous.
   *
   * @throws RangeError when the note is outside the MIDI range
   */
  noteAt(position: number, octave: number): MidiNote {
    const tonicNote =
      baseKeyPitchClass(this.tonic.baseKey) + modifierValue(this.tonic.modifier) + (octave + 1) * 12;
    const note = tonicNote + this.semitonesAt(position);
    if (!isMidiNote(note)) {
      throw new RangeError(
        `Position ${position} in octave ${octave} of ${this.name} is outside the MIDI range (0-127): ${note}`
      );
    }
    return note;
  }

  namedNoteAt(position: number, octave: number): NamedNote {
    const note = this.noteAt(position, octave);
    const spelling = this.spellings[this.indexOf(position)];
    return spellNote(note, spelling.baseKey) ?? defaultNamedNote(note);
  }

  contains(pitchClass: PitchClass): boolean {
    return this.degreeOf(pitchClass) !== undefined;
  }

  /** Position (0 to length - 1) holding the pitch class, if any. */
  degreeOf(pitchClass: PitchClass): number | undefined {
    const tonic = namedKeyToPitchClass(this.tonic);
    const index = this.offsets.findIndex((offset) => transposePitchClass(tonic, offset) === toPitchClass(pitchClass));
    return index >= 0 ? index : undefined;
  }

  private indexOf(position: number): number {
    return ((position % this.length) + this.length) % this.length;
  }
}

function validateOffsets(offsets: readonly number[]): void {
  if (offsets.length === 0) {
    throw new InvalidNotationError("A scale needs at least one offset");
  }
  let previous: number | undefined;
  for (const offset of offsets) {
    if (!Number.isInteger(offset) || offset < 0 || offset > 11) {
      throw new InvalidNotationError("All offsets must be integers between 0 and 11");
    }
    if (previous !== undefined && previous >= offset) {
      throw new InvalidNotationError("Offsets must be in strictly increasing order");
    }
    previous = offset;
  }
}

function spellScale(tonic: NamedKey, offsets: readonly number[]): NamedKey[] {
  if (offsets.length === 7) {
    return spellHeptatonic(tonic, offsets);
  }
  const parentOffsets = offsets.includes(4) ? PARENT_MAJOR : PARENT_MINOR;
  const parentSpellings = spellHeptatonic(tonic, parentOffsets);
  const tonicPitchClass = namedKeyToPitchClass(tonic);
  const parentPitchClasses = parentOffsets.map((offset) => transposePitchClass(tonicPitchClass, offset));

  return offsets.map((offset) => {
    const pitchClass = transposePitchClass(tonicPitchClass, offset);
    const parentIndex = parentPitchClasses.indexOf(pitchClass);
    if (parentIndex >= 0) {
      return { ...parentSpellings[parentIndex] };
    }
    const neighbours = [
      parentPitchClasses.indexOf(transposePitchClass(pitchClass, 1)),
      parentPitchClasses.indexOf(transposePitchClass(pitchClass, -1))
    ];
    for (const neighbour of neighbours) {
      const spelled = neighbour >= 0 ? spellPitchClass(pitchClass, parentSpellings[neighbour].baseKey) : undefined;
      if (spelled) {
        return spelled;
      }
    }
    return fallbackSpelling(tonic, offsets, pitchClass);
  });
}

/**
 * Hands out the letters from the tonic's onwards, one per degree. A degree
 * the next letter cannot spell (even with a double accidental) gets its
 * default spelling and leaves the letter to the following degree.
 */
function spellHeptatonic(tonic: NamedKey, offsets: readonly number[]): NamedKey[] {
  const letters = baseKeysFrom(tonic.baseKey);
  const tonicPitchClass = namedKeyToPitchClass(tonic);
  let next = 0;

  return offsets.map((offset) => {
    const pitchClass = transposePitchClass(tonicPitchClass, offset);
    const spelled = next < letters.length ? spellPitchClass(pitchClass, letters[next]) : undefined;
    if (spelled) {
      next += 1;
      return spelled;
    }
    return fallbackSpelling(tonic, offsets, pitchClass);
  });
}

function fallbackSpelling(tonic: NamedKey, offsets: readonly number[], pitchClass: PitchClass): NamedKey {
  const spelling = defaultNamedKey(pitchClass);
  console.warn(
    `Could not spell pitch class ${pitchClass} in the scale on ${formatNamedKey(tonic)} [${offsets.join(" ")}], using ${formatNamedKey(spelling)}`
  );
  return spelling;
}

function isScaleModeName(name: string): name is ScaleModeName {
  return Object.prototype.hasOwnProperty.call(SCALE_MODES, name);
}

/**
 * Resolves a mode name or alias, ignoring case and treating spaces and
 * underscores like hyphens (`Harmonic Minor` → `harmonic`).
 */
export function resolveModeName(text: string): ScaleModeName | undefined {
  const name = text.trim().toLowerCase().replace(/[\s_]+/g, "-");
  if (Object.prototype.hasOwnProperty.call(SCALE_MODE_ALIASES, name)) {
    return SCALE_MODE_ALIASES[name];
  }
  return isScaleModeName(name) ? name : undefined;
}

/**
 * Parses `<key><mode>` scale names: `Cmaj`, `Eb harmonic`, `F# dorian`,
 * `Bblues`. A missing mode means major.
 *
 * @throws InvalidNotationError for an unknown key or mode
 */
export function parseScale(text: string): Scale {
  const readings = readKeyPrefixes(text.trim());
  if (readings.length === 0) {
    throw new InvalidNotationError(`Invalid scale: ${text}`);
  }
  for (const reading of readings) {
    const mode = resolveModeName(reading.rest);
    if (mode) {
      return Scale.fromMode(reading.key, mode);
    }
  }
  throw new InvalidNotationError(`Unknown scale mode "${readings[readings.length - 1].rest.trim()}" in ${text}`);
}
