import type { Chord, FormatOptions, MidiNote, NamedNote } from "../types.js";
import { InvalidNotationError } from "../errors.js";
import { CHORD_QUALITIES, ROMAN_NUMERALS } from "../constants/chord-qualities.js";
import type { ChordQualityInfo } from "../constants/chord-qualities.js";
import { formatNamedKey } from "./key.js";
import type { Scale } from "./scale.js";

export interface BuildChordOptions {
  /** Number of stacked thirds: 3 for triads, 4 for seventh chords (default 3). */
  size?: 3 | 4;
}

function lookupQuality(intervals: readonly number[]): ChordQualityInfo | undefined {
  const key = intervals.join(",");
  return Object.prototype.hasOwnProperty.call(CHORD_QUALITIES, key) ? CHORD_QUALITIES[key] : undefined;
}

/**
 * Builds the chord standing on a scale position by stacking scale thirds
 * (every other position), so the same function gives C E G in C major and
 * C E♭ G in C minor.
 *
 * @param degree Scale position of the root (0 = tonic, may be negative)
 * @throws InvalidNotationError for sizes other than 3 or 4
 */
export function buildChord(scale: Scale, degree: number, options: BuildChordOptions = {}): Chord {
  const size = options.size ?? 3;
  if (size !== 3 && size !== 4) {
    throw new InvalidNotationError(`Chord size must be 3 or 4, got ${size}`);
  }
  const positions = Array.from({ length: size }, (_, index) => degree + index * 2);
  const rootSemitones = scale.semitonesAt(degree);
  const intervals = positions.map((position) => scale.semitonesAt(position) - rootSemitones);
  const root = scale.namedKeyAt(degree);
  const info = lookupQuality(intervals);

  return {
    scale,
    degree,
    positions,
    root,
    tones: positions.map((position) => scale.namedKeyAt(position)),
    intervals,
    quality: info?.quality ?? "unknown",
    symbol: symbolFor(formatNamedKey(root), intervals, info?.suffix),
    numeral: numeralFor(scale, degree, info)
  };
}

function symbolFor(root: string, intervals: readonly number[], suffix: string | undefined): string {
  return suffix === undefined ? `${root}(${intervals.join(",")})` : root + suffix;
}

function numeralFor(scale: Scale, degree: number, info: ChordQualityInfo | undefined): string {
  const index = ((degree % scale.length) + scale.length) % scale.length;
  const base = index < ROMAN_NUMERALS.length ? ROMAN_NUMERALS[index] : String(index + 1);
  if (!info) {
    return `${base}?`;
  }
  return (info.numeralCase === "lower" ? base.toLowerCase() : base) + info.numeralSuffix;
}

/** Chord symbol, optionally with ASCII accidentals (`Bm7b5`). */
export function formatChordSymbol(chord: Chord, options: FormatOptions = {}): string {
  const info = lookupQuality(chord.intervals);
  const suffix = options.ascii ? info?.asciiSuffix : info?.suffix;
  return symbolFor(formatNamedKey(chord.root, options), chord.intervals, suffix);
}

/**
 * The diatonic chords of a seven-note scale, one per degree
 * (C major: I ii iii IV V vi vii°).
 *
 * @throws InvalidNotationError for scales that do not have seven notes
 */
export function harmonize(scale: Scale, options: BuildChordOptions = {}): Chord[] {
  if (scale.length !== ROMAN_NUMERALS.length) {
    throw new InvalidNotationError(`Diatonic chords need a seven-note scale, ${scale.name} has ${scale.length}`);
  }
  return ROMAN_NUMERALS.map((_, degree) => buildChord(scale, degree, options));
}

/** Spelled notes of a chord with its root in the given octave of the scale. */
export function chordNotes(chord: Chord, octave: number): NamedNote[] {
  return chord.positions.map((position) => chord.scale.namedNoteAt(position, octave));
}

export function chordMidiNotes(chord: Chord, octave: number): MidiNote[] {
  return chord.positions.map((position) => chord.scale.noteAt(position, octave));
}
