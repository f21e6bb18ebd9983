import type { BaseKey, FormatOptions, MidiNote, NamedNote, PitchClass } from "../types.js";
import { InvalidNotationError } from "../errors.js";
import {
  baseKeyPitchClass,
  defaultNamedKey,
  formatNamedKey,
  modifierValue,
  readKeyPrefixes,
  spellPitchClass,
  toPitchClass
} from "./key.js";

export const MIDI_NOTE_MIN = 0;
export const MIDI_NOTE_MAX = 127;

/** MIDI note number for A4 (440 Hz) */
const MIDI_A4 = 69;
/** Frequency of A4 in Hz */
const FREQ_A4 = 440;

const OCTAVE_PATTERN = /^(?:-1|[0-9])$/;

export function isMidiNote(value: number): boolean {
  return Number.isInteger(value) && value >= MIDI_NOTE_MIN && value <= MIDI_NOTE_MAX;
}

function assertMidiNote(value: number, description: string): MidiNote {
  if (!isMidiNote(value)) {
    throw new RangeError(`${description} is outside the MIDI range (${MIDI_NOTE_MIN}-${MIDI_NOTE_MAX}): ${value}`);
  }
  return value;
}

/**
 * Splits a note into its pitch class and octave (60 → C, 4).
 */
export function decomposeNote(note: MidiNote): { pitchClass: PitchClass; octave: number } {
  assertMidiNote(note, "Note");
  return {
    pitchClass: note % 12,
    octave: Math.floor(note / 12) - 1
  };
}

/**
 * Builds a note from a pitch class and an octave. C-1 is 0, C0 is 12.
 *
 * @throws RangeError when the result is not a MIDI note
 */
export function composeNote(pitchClass: PitchClass, octave: number): MidiNote {
  return assertMidiNote(toPitchClass(pitchClass) + (octave + 1) * 12, `Pitch class ${pitchClass} in octave ${octave}`);
}

export function transposeNote(note: MidiNote, semitones: number): MidiNote {
  return assertMidiNote(note + semitones, `Note ${note} transposed by ${semitones}`);
}

/**
 * Spells a note with the given letter. The octave follows the letter,
 * so 60 spelled with B is B♯3 and 71 spelled with C is C♭5.
 *
 * @returns undefined when the letter would need more than a double accidental
 */
export function spellNote(note: MidiNote, baseKey: BaseKey): NamedNote | undefined {
  const { pitchClass } = decomposeNote(note);
  const key = spellPitchClass(pitchClass, baseKey);
  if (!key) {
    return undefined;
  }
  const letterNote = note - modifierValue(key.modifier) - baseKeyPitchClass(baseKey);
  return { key, octave: letterNote / 12 - 1 };
}

export function defaultNamedNote(note: MidiNote): NamedNote {
  const { pitchClass, octave } = decomposeNote(note);
  return { key: defaultNamedKey(pitchClass), octave };
}

/**
 * Sounding MIDI note of a spelled note. The letter is placed in its octave
 * first and the accidental applied afterwards, so C♭5 is 71 and B♯4 is 72.
 */
export function namedNoteToMidi(named: NamedNote): MidiNote {
  const letterNote = baseKeyPitchClass(named.key.baseKey) + (named.octave + 1) * 12;
  return assertMidiNote(letterNote + modifierValue(named.key.modifier), `Note ${formatNamedNote(named)}`);
}

/**
 * Parses a note name such as `C4`, `Eb3`, `F♯-1` or `Bx5`. Octaves run
 * from -1 to 9.
 *
 * @throws InvalidNotationError when the text is not a note name
 */
export function parseNamedNote(text: string): NamedNote {
  const reading = readKeyPrefixes(text).find((candidate) => OCTAVE_PATTERN.test(candidate.rest));
  if (!reading) {
    throw new InvalidNotationError(`Invalid note: ${text}`);
  }
  return { key: reading.key, octave: Number(reading.rest) };
}

export function formatNamedNote(named: NamedNote, options: FormatOptions = {}): string {
  return `${formatNamedKey(named.key, options)}${named.octave}`;
}

/** Formats a MIDI note with its default spelling (61 → C♯4). */
export function formatNote(note: MidiNote, options: FormatOptions = {}): string {
  return formatNamedNote(defaultNamedNote(note), options);
}

/**
 * Converts MIDI note number to frequency (Hz).
 * Formula: freq = 440.0 * 2^((midi - 69) / 12)
 */
export function midiToFrequency(midi: number): number {
  return FREQ_A4 * Math.pow(2, (midi - MIDI_A4) / 12);
}

/**
 * Converts frequency (Hz) to MIDI note number.
 * Formula: MIDI = 69 + 12 * log2(freq / 440.0)
 *
 * @returns MIDI note number (may be fractional)
 */
export function frequencyToMidi(freq: number): number {
  return MIDI_A4 + 12 * Math.log2(freq / FREQ_A4);
}
