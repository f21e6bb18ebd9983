import { formatNamedNote, formatNote, midiToFrequency, namedNoteToMidi, parseNamedNote } from "@moira/core";
import type { FormatOptions } from "@moira/core";
import type { CliIO } from "../io.js";

const MIDI_NUMBER = /^-?\d+$/;

/**
 * Converts in either direction: `C#4` and `61` both print
 * `C♯4 = 61 (277.18 Hz)`.
 */
export function noteCommand(text: string, options: FormatOptions, io: CliIO): void {
  let name: string;
  let midi: number;
  if (MIDI_NUMBER.test(text)) {
    midi = Number(text);
    name = formatNote(midi, options);
  } else {
    const named = parseNamedNote(text);
    midi = namedNoteToMidi(named);
    name = formatNamedNote(named, options);
  }
  io.stdout(`${name} = ${midi} (${midiToFrequency(midi).toFixed(2)} Hz)`);
}
