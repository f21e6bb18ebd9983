import { formatNamedNote, parseScale } from "@moira/core";
import type { FormatOptions } from "@moira/core";
import type { CliIO } from "../io.js";

/** Prints one octave of a scale: `C major: C4 D4 E4 F4 G4 A4 B4`. */
export function scaleCommand(text: string, octave: number, options: FormatOptions, io: CliIO): void {
  const scale = parseScale(text);
  const notes = scale.offsets.map((_, position) => formatNamedNote(scale.namedNoteAt(position, octave), options));
  io.stdout(`${scale.format(options)}: ${notes.join(" ")}`);
}
