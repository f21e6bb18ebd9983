import { formatChordSymbol, harmonize, parseScale } from "@moira/core";
import type { FormatOptions } from "@moira/core";
import type { CliIO } from "../io.js";

const NUMERAL_WIDTH = 7;

export function chordsCommand(text: string, sevenths: boolean, options: FormatOptions, io: CliIO): void {
  const chords = harmonize(parseScale(text), { size: sevenths ? 4 : 3 });
  for (const chord of chords) {
    io.stdout(chord.numeral.padEnd(NUMERAL_WIDTH) + formatChordSymbol(chord, options));
  }
}
