import { parseArgs } from "node:util";
import type { ParseArgsConfig } from "node:util";
import { MoiraError } from "@moira/core";
import { resolveConfig } from "./config.js";
import { UsageError } from "./errors.js";
import { consoleIO } from "./io.js";
import type { CliIO } from "./io.js";
import { VERSION } from "./version.js";
import { renderCommand } from "./commands/render.js";
import { scaleCommand } from "./commands/scale.js";
import { chordsCommand } from "./commands/chords.js";
import { noteCommand } from "./commands/note.js";

export { resolveConfig } from "./config.js";
export type { CliConfig, CliFlags } from "./config.js";
export { UsageError } from "./errors.js";
export type { CliIO } from "./io.js";
export { VERSION } from "./version.js";

export const HELP_TEXT = `Usage: moira <command> [options]

Commands:
  render <piece.json>   Render a JSON piece (bpm 4-255) to a MIDI file
  scale <scale>         Print one octave of a scale (e.g. "Eb harmonic")
  chords <scale>        Print the diatonic chords of a seven-note scale
  note <name|number>    Convert between note names and MIDI numbers
  help                  Show this help

Options:
  -o, --output <file>   Output file for render (default: input with .mid)
  --program <n>         General MIDI program, 0-127 (env MOIRA_PROGRAM)
  --velocity <n>        Note velocity, 1-127 (env MOIRA_VELOCITY)
  --channel <n>         MIDI channel, 0-15 (env MOIRA_CHANNEL)
  --octave <n>          Octave of the tonic for scale, -1 to 9 (default 4; use --octave=-1)
  --sevenths            Build seventh chords instead of triads
  --ascii               Write accidentals as b, #, bb and x
  -q, --quiet           Print nothing on success (env MOIRA_QUIET)
  -h, --help            Show this help
  -v, --version         Show the version`;

const OPTIONS = {
  output: { type: "string", short: "o" },
  program: { type: "string" },
  velocity: { type: "string" },
  channel: { type: "string" },
  octave: { type: "string" },
  sevenths: { type: "boolean" },
  ascii: { type: "boolean" },
  quiet: { type: "boolean", short: "q" },
  help: { type: "boolean", short: "h" },
  version: { type: "boolean", short: "v" }
} as const satisfies ParseArgsConfig["options"];

function parseCommandLine(args: string[]) {
  try {
    return parseArgs({ args, options: OPTIONS, allowPositionals: true, strict: true });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

function operand(command: string, operands: string[], description: string): string {
  if (operands.length !== 1) {
    throw new UsageError(`${command} expects exactly one ${description}, got ${operands.length}`);
  }
  return operands[0];
}

/**
 * Runs the `moira` command line.
 *
 * @param args Arguments after the executable and script path
 * @returns The process exit code: 0 on success, 1 when the input could not
 *   be used, 2 for usage errors
 */
export async function runCli(
  args: string[],
  io: CliIO = consoleIO,
  env: Record<string, string | undefined> = process.env
): Promise<number> {
  try {
    const { values, positionals } = parseCommandLine(args);
    if (values.version) {
      io.stdout(`moira ${VERSION}`);
      return 0;
    }
    const [command, ...operands] = positionals;
    if (values.help || command === "help") {
      io.stdout(HELP_TEXT);
      return 0;
    }
    if (command === undefined) {
      throw new UsageError("Missing command");
    }

    const config = resolveConfig(values, env);
    const format = { ascii: values.ascii ?? false };
    switch (command) {
      case "render":
        await renderCommand(operand(command, operands, "piece file"), values.output, config, io);
        break;
      case "scale":
        scaleCommand(operand(command, operands, "scale"), config.octave, format, io);
        break;
      case "chords":
        chordsCommand(operand(command, operands, "scale"), values.sevenths ?? false, format, io);
        break;
      case "note":
        noteCommand(operand(command, operands, "note"), format, io);
        break;
      default:
        throw new UsageError(`Unknown command "${command}"`);
    }
    return 0;
  } catch (error) {
    return reportError(error, io);
  }
}

function reportError(error: unknown, io: CliIO): number {
  if (error instanceof UsageError) {
    io.stderr(`moira: ${error.message}`);
    io.stderr('Run "moira help" for usage.');
    return 2;
  }
  if (error instanceof MoiraError || error instanceof RangeError) {
    io.stderr(`moira: ${error.message}`);
    return 1;
  }
  console.error("moira: unexpected error", error);
  return 1;
}
