import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { MoiraError, renderPiece } from "@moira/core";
import type { RenderMeta } from "@moira/core";
import type { CliConfig } from "../config.js";
import type { CliIO } from "../io.js";

/** `song.json` → `song.mid`, next to the input. */
export function defaultOutputPath(input: string): string {
  const { dir, name } = path.parse(input);
  return path.join(dir, `${name}.mid`);
}

export function formatSummary(output: string, meta: RenderMeta): string {
  const trackCount = meta.tracks.length;
  return (
    `Wrote ${output}: ${trackCount} track${trackCount === 1 ? "" : "s"}, ` +
    `${meta.bpm} bpm, ${meta.totalTicks} ticks (${meta.durationSeconds.toFixed(2)}s)`
  );
}

function describeFailure(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function readPieceFile(input: string): Promise<string> {
  try {
    return await readFile(input, "utf8");
  } catch (error) {
    throw new MoiraError(`Could not read ${input}: ${describeFailure(error)}`);
  }
}

async function writeMidiFile(target: string, midi: Uint8Array): Promise<void> {
  try {
    await writeFile(target, midi);
  } catch (error) {
    throw new MoiraError(`Could not write ${target}: ${describeFailure(error)}`);
  }
}

export async function renderCommand(
  input: string,
  output: string | undefined,
  config: CliConfig,
  io: CliIO
): Promise<void> {
  const source = await readPieceFile(input);
  const { midi, meta } = renderPiece(source, config.render);
  const target = output ?? defaultOutputPath(input);
  await writeMidiFile(target, midi);
  if (!config.quiet) {
    io.stdout(formatSummary(target, meta));
  }
}
