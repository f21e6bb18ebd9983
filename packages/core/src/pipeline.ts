import type { Piece, RenderMeta, RenderOptions, RenderResult, ResolvedRenderOptions } from "./types.js";
import { TICKS_PER_BEAT } from "./constants/timing.js";
import { parsePiece } from "./piece/piece-parser.js";
import { countNotes, pieceDurationTicks, trackEndTick } from "./piece/timing.js";
import { realizeTrack } from "./midi/track-realization.js";
import { encodeMidiFile } from "./midi/smf-writer.js";

export const DEFAULT_RENDER_OPTIONS: Readonly<ResolvedRenderOptions> = {
  program: 6,
  velocity: 127,
  channel: 0
};

function checkRange(name: string, value: number, min: number, max: number): number {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new RangeError(`${name} must be an integer between ${min} and ${max}: ${value}`);
  }
  return value;
}

/**
 * Fills in defaults and checks MIDI ranges once, at the pipeline entry.
 *
 * @throws RangeError for out-of-range values
 */
export function resolveRenderOptions(options: RenderOptions = {}): ResolvedRenderOptions {
  return {
    program: checkRange("program", options.program ?? DEFAULT_RENDER_OPTIONS.program, 0, 127),
    velocity: checkRange("velocity", options.velocity ?? DEFAULT_RENDER_OPTIONS.velocity, 1, 127),
    channel: checkRange("channel", options.channel ?? DEFAULT_RENDER_OPTIONS.channel, 0, 15)
  };
}

/**
 * Renders a JSON piece to a Standard MIDI File.
 *
 * The work runs in three phases, each feeding the next:
 * - Parse: read and validate the JSON into tracks of timed scale notes
 * - Realize: resolve scale notes to MIDI keys and lay out delta-timed events
 * - Encode: write the events as a format 1 MIDI file
 *
 * @param source JSON text, or an already parsed JSON value
 * @throws PieceFormatError when the piece does not follow the format
 * @throws RangeError for out-of-range render options
 */
export function renderPiece(source: unknown, options: RenderOptions = {}): RenderResult {
  const resolved = resolveRenderOptions(options);

  const piece = parsePiece(source);

  const tracks = piece.tracks.map((track) => realizeTrack(track, piece.bpm, resolved));

  const midi = encodeMidiFile(tracks, { ticksPerBeat: TICKS_PER_BEAT });

  return { midi, piece, meta: describePiece(piece, resolved) };
}

function describePiece(piece: Piece, options: ResolvedRenderOptions): RenderMeta {
  const totalTicks = pieceDurationTicks(piece);
  return {
    bpm: piece.bpm,
    ticksPerBeat: TICKS_PER_BEAT,
    totalTicks,
    durationSeconds: (totalTicks / TICKS_PER_BEAT) * (60 / piece.bpm),
    options,
    tracks: piece.tracks.map((track) => ({
      id: track.id,
      scale: track.scale.name,
      startTick: track.start,
      endTick: trackEndTick(track),
      noteCount: countNotes(track)
    }))
  };
}
