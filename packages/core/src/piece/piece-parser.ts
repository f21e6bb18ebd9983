import type { z } from "zod";
import type { Piece, PieceTrack } from "../types.js";
import { InvalidNotationError, PieceFormatError } from "../errors.js";
import { parseScale } from "../theory/scale.js";
import type { Scale } from "../theory/scale.js";
import { PieceHeaderSchema, TrackSchema } from "./schemas.js";
import { parseNoteSequence } from "./note-sequence.js";
import { trackEndTick } from "./timing.js";
import { MAX_TICKS } from "../constants/timing.js";

// This is the definition of the JSON piece format.
//
// Piece  = { "bpm": int, "tracks": [ Track* ] }
// Track  = { "id": string, "scale": string, "octave": int, "start": Start,
//            "notes": Notes, "program"?: int, "velocity"?: int }
// Start  = int | { trackId: offset<int> }
// Notes  = Note | [ Notes* ] | { duration: Notes }
// Note   = int | null | ""

/**
 * Reads a JSON piece, given either as text or as an already parsed value.
 * Tracks keep their order; a track may start relative to any track
 * listed before it.
 *
 * @throws PieceFormatError naming the JSON path of the first problem found
 */
export function parsePiece(source: unknown): Piece {
  const document = typeof source === "string" ? parseJson(source) : source;
  const header = parseWith(PieceHeaderSchema, document, "");

  const tracksById = new Map<string, PieceTrack>();
  header.tracks.forEach((trackJson, index) => {
    const track = parseTrack(trackJson, `tracks[${index}]`, tracksById);
    tracksById.set(track.id, track);
  });

  return { bpm: header.bpm, tracks: [...tracksById.values()] };
}

function parseJson(text: string): unknown {
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PieceFormatError("", `Could not parse JSON: ${reason}`);
  }
}

function parseTrack(trackJson: unknown, path: string, tracksById: ReadonlyMap<string, PieceTrack>): PieceTrack {
  const fields = parseWith(TrackSchema, trackJson, path);
  if (tracksById.has(fields.id)) {
    throw new PieceFormatError(`${path}.id`, `duplicate track id "${fields.id}"`);
  }

  const scale = parseTrackScale(fields.scale, `${path}.scale`);
  const track: PieceTrack = {
    id: fields.id,
    scale,
    octave: fields.octave,
    start: parseTrackStart(fields.start, `${path}.start`, tracksById),
    notes: parseNoteSequence(fields.notes, { scale, octave: fields.octave }, `${path}.notes`)
  };
  if (fields.program !== undefined) {
    track.program = fields.program;
  }
  if (fields.velocity !== undefined) {
    track.velocity = fields.velocity;
  }
  const end = trackEndTick(track);
  if (end > MAX_TICKS) {
    throw new PieceFormatError(
      `${path}.notes`,
      `track ends at tick ${end}, past the last tick a MIDI file can address (${MAX_TICKS})`
    );
  }
  return track;
}

function parseTrackScale(text: string, path: string): Scale {
  try {
    return parseScale(text);
  } catch (error) {
    if (error instanceof InvalidNotationError) {
      throw new PieceFormatError(path, error.message);
    }
    throw error;
  }
}

/**
 * A start is either an absolute tick or `{ "<track id>": offset }`,
 * which starts `offset` ticks after the referenced track starts.
 */
function parseTrackStart(value: unknown, path: string, tracksById: ReadonlyMap<string, PieceTrack>): number {
  if (typeof value === "number") {
    if (!Number.isInteger(value) || value < 0) {
      throw new PieceFormatError(path, "start should be a non-negative integer");
    }
    return checkStartLimit(value, path);
  }

  if (typeof value === "object" && value !== null && !Array.isArray(value)) {
    const entries = Object.entries(value);
    if (entries.length !== 1) {
      throw new PieceFormatError(path, `start should reference exactly one track, found ${entries.length}`);
    }
    const [referenceId, offset] = entries[0];
    const reference = tracksById.get(referenceId);
    if (!reference) {
      throw new PieceFormatError(path, `start references unknown track "${referenceId}" (only earlier tracks can be referenced)`);
    }
    if (typeof offset !== "number" || !Number.isInteger(offset)) {
      throw new PieceFormatError(`${path}.${referenceId}`, "offset to the reference track should be an integer");
    }
    const start = reference.start + offset;
    if (start < 0) {
      throw new PieceFormatError(path, `start resolves to ${start}, before the beginning of the piece`);
    }
    return checkStartLimit(start, path);
  }

  throw new PieceFormatError(path, "start should be an integer or an object");
}

function checkStartLimit(start: number, path: string): number {
  if (start > MAX_TICKS) {
    throw new PieceFormatError(path, `start should be at most ${MAX_TICKS} ticks, got ${start}`);
  }
  return start;
}

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, path: string): T {
  const result = schema.safeParse(value);
  if (result.success) {
    return result.data;
  }
  const [issue] = result.error.issues;
  throw new PieceFormatError(joinPath(path, issue.path), issue.message);
}

function joinPath(base: string, segments: ReadonlyArray<string | number>): string {
  return segments.reduce<string>((path, segment) => {
    if (typeof segment === "number") {
      return `${path}[${segment}]`;
    }
    return path ? `${path}.${segment}` : segment;
  }, base);
}
