import type { TimedNote } from "../types.js";
import type { Scale } from "../theory/scale.js";
import { PieceFormatError } from "../errors.js";
import { MAX_TICKS, TICKS_PER_BEAT } from "../constants/timing.js";

/** Matches duration keys such as `3`, `1/3` and `/3`. */
const DURATION_SPEC = /^(\d+)?(?:\/(\d+))?$/;

export interface NoteSequenceContext {
  scale: Scale;
  octave: number;
}

/**
 * Reads the `notes` value of a track into timed scale notes.
 *
 * ```
 * Notes = Note | [ Notes* ] | { duration: Notes }
 * Note  = int | null | ""
 * ```
 *
 * The value starts at one beat. Elements of an array keep the current
 * duration, except that an array nested directly in another array halves
 * it: `[0, [1, 2]]` is a beat of 0 then half a beat each of 1 and 2.
 * A `{ "n/d": Notes }` group multiplies the duration by n/d and resets the
 * halving, so `{ "2": [0, 1] }` plays 0 and 1 for two beats each.
 *
 * @param path JSON path of the value, used in error messages
 * @throws PieceFormatError for values outside the grammar, fractional
 *   durations, or positions whose note is outside the MIDI range
 */
export function parseNoteSequence(value: unknown, context: NoteSequenceContext, path: string): TimedNote[] {
  const notes: TimedNote[] = [];
  collectNotes(value, context, path, TICKS_PER_BEAT, false, notes);
  return notes;
}

function collectNotes(
  value: unknown,
  context: NoteSequenceContext,
  path: string,
  duration: number,
  halveArrays: boolean,
  out: TimedNote[]
): void {
  if (value === null || value === "") {
    out.push({ note: null, duration });
    return;
  }

  if (typeof value === "number") {
    out.push({ note: { position: readPosition(value, context, path), octave: context.octave }, duration });
    return;
  }

  if (typeof value === "string") {
    throw new PieceFormatError(path, "only an empty string can be used for a rest");
  }

  if (Array.isArray(value)) {
    const items: unknown[] = value;
    const itemDuration = halveArrays ? wholeTicks(duration / 2, path) : duration;
    items.forEach((item, index) => {
      collectNotes(item, context, `${path}[${index}]`, itemDuration, true, out);
    });
    return;
  }

  if (isJsonObject(value)) {
    const entries = Object.entries(value);
    if (entries.length !== 1) {
      throw new PieceFormatError(path, `a duration group should have exactly one key, found ${entries.length}`);
    }
    const [spec, inner] = entries[0];
    const innerPath = `${path}["${spec}"]`;
    collectNotes(inner, context, innerPath, scaleDuration(duration, spec, innerPath), false, out);
    return;
  }

  throw new PieceFormatError(path, "notes should be a number, an empty string, null, an array or an object");
}

function readPosition(value: number, context: NoteSequenceContext, path: string): number {
  if (!Number.isInteger(value)) {
    throw new PieceFormatError(path, `scale position should be an integer, got ${value}`);
  }
  try {
    context.scale.noteAt(value, context.octave);
  } catch (error) {
    if (error instanceof RangeError) {
      throw new PieceFormatError(path, error.message);
    }
    throw error;
  }
  return value;
}

function scaleDuration(duration: number, spec: string, path: string): number {
  const match = DURATION_SPEC.exec(spec);
  const numerator = match?.[1] === undefined ? 1 : Number(match[1]);
  const denominator = match?.[2] === undefined ? 1 : Number(match[2]);
  if (!match || denominator === 0) {
    throw new PieceFormatError(path, `invalid duration specifier "${spec}"`);
  }
  return wholeTicks((duration * numerator) / denominator, path);
}

function wholeTicks(ticks: number, path: string): number {
  if (ticks <= 0) {
    throw new PieceFormatError(path, "duration should be positive");
  }
  if (!Number.isInteger(ticks)) {
    throw new PieceFormatError(path, `duration of ${ticks} ticks is not a whole number of ticks`);
  }
  if (ticks > MAX_TICKS) {
    throw new PieceFormatError(path, `duration should be at most ${MAX_TICKS} ticks, got ${ticks}`);
  }
  return ticks;
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
