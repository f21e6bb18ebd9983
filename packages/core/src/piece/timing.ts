import type { Piece, PieceTrack } from "../types.js";

export function trackDurationTicks(track: PieceTrack): number {
  return track.notes.reduce((sum, note) => sum + note.duration, 0);
}

/** Tick at which the last note or rest of the track ends. */
export function trackEndTick(track: PieceTrack): number {
  return track.start + trackDurationTicks(track);
}

export function pieceDurationTicks(piece: Piece): number {
  return piece.tracks.reduce((end, track) => Math.max(end, trackEndTick(track)), 0);
}

export function countNotes(track: PieceTrack): number {
  return track.notes.filter((timed) => timed.note !== null).length;
}
