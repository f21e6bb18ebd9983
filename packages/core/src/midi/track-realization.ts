import type { MidiTrackEvent, PieceTrack, ResolvedRenderOptions } from "../types.js";
import { MICROSECONDS_PER_MINUTE } from "../constants/timing.js";

/**
 * Tempo meta value for a bpm. MIDI stores tempo as microseconds per beat,
 * so 120 bpm is 500000.
 */
export function tempoMicroseconds(bpm: number): number {
  return Math.floor(MICROSECONDS_PER_MINUTE / bpm);
}

/**
 * Turns a piece track into MIDI events with delta times.
 *
 * Every track opens with its name, the piece tempo and a program change.
 * Rests, including the track's start offset, add up into the delta of the
 * next note-on; a note-off follows each note-on after the note's
 * duration; silence after the last note becomes the end-of-track delta.
 */
export function realizeTrack(track: PieceTrack, bpm: number, options: ResolvedRenderOptions): MidiTrackEvent[] {
  const channel = options.channel;
  const velocity = track.velocity ?? options.velocity;
  const events: MidiTrackEvent[] = [
    { delta: 0, command: "trackName", data: { text: track.id } },
    { delta: 0, command: "tempo", data: { microsecondsPerBeat: tempoMicroseconds(bpm) } },
    { delta: 0, command: "programChange", data: { channel, program: track.program ?? options.program } }
  ];

  let pendingDelta = track.start;
  for (const { note, duration } of track.notes) {
    if (note === null) {
      pendingDelta += duration;
      continue;
    }
    const key = track.scale.noteAt(note.position, note.octave);
    events.push({ delta: pendingDelta, command: "noteOn", data: { channel, key, velocity } });
    events.push({ delta: duration, command: "noteOff", data: { channel, key, velocity } });
    pendingDelta = 0;
  }

  events.push({ delta: pendingDelta, command: "endOfTrack", data: {} });
  return events;
}
