/**
 * Standard MIDI File encoder.
 *
 * Writes format 1 files (parallel tracks sharing one tick resolution):
 * an `MThd` header chunk followed by one `MTrk` chunk per track. Events
 * are written in full, without running status.
 */

import type { MidiTrackEvent } from "../types.js";
import { MAX_TICKS, TICKS_PER_BEAT } from "../constants/timing.js";

/** Largest value a variable-length quantity can hold (4 bytes of 7 bits). */
const MAX_VARIABLE_LENGTH = MAX_TICKS;

const HEADER_CHUNK_ID = "MThd";
const TRACK_CHUNK_ID = "MTrk";
const FORMAT_PARALLEL = 1;

const META_EVENT = 0xff;
const META_TRACK_NAME = 0x03;
const META_TEMPO = 0x51;
const META_END_OF_TRACK = 0x2f;

const STATUS_NOTE_OFF = 0x80;
const STATUS_NOTE_ON = 0x90;
const STATUS_PROGRAM_CHANGE = 0xc0;

export interface EncodeMidiFileOptions {
  /** Tick resolution written in the header (default 24). */
  ticksPerBeat?: number;
}

/**
 * Encodes a delta time or length as a MIDI variable-length quantity:
 * 7 bits per byte, most significant first, continuation bit set on every
 * byte but the last (0x80 → 81 00).
 *
 * @throws RangeError for negative, fractional or too large values
 */
export function encodeVariableLength(value: number): number[] {
  if (!Number.isInteger(value) || value < 0 || value > MAX_VARIABLE_LENGTH) {
    throw new RangeError(`Variable-length quantity out of range (0-${MAX_VARIABLE_LENGTH}): ${value}`);
  }
  const bytes = [value & 0x7f];
  let rest = value >>> 7;
  while (rest > 0) {
    bytes.unshift((rest & 0x7f) | 0x80);
    rest >>>= 7;
  }
  return bytes;
}

function uint16(value: number): number[] {
  return [(value >>> 8) & 0xff, value & 0xff];
}

function uint32(value: number): number[] {
  return [(value >>> 24) & 0xff, (value >>> 16) & 0xff, (value >>> 8) & 0xff, value & 0xff];
}

function ascii(text: string): number[] {
  return Array.from(text, (char) => char.charCodeAt(0));
}

function dataByte(value: number, description: string): number {
  if (!Number.isInteger(value) || value < 0 || value > 0x7f) {
    throw new RangeError(`${description} must be between 0 and 127: ${value}`);
  }
  return value;
}

function statusByte(status: number, channel: number): number {
  if (!Number.isInteger(channel) || channel < 0 || channel > 15) {
    throw new RangeError(`MIDI channel must be between 0 and 15: ${channel}`);
  }
  return status | channel;
}

/** Encodes one event without its delta time. */
export function encodeEvent(event: MidiTrackEvent): number[] {
  switch (event.command) {
    case "trackName": {
      const text = Array.from(new TextEncoder().encode(event.data.text));
      return [META_EVENT, META_TRACK_NAME, ...encodeVariableLength(text.length), ...text];
    }
    case "tempo": {
      const tempo = event.data.microsecondsPerBeat;
      if (!Number.isInteger(tempo) || tempo < 1 || tempo > 0xffffff) {
        throw new RangeError(`Tempo must fit in 24 bits: ${tempo}`);
      }
      return [META_EVENT, META_TEMPO, 0x03, (tempo >>> 16) & 0xff, (tempo >>> 8) & 0xff, tempo & 0xff];
    }
    case "programChange":
      return [statusByte(STATUS_PROGRAM_CHANGE, event.data.channel), dataByte(event.data.program, "Program")];
    case "noteOn":
    case "noteOff": {
      const status = event.command === "noteOn" ? STATUS_NOTE_ON : STATUS_NOTE_OFF;
      return [
        statusByte(status, event.data.channel),
        dataByte(event.data.key, "Note"),
        dataByte(event.data.velocity, "Velocity")
      ];
    }
    case "endOfTrack":
      return [META_EVENT, META_END_OF_TRACK, 0x00];
  }
}

function encodeChunk(id: string, body: number[]): number[] {
  return ascii(id).concat(uint32(body.length), body);
}

export function encodeTrack(events: MidiTrackEvent[]): number[] {
  const body: number[] = [];
  for (const event of events) {
    body.push(...encodeVariableLength(event.delta), ...encodeEvent(event));
  }
  return encodeChunk(TRACK_CHUNK_ID, body);
}

/**
 * Encodes tracks of events into a format 1 Standard MIDI File.
 *
 * @throws RangeError for values that do not fit the file format
 */
export function encodeMidiFile(tracks: MidiTrackEvent[][], options: EncodeMidiFileOptions = {}): Uint8Array {
  const ticksPerBeat = options.ticksPerBeat ?? TICKS_PER_BEAT;
  if (!Number.isInteger(ticksPerBeat) || ticksPerBeat < 1 || ticksPerBeat > 0x7fff) {
    throw new RangeError(`Ticks per beat must be between 1 and 32767: ${ticksPerBeat}`);
  }
  if (tracks.length > 0xffff) {
    throw new RangeError(`Too many tracks for a MIDI file: ${tracks.length}`);
  }

  const header = encodeChunk(HEADER_CHUNK_ID, [
    ...uint16(FORMAT_PARALLEL),
    ...uint16(tracks.length),
    ...uint16(ticksPerBeat)
  ]);
  const chunks = tracks.map((track) => encodeTrack(track));
  return Uint8Array.from(header.concat(...chunks));
}
