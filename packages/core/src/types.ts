import type { Scale } from "./theory/scale.js";

/** One of the 12 pitch classes of Western tuning: 0 = C, 11 = B. */
export type PitchClass = number;

/** Note height with MIDI numbering: 0 is C-1, 60 is C4, 69 is A4. */
export type MidiNote = number;

export type BaseKey = "C" | "D" | "E" | "F" | "G" | "A" | "B";

export type KeyModifier = "doubleFlat" | "flat" | "natural" | "sharp" | "doubleSharp";

/**
 * A pitch class together with the way it is written.
 * D♯ and E♭ are the same pitch class but different named keys.
 */
export interface NamedKey {
  baseKey: BaseKey;
  modifier: KeyModifier;
}

/**
 * A spelled note. The octave belongs to the letter, not to the sounding
 * pitch: B♯3 sounds as C4 and C♭5 sounds as B4.
 */
export interface NamedNote {
  key: NamedKey;
  octave: number;
}

export interface FormatOptions {
  /** Write accidentals as `b # x bb` instead of `♭ ♯ 𝄪 𝄫`. */
  ascii?: boolean;
}

/**
 * A degree of a scale, independent of the concrete pitch.
 * `position` is 0-based and may be negative or exceed the scale length;
 * `octave` is the octave of the scale's tonic the position counts from.
 */
export interface ScaleNote {
  position: number;
  octave: number;
}

/** A scale note, or a rest when `note` is null, lasting `duration` ticks. */
export interface TimedNote {
  note: ScaleNote | null;
  duration: number;
}

export interface PieceTrack {
  id: string;
  scale: Scale;
  octave: number;
  /** Absolute start in ticks. */
  start: number;
  notes: TimedNote[];
  program?: number;
  velocity?: number;
}

export interface Piece {
  bpm: number;
  tracks: PieceTrack[];
}

export type ChordQuality =
  | "major"
  | "minor"
  | "diminished"
  | "augmented"
  | "sus2"
  | "sus4"
  | "dominant7"
  | "major7"
  | "minor7"
  | "halfDiminished7"
  | "diminished7"
  | "minorMajor7"
  | "augmentedMajor7"
  | "unknown";

export interface Chord {
  scale: Scale;
  /** Scale position of the root. */
  degree: number;
  /** Scale positions of every tone, root first. */
  positions: number[];
  root: NamedKey;
  tones: NamedKey[];
  /** Semitones of each tone above the root. */
  intervals: number[];
  quality: ChordQuality;
  /** Chord symbol with Unicode accidentals, e.g. `B♭maj7`. */
  symbol: string;
  /** Roman numeral of the degree, e.g. `vii°`. */
  numeral: string;
}

export type MidiCommand = "trackName" | "tempo" | "programChange" | "noteOn" | "noteOff" | "endOfTrack";

export interface TrackNameData {
  text: string;
}

export interface TempoData {
  microsecondsPerBeat: number;
}

export interface ProgramChangeData {
  channel: number;
  program: number;
}

export interface NoteData {
  channel: number;
  key: MidiNote;
  velocity: number;
}

export type MidiCommandData<C extends MidiCommand> =
  C extends "trackName"
    ? TrackNameData
    : C extends "tempo"
      ? TempoData
      : C extends "programChange"
        ? ProgramChangeData
        : C extends "noteOn" | "noteOff"
          ? NoteData
          : Record<string, never>;

/**
 * A MIDI track event. `delta` is the number of ticks since the previous
 * event of the same track.
 */
export type MidiTrackEvent<C extends MidiCommand = MidiCommand> = {
  [K in C]: {
    delta: number;
    command: K;
    data: MidiCommandData<K>;
  };
}[C];

/**
 * Options applied to every track that does not carry its own values.
 *
 * Defaults when omitted:
 * - `program`: 6 (harpsichord)
 * - `velocity`: 127
 * - `channel`: 0
 */
export interface RenderOptions {
  /** General MIDI program number (0-127). */
  program?: number;
  /** Note velocity (1-127). */
  velocity?: number;
  /** MIDI channel (0-15). */
  channel?: number;
}

export type ResolvedRenderOptions = Required<RenderOptions>;

export interface TrackSummary {
  id: string;
  scale: string;
  startTick: number;
  endTick: number;
  noteCount: number;
}

export interface RenderMeta {
  bpm: number;
  ticksPerBeat: number;
  totalTicks: number;
  durationSeconds: number;
  options: ResolvedRenderOptions;
  tracks: TrackSummary[];
}

export interface RenderResult {
  midi: Uint8Array;
  piece: Piece;
  meta: RenderMeta;
}
