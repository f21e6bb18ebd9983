export { renderPiece, resolveRenderOptions, DEFAULT_RENDER_OPTIONS } from "./pipeline.js";
export { MoiraError, InvalidNotationError, PieceFormatError } from "./errors.js";
export {
  BASE_KEYS,
  baseKeyPitchClass,
  baseKeysFrom,
  defaultNamedKey,
  formatNamedKey,
  modifierValue,
  namedKeyToPitchClass,
  namedKeysEqual,
  parseNamedKey,
  readKeyPrefixes,
  spellPitchClass,
  toPitchClass,
  transposePitchClass
} from "./theory/key.js";
export {
  MIDI_NOTE_MAX,
  MIDI_NOTE_MIN,
  composeNote,
  decomposeNote,
  defaultNamedNote,
  formatNamedNote,
  formatNote,
  frequencyToMidi,
  isMidiNote,
  midiToFrequency,
  namedNoteToMidi,
  parseNamedNote,
  spellNote,
  transposeNote
} from "./theory/note.js";
export { Scale, parseScale, resolveModeName } from "./theory/scale.js";
export { buildChord, chordMidiNotes, chordNotes, formatChordSymbol, harmonize } from "./theory/chord.js";
export type { BuildChordOptions } from "./theory/chord.js";
export { SCALE_MODES } from "./constants/scale-modes.js";
export type { ScaleModeName } from "./constants/scale-modes.js";
export { MAX_BPM, MAX_TICKS, MIN_BPM, TICKS_PER_BEAT } from "./constants/timing.js";
export { parsePiece } from "./piece/piece-parser.js";
export { parseNoteSequence } from "./piece/note-sequence.js";
export { countNotes, pieceDurationTicks, trackDurationTicks, trackEndTick } from "./piece/timing.js";
export { realizeTrack, tempoMicroseconds } from "./midi/track-realization.js";
export { encodeEvent, encodeMidiFile, encodeTrack, encodeVariableLength } from "./midi/smf-writer.js";
export type { EncodeMidiFileOptions } from "./midi/smf-writer.js";
export type {
  BaseKey,
  Chord,
  ChordQuality,
  FormatOptions,
  KeyModifier,
  MidiCommand,
  MidiNote,
  MidiTrackEvent,
  NamedKey,
  NamedNote,
  Piece,
  PieceTrack,
  PitchClass,
  RenderMeta,
  RenderOptions,
  RenderResult,
  ResolvedRenderOptions,
  ScaleNote,
  TimedNote,
  TrackSummary
} from "./types.js";
