/**
 * MIDI ticks per beat (quarter note). 24 divides evenly into halves,
 * thirds, quarters, sixths and eighths of a beat.
 */
export const TICKS_PER_BEAT = 24;

/** Tempo meta events count microseconds per beat: 60_000_000 / bpm (500000 at 120 bpm). */
export const MICROSECONDS_PER_MINUTE = 60_000_000;

/** Largest delta time a MIDI file can hold (a 4-byte variable-length quantity). */
export const MAX_TICKS = 0x0fffffff;

/** Slowest tempo whose microseconds per beat fit the 24-bit tempo meta event. */
export const MIN_BPM = 4;
export const MAX_BPM = 255;
