/**
 * Scale mode table
 *
 * Offsets are semitones above the tonic, strictly increasing and within
 * one octave. Mode names are matched case-insensitively after alias
 * resolution.
 */

export const SCALE_MODES = {
  major: [0, 2, 4, 5, 7, 9, 11],
  minor: [0, 2, 3, 5, 7, 8, 10],
  harmonic: [0, 2, 3, 5, 7, 8, 11],
  melodic: [0, 2, 3, 5, 7, 9, 11],
  dorian: [0, 2, 3, 5, 7, 9, 10],
  phrygian: [0, 1, 3, 5, 7, 8, 10],
  lydian: [0, 2, 4, 6, 7, 9, 11],
  mixolydian: [0, 2, 4, 5, 7, 9, 10],
  locrian: [0, 1, 3, 5, 6, 8, 10],
  pentatonic: [0, 2, 4, 7, 9],
  "minor-pentatonic": [0, 3, 5, 7, 10],
  blues: [0, 3, 5, 6, 7, 10],
  chromatic: [0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11]
} as const satisfies Record<string, readonly number[]>;

export type ScaleModeName = keyof typeof SCALE_MODES;

/** Short and alternative names. An empty mode means major. */
export const SCALE_MODE_ALIASES: Record<string, ScaleModeName> = {
  "": "major",
  maj: "major",
  ionian: "major",
  m: "minor",
  min: "minor",
  aeolian: "minor",
  "natural-minor": "minor",
  harm: "harmonic",
  "harmonic-minor": "harmonic",
  mel: "melodic",
  "melodic-minor": "melodic",
  pent: "pentatonic",
  majpent: "pentatonic",
  "major-pentatonic": "pentatonic",
  minpent: "minor-pentatonic"
};

/** Offsets of the seven-note scale used to spell scales of other sizes. */
export const PARENT_MAJOR = SCALE_MODES.major;
export const PARENT_MINOR = SCALE_MODES.minor;
