import type { ChordQuality } from "../types.js";

/**
 * How a chord quality is written. Keys of {@link CHORD_QUALITIES} are the
 * semitone intervals above the root, comma-separated.
 */
export interface ChordQualityInfo {
  quality: ChordQuality;
  /** Symbol suffix with Unicode accidentals (`m7♭5`). */
  suffix: string;
  /** Symbol suffix in ASCII (`m7b5`). */
  asciiSuffix: string;
  /** Roman numerals are upper case for major-third chords, lower case otherwise. */
  numeralCase: "upper" | "lower";
  numeralSuffix: string;
}

export const CHORD_QUALITIES: Record<string, ChordQualityInfo> = {
  "0,4,7": { quality: "major", suffix: "", asciiSuffix: "", numeralCase: "upper", numeralSuffix: "" },
  "0,3,7": { quality: "minor", suffix: "m", asciiSuffix: "m", numeralCase: "lower", numeralSuffix: "" },
  "0,3,6": { quality: "diminished", suffix: "dim", asciiSuffix: "dim", numeralCase: "lower", numeralSuffix: "°" },
  "0,4,8": { quality: "augmented", suffix: "aug", asciiSuffix: "aug", numeralCase: "upper", numeralSuffix: "+" },
  "0,2,7": { quality: "sus2", suffix: "sus2", asciiSuffix: "sus2", numeralCase: "upper", numeralSuffix: "sus2" },
  "0,5,7": { quality: "sus4", suffix: "sus4", asciiSuffix: "sus4", numeralCase: "upper", numeralSuffix: "sus4" },
  "0,4,7,10": { quality: "dominant7", suffix: "7", asciiSuffix: "7", numeralCase: "upper", numeralSuffix: "7" },
  "0,4,7,11": { quality: "major7", suffix: "maj7", asciiSuffix: "maj7", numeralCase: "upper", numeralSuffix: "maj7" },
  "0,3,7,10": { quality: "minor7", suffix: "m7", asciiSuffix: "m7", numeralCase: "lower", numeralSuffix: "7" },
  "0,3,6,10": { quality: "halfDiminished7", suffix: "m7♭5", asciiSuffix: "m7b5", numeralCase: "lower", numeralSuffix: "ø7" },
  "0,3,6,9": { quality: "diminished7", suffix: "dim7", asciiSuffix: "dim7", numeralCase: "lower", numeralSuffix: "°7" },
  "0,3,7,11": { quality: "minorMajor7", suffix: "mMaj7", asciiSuffix: "mMaj7", numeralCase: "lower", numeralSuffix: "maj7" },
  "0,4,8,11": { quality: "augmentedMajor7", suffix: "maj7♯5", asciiSuffix: "maj7#5", numeralCase: "upper", numeralSuffix: "+maj7" }
};

export const ROMAN_NUMERALS = ["I", "II", "III", "IV", "V", "VI", "VII"] as const;
