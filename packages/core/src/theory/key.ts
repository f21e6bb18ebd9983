import type { BaseKey, FormatOptions, KeyModifier, NamedKey, PitchClass } from "../types.js";
import { InvalidNotationError } from "../errors.js";

/** Letters in ascending order within an octave. */
export const BASE_KEYS: readonly BaseKey[] = ["C", "D", "E", "F", "G", "A", "B"];

const BASE_KEY_PITCH_CLASS: Record<BaseKey, PitchClass> = {
  C: 0,
  D: 2,
  E: 4,
  F: 5,
  G: 7,
  A: 9,
  B: 11
};

/** Modifiers indexed by their semitone value + 2. */
const MODIFIERS_BY_VALUE: readonly KeyModifier[] = ["doubleFlat", "flat", "natural", "sharp", "doubleSharp"];

const MODIFIER_VALUE: Record<KeyModifier, number> = {
  doubleFlat: -2,
  flat: -1,
  natural: 0,
  sharp: 1,
  doubleSharp: 2
};

const MODIFIER_SYMBOL: Record<KeyModifier, string> = {
  doubleFlat: "𝄫",
  flat: "♭",
  natural: "",
  sharp: "♯",
  doubleSharp: "𝄪"
};

const MODIFIER_ASCII: Record<KeyModifier, string> = {
  doubleFlat: "bb",
  flat: "b",
  natural: "",
  sharp: "#",
  doubleSharp: "x"
};

/**
 * Accepted accidental spellings. Two-character forms come first so that
 * prefix matching finds "bb" before "b".
 */
const ACCIDENTALS: ReadonlyArray<readonly [string, KeyModifier]> = [
  ["bb", "doubleFlat"],
  ["𝄫", "doubleFlat"],
  ["##", "doubleSharp"],
  ["𝄪", "doubleSharp"],
  ["x", "doubleSharp"],
  ["b", "flat"],
  ["♭", "flat"],
  ["#", "sharp"],
  ["♯", "sharp"]
];

/**
 * Sharp-preferring spelling of each pitch class, used whenever a context
 * (a scale, a letter) does not dictate one.
 */
const DEFAULT_SPELLINGS: readonly NamedKey[] = [
  { baseKey: "C", modifier: "natural" },
  { baseKey: "C", modifier: "sharp" },
  { baseKey: "D", modifier: "natural" },
  { baseKey: "D", modifier: "sharp" },
  { baseKey: "E", modifier: "natural" },
  { baseKey: "F", modifier: "natural" },
  { baseKey: "F", modifier: "sharp" },
  { baseKey: "G", modifier: "natural" },
  { baseKey: "G", modifier: "sharp" },
  { baseKey: "A", modifier: "natural" },
  { baseKey: "A", modifier: "sharp" },
  { baseKey: "B", modifier: "natural" }
];

/** Euclidean modulo 12, so that -1 is B (11). */
export function toPitchClass(value: number): PitchClass {
  return ((value % 12) + 12) % 12;
}

export function transposePitchClass(pitchClass: PitchClass, semitones: number): PitchClass {
  return toPitchClass(pitchClass + semitones);
}

function isBaseKey(value: string): value is BaseKey {
  return Object.prototype.hasOwnProperty.call(BASE_KEY_PITCH_CLASS, value);
}

export function baseKeyPitchClass(baseKey: BaseKey): PitchClass {
  return BASE_KEY_PITCH_CLASS[baseKey];
}

export function modifierValue(modifier: KeyModifier): number {
  return MODIFIER_VALUE[modifier];
}

/**
 * The seven letters in order, starting at `baseKey` and wrapping around
 * (E → E F G A B C D).
 */
export function baseKeysFrom(baseKey: BaseKey): BaseKey[] {
  const start = BASE_KEYS.indexOf(baseKey);
  return BASE_KEYS.map((_, index) => BASE_KEYS[(start + index) % BASE_KEYS.length]);
}

export function namedKeyToPitchClass(named: NamedKey): PitchClass {
  return toPitchClass(BASE_KEY_PITCH_CLASS[named.baseKey] + MODIFIER_VALUE[named.modifier]);
}

/**
 * Spells a pitch class with the given letter, e.g. 0 with B is B♯ and
 * 2 with C is C𝄪.
 *
 * @returns undefined when more than a double accidental would be needed
 */
export function spellPitchClass(pitchClass: PitchClass, baseKey: BaseKey): NamedKey | undefined {
  let difference = toPitchClass(pitchClass - BASE_KEY_PITCH_CLASS[baseKey]);
  if (difference > 6) {
    difference -= 12;
  }
  if (difference < -2 || difference > 2) {
    return undefined;
  }
  return { baseKey, modifier: MODIFIERS_BY_VALUE[difference + 2] };
}

export function defaultNamedKey(pitchClass: PitchClass): NamedKey {
  return { ...DEFAULT_SPELLINGS[toPitchClass(pitchClass)] };
}

/**
 * Splits leading key text (`"Eb"` of `"Ebharm"`) into every reading it
 * allows, longest accidental first. Used by note and scale parsing, where
 * the key is followed by more text.
 */
export function readKeyPrefixes(text: string): Array<{ key: NamedKey; rest: string }> {
  const letter = text.charAt(0);
  if (!isBaseKey(letter)) {
    return [];
  }
  const remainder = text.slice(1);
  const readings: Array<{ key: NamedKey; rest: string }> = [];
  for (const [accidental, modifier] of ACCIDENTALS) {
    if (remainder.startsWith(accidental)) {
      readings.push({ key: { baseKey: letter, modifier }, rest: remainder.slice(accidental.length) });
    }
  }
  readings.push({ key: { baseKey: letter, modifier: "natural" }, rest: remainder });
  return readings;
}

/**
 * Parses a key name: a letter A-G followed by an optional accidental,
 * written either in ASCII (`b`, `bb`, `#`, `##`, `x`) or with the
 * Unicode symbols (`♭`, `𝄫`, `♯`, `𝄪`).
 *
 * @throws InvalidNotationError for anything else
 */
export function parseNamedKey(text: string): NamedKey {
  const reading = readKeyPrefixes(text).find((candidate) => candidate.rest === "");
  if (!reading) {
    throw new InvalidNotationError(`Invalid key: ${text}`);
  }
  return reading.key;
}

export function formatNamedKey(named: NamedKey, options: FormatOptions = {}): string {
  const symbols = options.ascii ? MODIFIER_ASCII : MODIFIER_SYMBOL;
  return named.baseKey + symbols[named.modifier];
}

export function namedKeysEqual(a: NamedKey, b: NamedKey): boolean {
  return a.baseKey === b.baseKey && a.modifier === b.modifier;
}
