import { ALPHABETS, ALWAYS_ENABLED, CHARACTER_CLASSES } from "./alphabets.js";
import type {
  CharacterClass,
  CipherPlan,
  ClassShifts,
  Direction,
  ShiftSpec,
  SubstitutionTable,
  TableEntry,
} from "./types.js";

/**
 * Floor-style modulo: the result is always in [0, size), whatever the sign
 * or magnitude of `raw`.
 */
export function reduceShift(raw: number, size: number): number {
  return ((raw % size) + size) % size;
}

/** Element i of the result is alphabet[(i + k) mod m]. */
export function rotate<T>(alphabet: readonly T[], k: number): T[] {
  const m = alphabet.length;
  if (m === 0) return [];
  const r = reduceShift(k, m);
  return [...alphabet.slice(r), ...alphabet.slice(0, r)];
}

export function enabledClasses(opts: { digits: boolean; punctuation: boolean }): ReadonlySet<CharacterClass> {
  const classes = new Set<CharacterClass>(ALWAYS_ENABLED);
  if (opts.digits) classes.add("digit");
  if (opts.punctuation) classes.add("punct");
  return classes;
}

/**
 * Each class is reduced by its own alphabet size from the same raw shift, so
 * a shift of 12 moves letters by 12 but digits by 2.
 */
export function classShifts(spec: ShiftSpec): ClassShifts {
  const out: ClassShifts = { upper: 0, lower: 0, digit: 0, punct: 0 };
  for (const cls of CHARACTER_CLASSES) {
    if (spec.classes.has(cls)) out[cls] = reduceShift(spec.rawShift, ALPHABETS[cls].length);
  }
  return out;
}

export function buildShiftTable(spec: ShiftSpec, direction: Direction): SubstitutionTable {
  const shifts = classShifts(spec);
  const table = new Map<number, number>();

  for (const cls of CHARACTER_CLASSES) {
    if (!spec.classes.has(cls)) continue;
    const original = ALPHABETS[cls];
    const rotated = rotate(original, shifts[cls]);
    for (let i = 0; i < original.length; i++) {
      const plain = original[i].charCodeAt(0);
      const shifted = rotated[i].charCodeAt(0);
      if (direction === "encipher") table.set(plain, shifted);
      else table.set(shifted, plain);
    }
  }

  return table;
}

/**
 * Up to `count` entries in ascending key order, starting at `anchor`.
 * Empty when the anchor is not a key.
 */
export function previewTable(table: SubstitutionTable, anchor = "A", count = 10): TableEntry[] {
  const keys = [...table.keys()].sort((a, b) => a - b);
  const start = keys.indexOf(anchor.charCodeAt(0));
  if (start < 0) return [];
  return keys.slice(start, start + count).map((key) => ({
    from: String.fromCharCode(key),
    to: String.fromCharCode(table.get(key) ?? key),
  }));
}

export function buildCipherPlan(opts: {
  direction: Direction;
  shiftAmount: number;
  shiftDigits: boolean;
  shiftPunctuation: boolean;
}): CipherPlan {
  const spec: ShiftSpec = {
    rawShift: opts.shiftAmount,
    classes: enabledClasses({ digits: opts.shiftDigits, punctuation: opts.shiftPunctuation }),
  };
  return {
    direction: opts.direction,
    spec,
    shifts: classShifts(spec),
    table: buildShiftTable(spec, opts.direction),
  };
}
