export type CharacterClass = "upper" | "lower" | "digit" | "punct";

export type Direction = "encipher" | "decipher";

export interface ShiftSpec {
  rawShift: number;
  classes: ReadonlySet<CharacterClass>;
}

/** Reduced shift per class; disabled classes report 0. */
export type ClassShifts = Record<CharacterClass, number>;

/** Byte -> byte. A missing key means the byte passes through unchanged. */
export type SubstitutionTable = ReadonlyMap<number, number>;

export interface TransformResult {
  bytesProcessed: number;
}

export interface TextTransformResult extends TransformResult {
  output: string;
}

export interface TableEntry {
  from: string;
  to: string;
}

/** Read-only values derived once from the parsed options. */
export interface CipherPlan {
  direction: Direction;
  spec: ShiftSpec;
  shifts: ClassShifts;
  table: SubstitutionTable;
}
