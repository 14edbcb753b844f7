import { basename } from "node:path";
import type { Direction } from "../cipher/types.js";
import { IntegerParseError, OptionParseError } from "../../utils/errors.js";
import { CipherOptionsSchema, DataValidator, ShiftAmountSchema } from "../../utils/validation.js";
import type { CipherOptions } from "../../utils/validation.js";

export const DEFAULT_SHIFT = 5;

export const DEFAULT_SUFFIX: Readonly<Record<Direction, string>> = {
  encipher: ".ciph",
  decipher: ".dec",
};

export interface ProgramName {
  raw: string;
  stripped: string;
}

export type ParseOutcome =
  | { kind: "usage"; program: ProgramName }
  | { kind: "help"; program: ProgramName }
  | { kind: "run"; options: CipherOptions }
  | { kind: "error"; program: ProgramName; error: OptionParseError | IntegerParseError };

interface ToggleFlags {
  shiftDigits: boolean;
  shiftPunctuation: boolean;
  showLog: boolean;
}

type CombinedResult =
  | { kind: "ok"; flags: ToggleFlags }
  | { kind: "help"; flags: ToggleFlags }
  | { kind: "error"; error: OptionParseError };

const SINGLE_CHAR_FLAGS = new Set(["a", "n", "p", "l", "h"]);

function invalidArgument(token: string): OptionParseError {
  return new OptionParseError(`Invalid argument (${token}) used.`, token);
}

/**
 * Applies a combined single-character token such as `-npl` to a copy of the
 * current toggles. A rejected token leaves the toggles from earlier tokens
 * untouched; `h` stops at that character, keeping what came before it.
 */
export function parseCombinedFlags(token: string, current: ToggleFlags): CombinedResult {
  if (token.length < 2 || !token.startsWith("-") || token.lastIndexOf("-") > 0) {
    return { kind: "error", error: invalidArgument(token) };
  }

  const flags = { ...current };
  for (const ch of token.slice(1)) {
    if (!SINGLE_CHAR_FLAGS.has(ch)) {
      return {
        kind: "error",
        error: new OptionParseError(`Invalid single-character option (${ch}) within (${token}).`, token),
      };
    }
    switch (ch) {
      case "a":
        flags.shiftDigits = true;
        flags.shiftPunctuation = true;
        break;
      case "n":
        flags.shiftDigits = true;
        break;
      case "p":
        flags.shiftPunctuation = true;
        break;
      case "l":
        flags.showLog = true;
        break;
      case "h":
        return { kind: "help", flags };
    }
  }
  return { kind: "ok", flags };
}

export function parseShiftAmount(value: string): number | IntegerParseError {
  const result = DataValidator.validate(ShiftAmountSchema, value);
  if (result.success) return result.data;
  return new IntegerParseError(
    `Invalid shift amount (${value}): ${DataValidator.firstMessage(result.errors)}.`,
    value,
  );
}

export function defaultOutputPath(inputPath: string, direction: Direction): string {
  return `${inputPath}${DEFAULT_SUFFIX[direction]}`;
}

/**
 * Parses an argv-style token list. Token 0 is the program name.
 */
export function parseCommandLine(argv: readonly string[], direction: Direction): ParseOutcome {
  const rawName = argv[0] ?? "";
  const program: ProgramName = { raw: rawName, stripped: rawName ? basename(rawName) : "" };

  if (argv.length <= 1) return { kind: "usage", program };

  let inputPath: string | undefined;
  let outputPath: string | undefined;
  let shiftAmount = DEFAULT_SHIFT;
  let toggles: ToggleFlags = { shiftDigits: false, shiftPunctuation: false, showLog: false };

  const fail = (error: OptionParseError | IntegerParseError): ParseOutcome => ({ kind: "error", program, error });

  let i = 1;
  while (i < argv.length) {
    const token = argv[i];

    const takeValue = (): string | undefined => (i + 1 < argv.length ? argv[i + 1] : undefined);

    switch (token) {
      case "-i":
      case "--ifile":
      case "-o":
      case "--ofile":
      case "-s":
      case "--shift-amount": {
        const value = takeValue();
        if (value === undefined) {
          return fail(new OptionParseError(`Missing value after option (${token}).`, token));
        }
        if (token === "-i" || token === "--ifile") {
          inputPath = value;
        } else if (token === "-o" || token === "--ofile") {
          outputPath = value;
        } else {
          const parsed = parseShiftAmount(value);
          if (parsed instanceof IntegerParseError) return fail(parsed);
          shiftAmount = parsed;
        }
        i += 2;
        continue;
      }
      case "--shift-nums":
      case "--shift-numbers":
        toggles = { ...toggles, shiftDigits: true };
        break;
      case "--shift-puncts":
        toggles = { ...toggles, shiftPunctuation: true };
        break;
      case "--shift-all":
        toggles = { ...toggles, shiftDigits: true, shiftPunctuation: true };
        break;
      case "--show-log":
        toggles = { ...toggles, showLog: true };
        break;
      case "--help":
        return { kind: "help", program };
      default: {
        const combined = parseCombinedFlags(token, toggles);
        if (combined.kind === "error") return fail(combined.error);
        toggles = combined.flags;
        if (combined.kind === "help") return { kind: "help", program };
      }
    }
    i += 1;
  }

  if (inputPath === undefined) {
    return fail(new OptionParseError("Missing required option (-i, --ifile).", "-i"));
  }

  const candidate = {
    direction,
    programName: program.raw,
    programNameStripped: program.stripped,
    inputPath,
    outputPath: outputPath ?? defaultOutputPath(inputPath, direction),
    useDefaultOutputName: outputPath === undefined,
    shiftAmount,
    ...toggles,
  };

  const validated = DataValidator.validate(CipherOptionsSchema, candidate);
  if (!validated.success) {
    return fail(new OptionParseError(`Invalid options: ${DataValidator.firstMessage(validated.errors)}.`, inputPath));
  }
  return { kind: "run", options: validated.data };
}
