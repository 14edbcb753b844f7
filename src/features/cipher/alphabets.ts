import type { CharacterClass } from "./types.js";

function range(first: string, last: string): readonly string[] {
  const start = first.charCodeAt(0);
  const end = last.charCodeAt(0);
  return Object.freeze(Array.from({ length: end - start + 1 }, (_, i) => String.fromCharCode(start + i)));
}

// ASCII order
const PUNCTUATION = Object.freeze([
  "!", '"', "#", "$", "%", "&", "'", "(", ")", "*", "+", ",",
  "-", ".", "/", ":", ";", "<", "=", ">", "?", "@", "[", "\\",
  "]", "^", "_", "`", "{", "|", "}", "~",
]);

export const ALPHABETS: Readonly<Record<CharacterClass, readonly string[]>> = Object.freeze({
  upper: range("A", "Z"),
  lower: range("a", "z"),
  digit: range("0", "9"),
  punct: PUNCTUATION,
});

/** Fixed iteration order used wherever classes are listed. */
export const CHARACTER_CLASSES: readonly CharacterClass[] = ["upper", "lower", "digit", "punct"];

export const ALWAYS_ENABLED: readonly CharacterClass[] = ["upper", "lower"];
