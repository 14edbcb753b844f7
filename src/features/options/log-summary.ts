import type { CipherPlan } from "../cipher/types.js";
import { previewTable } from "../cipher/shift-table.js";
import type { CipherOptions } from "../../utils/validation.js";

const BORDER = "=".repeat(45);

function row(label: string, value: string | number | boolean): string {
  return `${label.padEnd(21)}${String(value)}`;
}

/** Multi-line `--show-log` report, terminated by a newline. */
export function renderLogSummary(options: CipherOptions, plan: CipherPlan, bytesProcessed: number): string {
  const heading = options.direction === "encipher" ? "Encipher" : "Decipher";
  const preview = previewTable(plan.table)
    .map(({ from, to }) => `(${from},${to}), `)
    .join("");

  return [
    "",
    BORDER,
    `${heading} program options/control`,
    BORDER,
    row("[Raw] Program name:", options.programName),
    row("[Stripped] Name:", options.programNameStripped),
    row("IFILE:", options.inputPath),
    row("OFILE:", options.outputPath),
    row("Default output name:", options.useDefaultOutputName),
    row("Shift amount:", options.shiftAmount),
    row("[Reduced] Shift:", plan.shifts.upper),
    row("Shift numbers:", options.shiftDigits),
    row("Number shift amount:", plan.shifts.digit),
    row("Shift punctuation:", options.shiftPunctuation),
    row("Punct. shift amount:", plan.shifts.punct),
    row(`${heading} dictionary:`, `{${preview}...}`),
    row("Number chars read:", bytesProcessed),
    BORDER,
    "",
  ].join("\n");
}
