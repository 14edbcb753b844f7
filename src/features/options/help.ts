import type { Direction } from "../cipher/types.js";
import { DEFAULT_SHIFT, DEFAULT_SUFFIX } from "./option-parser.js";

const bold = (s: string, color: boolean) => (color ? `\u001b[1m${s}\u001b[0m` : s);

export function renderUsage(progname: string, direction: Direction): string {
  const suffix = DEFAULT_SUFFIX[direction];
  return [
    "",
    "Usage:",
    `${progname} -i <IFILE>             to read IFILE input file and default output IFILE${suffix}`,
    `${progname} -i <IFILE> -o <OFILE>  to control name of output file`,
    "",
    `${progname} -h`,
    `${progname} --help   for full HELP message`,
    "",
  ].join("\n");
}

export function renderHelp(progname: string, direction: Direction, opts: { color?: boolean } = {}): string {
  const color = opts.color ?? false;
  const suffix = DEFAULT_SUFFIX[direction];
  const verb = direction === "encipher" ? "enciphered" : "deciphered";
  const spacer = " ".repeat(27);
  const sample = direction === "encipher" ? "what.txt" : `what.txt${DEFAULT_SUFFIX.encipher}`;

  return [
    "",
    `${bold("Usage", color)}:`,
    `${progname} [options] -i <IFILE> [-o <OFILE>]`,
    "",
    `${bold("Required", color)}:`,
    "  -i <IFILE>,",
    "  --ifile <IFILE>          Name of input file to read (must be UTF-8/ASCII text)",
    "",
    `${bold("Options", color)}:`,
    "  -o <OFILE>,",
    "  --ofile <OFILE>          Name of output file to write (will be overwritten if exists)",
    `${spacer}Default filename created by appending "${suffix}" to IFILE if option not used`,
    "",
    "  -s <SHIFT>,",
    `  --shift-amount <SHIFT>   Number of characters to shift each alphabet (default: ${DEFAULT_SHIFT})`,
    `${spacer}Positive and negative integers are allowed.`,
    "",
    `  -n, --shift-nums         Include digits in the ${verb} alphabet (default: false)`,
    `  -p, --shift-puncts       Include punctuation symbols in the ${verb} alphabet (default: false)`,
    "  -a, --shift-all          Include both digits and punctuation symbols (default: false)",
    "  -l, --show-log           Print option and dictionary details after processing",
    "",
    "  -h, --help               Print HELP message and stop without processing",
    "",
    `${bold("Examples", color)}:`,
    `\t${progname} -a -i hello.txt`,
    `\t${progname} -np -s 15 -i ${sample} -o this.out`,
    `\t${progname} --ofile temp.txt --ifile perm.txt -pn -s -80`,
    "",
  ].join("\n");
}
