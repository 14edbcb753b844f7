import type { Direction } from "../features/cipher/types.js";
import { buildCipherPlan } from "../features/cipher/shift-table.js";
import { transformFile } from "../features/cipher/stream-transformer.js";
import { parseCommandLine } from "../features/options/option-parser.js";
import { renderHelp, renderUsage } from "../features/options/help.js";
import { renderLogSummary } from "../features/options/log-summary.js";
import { loadConfig } from "../lib/config.js";
import { createLogger } from "../lib/logger.js";
import { ErrorReporter } from "../utils/error-reporter.js";

export interface CipherIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env: NodeJS.ProcessEnv;
  isTTY: boolean;
}

const processIO = (): CipherIO => ({
  stdout: (text) => { process.stdout.write(text); },
  stderr: (text) => { process.stderr.write(text); },
  env: process.env,
  isTTY: Boolean(process.stdout.isTTY),
});

/**
 * Top-level run shared by both executables. Never throws; resolves to the
 * process exit code.
 */
export async function runCipher(argv: readonly string[], direction: Direction, io: CipherIO = processIO()): Promise<number> {
  const config = loadConfig(io.env, io.isTTY);
  const log = createLogger(direction, { debug: config.debug, sink: (line) => io.stderr(`${line}\n`) });
  const reporter = new ErrorReporter({ write: io.stderr, verbose: config.debug });

  const outcome = parseCommandLine(argv, direction);
  switch (outcome.kind) {
    case "usage":
      io.stdout(renderUsage(outcome.program.stripped, direction));
      return 0;
    case "help":
      io.stdout(renderHelp(outcome.program.stripped, direction, { color: config.color }));
      return 0;
    case "error":
      return reporter.report(outcome.error).exitCode;
    case "run":
      break;
  }

  const { options } = outcome;
  try {
    log.debug("options parsed", { input: options.inputPath, output: options.outputPath, shift: options.shiftAmount });
    const plan = await log.timed("build table", () => buildCipherPlan(options));
    const result = await log.timed("transform file", () => transformFile(options.inputPath, options.outputPath, plan.table));

    if (options.showLog) {
      io.stderr(renderLogSummary(options, plan, result.bytesProcessed));
    } else {
      io.stdout(`\nRead ${result.bytesProcessed} characters from the input file.\n\n`);
    }
    return 0;
  } catch (err) {
    return reporter.report(err).exitCode;
  }
}
