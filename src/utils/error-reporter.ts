import { z } from 'zod';
import { CipherError, ErrorCategory, isCipherError } from './errors.js';

// User-facing message templates
const ERROR_MESSAGES: Record<ErrorCategory, { title: string; suggestion: string }> = {
  [ErrorCategory.OPTION_PARSE]: {
    title: 'Invalid Option',
    suggestion: 'Please see HELP with -h or --help option.'
  },
  [ErrorCategory.INTEGER_PARSE]: {
    title: 'Invalid Shift Amount',
    suggestion: 'The shift amount must be a whole number between -2147483648 and 2147483647.'
  },
  [ErrorCategory.INPUT_NOT_FOUND]: {
    title: 'Input File Not Found',
    suggestion: 'Check the path given with -i or --ifile.'
  },
  [ErrorCategory.OUTPUT_UNAVAILABLE]: {
    title: 'Output File Unavailable',
    suggestion: 'Check the directory exists and is writable, or choose another path with -o.'
  },
  [ErrorCategory.UNEXPECTED]: {
    title: 'Unexpected Error',
    suggestion: ''
  }
};

export const UNEXPECTED_MESSAGE = 'Unexpected error encountered. Program terminated.';

export interface ErrorReport {
  timestamp: Date;
  category: ErrorCategory;
  originalError: unknown;
  title: string;
  message: string;
  suggestion: string;
  exitCode: number;
}

export interface ErrorReporterConfig {
  /** Receives every formatted report; stderr by default. */
  write?: (text: string) => void;
  /** Appends the stack of the original error to the output. */
  verbose?: boolean;
}

const ErrorReportSchema = z.object({
  timestamp: z.date(),
  category: z.nativeEnum(ErrorCategory),
  title: z.string().min(1),
  message: z.string().min(1),
  suggestion: z.string(),
  exitCode: z.number().int().min(1)
});

/**
 * Maps anything thrown or returned as an error to a user-facing report and
 * an exit code, and writes it out.
 */
export class ErrorReporter {
  private readonly write: (text: string) => void;
  private readonly verbose: boolean;

  constructor(config: ErrorReporterConfig = {}) {
    this.write = config.write ?? ((text) => { process.stderr.write(text); });
    this.verbose = config.verbose ?? false;
  }

  report(error: unknown): ErrorReport {
    const category = this.categorizeError(error);
    const template = ERROR_MESSAGES[category];

    const report: ErrorReport = {
      timestamp: new Date(),
      category,
      originalError: error,
      title: template.title,
      message: isCipherError(error) ? error.message : UNEXPECTED_MESSAGE,
      suggestion: template.suggestion,
      exitCode: 1
    };

    const checked = ErrorReportSchema.safeParse(report);
    if (!checked.success) {
      throw new Error(`Error report validation failed: ${checked.error.message}`);
    }

    this.write(this.format(report));
    return report;
  }

  private categorizeError(error: unknown): ErrorCategory {
    if (error instanceof CipherError) return error.category;
    return ErrorCategory.UNEXPECTED;
  }

  format(report: ErrorReport): string {
    const lines = [`${report.title}: ${report.message}`];
    if (report.suggestion) lines.push(report.suggestion);
    if (this.verbose && report.originalError instanceof Error && report.originalError.stack) {
      lines.push(report.originalError.stack);
    }
    return `\n${lines.join('\n')}\n`;
  }
}
