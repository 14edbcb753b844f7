import { z } from 'zod';

export const INT32_MIN = -2147483648;
export const INT32_MAX = 2147483647;

// Whole-token decimal integer with an optional sign, within signed 32-bit range
export const ShiftAmountSchema = z
  .string()
  .regex(/^[+-]?\d+$/, 'not a valid signed integer')
  .transform(s => Number(s))
  .pipe(
    z.number()
      .int()
      .min(INT32_MIN, 'out of range for a signed 32-bit integer')
      .max(INT32_MAX, 'out of range for a signed 32-bit integer')
  );

export const DirectionSchema = z.enum(['encipher', 'decipher']);

export const CipherOptionsSchema = z.object({
  direction: DirectionSchema,
  programName: z.string(),
  programNameStripped: z.string(),
  inputPath: z.string().min(1, 'Input file is required'),
  outputPath: z.string().min(1, 'Output file is required'),
  useDefaultOutputName: z.boolean(),
  shiftAmount: z.number().int().min(INT32_MIN).max(INT32_MAX),
  shiftDigits: z.boolean(),
  shiftPunctuation: z.boolean(),
  showLog: z.boolean()
});

export type CipherOptions = z.infer<typeof CipherOptionsSchema>;

// Validation result type
export type ValidationResult<T> = {
  success: true;
  data: T;
} | {
  success: false;
  errors: z.ZodError;
};

export class DataValidator {
  static validate<Output, Input = Output>(
    schema: z.ZodType<Output, z.ZodTypeDef, Input>,
    data: unknown
  ): ValidationResult<Output> {
    const result = schema.safeParse(data);
    if (result.success) {
      return { success: true, data: result.data };
    }
    return { success: false, errors: result.error };
  }

  /** First issue message, for one-line error output. */
  static firstMessage(errors: z.ZodError): string {
    const issue = errors.errors[0];
    if (!issue) return 'validation failed';
    return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
  }
}
