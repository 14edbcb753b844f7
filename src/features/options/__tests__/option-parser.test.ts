import { describe, it, expect } from 'vitest';
import { defaultOutputPath, parseCombinedFlags, parseCommandLine, parseShiftAmount } from '../option-parser.js';
import type { ParseOutcome } from '../option-parser.js';
import { IntegerParseError, OptionParseError } from '../../../utils/errors.js';
import type { CipherOptions } from '../../../utils/validation.js';

const base = { shiftDigits: false, shiftPunctuation: false, showLog: false };

function runOptions(outcome: ParseOutcome): CipherOptions {
  if (outcome.kind !== 'run') throw new Error(`expected run, got ${outcome.kind}`);
  return outcome.options;
}

function parseError(outcome: ParseOutcome): OptionParseError | IntegerParseError {
  if (outcome.kind !== 'error') throw new Error(`expected error, got ${outcome.kind}`);
  return outcome.error;
}

describe('parseCommandLine', () => {
  it('requests usage when only the program name is given', () => {
    expect(parseCommandLine(['/usr/local/bin/shift-encipher'], 'encipher')).toEqual({
      kind: 'usage',
      program: { raw: '/usr/local/bin/shift-encipher', stripped: 'shift-encipher' },
    });
  });

  it('fills defaults for a minimal run', () => {
    expect(runOptions(parseCommandLine(['prog', '-i', 'notes.txt'], 'encipher'))).toEqual({
      direction: 'encipher',
      programName: 'prog',
      programNameStripped: 'prog',
      inputPath: 'notes.txt',
      outputPath: 'notes.txt.ciph',
      useDefaultOutputName: true,
      shiftAmount: 5,
      shiftDigits: false,
      shiftPunctuation: false,
      showLog: false,
    });
  });

  it('uses the decipher suffix by default', () => {
    expect(runOptions(parseCommandLine(['prog', '--ifile', 'a.ciph'], 'decipher')).outputPath).toBe('a.ciph.dec');
    expect(defaultOutputPath('x', 'encipher')).toBe('x.ciph');
  });

  it('reads explicit output, negative shift and combined flags', () => {
    const opts = runOptions(parseCommandLine(['prog', '-i', 'a', '-o', 'b', '-s', '-3', '-np'], 'encipher'));
    expect(opts).toMatchObject({
      outputPath: 'b',
      useDefaultOutputName: false,
      shiftAmount: -3,
      shiftDigits: true,
      shiftPunctuation: true,
      showLog: false,
    });
  });

  it('accepts the long toggles', () => {
    const opts = runOptions(
      parseCommandLine(['prog', '--shift-nums', '--shift-puncts', '--show-log', '--shift-amount', '+7', '--ofile', 'o', '-i', 'i'], 'encipher'),
    );
    expect(opts).toMatchObject({ shiftDigits: true, shiftPunctuation: true, showLog: true, shiftAmount: 7 });
    expect(runOptions(parseCommandLine(['prog', '--shift-numbers', '-i', 'i'], 'decipher')).shiftDigits).toBe(true);
    expect(runOptions(parseCommandLine(['prog', '--shift-all', '-i', 'i'], 'decipher'))).toMatchObject({
      shiftDigits: true,
      shiftPunctuation: true,
    });
  });

  it('expands -apl into all three toggles', () => {
    expect(runOptions(parseCommandLine(['prog', '-apl', '-i', 'i'], 'encipher'))).toMatchObject({
      shiftDigits: true,
      shiftPunctuation: true,
      showLog: true,
    });
  });

  it('lets later value options override earlier ones', () => {
    const opts = runOptions(parseCommandLine(['prog', '-i', 'first', '-s', '1', '-i', 'second', '-s', '2'], 'encipher'));
    expect(opts.inputPath).toBe('second');
    expect(opts.shiftAmount).toBe(2);
  });

  it('stops at help, ignoring later tokens', () => {
    expect(parseCommandLine(['prog', '--help', '--bogus'], 'encipher').kind).toBe('help');
    expect(parseCommandLine(['prog', '-h'], 'encipher').kind).toBe('help');
    expect(parseCommandLine(['prog', '-ah', '-zz'], 'encipher').kind).toBe('help');
  });

  it('rejects an unknown long option', () => {
    const error = parseError(parseCommandLine(['prog', '--bogus', '-i', 'i'], 'encipher'));
    expect(error).toBeInstanceOf(OptionParseError);
    expect(error.message).toBe('Invalid argument (--bogus) used.');
    expect(error.token).toBe('--bogus');
  });

  it('rejects bare words, a lone dash and inner dashes', () => {
    for (const token of ['file.txt', '-', '-n-p', '---']) {
      expect(parseError(parseCommandLine(['prog', token], 'encipher')).message).toBe(`Invalid argument (${token}) used.`);
    }
  });

  it('rejects an unknown character in a combined token', () => {
    const error = parseError(parseCommandLine(['prog', '-n', '-pz', '-i', 'i'], 'encipher'));
    expect(error.message).toBe('Invalid single-character option (z) within (-pz).');
    expect(error.token).toBe('-pz');
  });

  it('reports a missing value', () => {
    expect(parseError(parseCommandLine(['prog', '-i'], 'encipher')).message).toBe('Missing value after option (-i).');
    expect(parseError(parseCommandLine(['prog', '-i', 'a', '--shift-amount'], 'encipher')).token).toBe('--shift-amount');
  });

  it('requires an input file', () => {
    const error = parseError(parseCommandLine(['prog', '-n'], 'encipher'));
    expect(error.message).toBe('Missing required option (-i, --ifile).');
  });

  it('rejects an empty input path', () => {
    const error = parseError(parseCommandLine(['prog', '-i', ''], 'encipher'));
    expect(error.message).toBe('Invalid options: inputPath: Input file is required.');
  });

  it('rejects a malformed shift amount', () => {
    const error = parseError(parseCommandLine(['prog', '-s', 'abc', '-i', 'i'], 'encipher'));
    expect(error).toBeInstanceOf(IntegerParseError);
    expect(error.message).toBe('Invalid shift amount (abc): not a valid signed integer.');
  });
});

describe('parseShiftAmount', () => {
  it('accepts signed 32-bit integers', () => {
    expect(parseShiftAmount('-80')).toBe(-80);
    expect(parseShiftAmount('2147483647')).toBe(2147483647);
    expect(parseShiftAmount('-2147483648')).toBe(-2147483648);
  });

  it('rejects partial numbers and out-of-range values', () => {
    expect(parseShiftAmount('12abc')).toBeInstanceOf(IntegerParseError);
    expect(parseShiftAmount('1.5')).toBeInstanceOf(IntegerParseError);
    expect(parseShiftAmount('')).toBeInstanceOf(IntegerParseError);
    const error = parseShiftAmount('2147483648');
    expect(error).toBeInstanceOf(IntegerParseError);
    expect(error instanceof IntegerParseError && error.message).toBe(
      'Invalid shift amount (2147483648): out of range for a signed 32-bit integer.',
    );
  });
});

describe('parseCombinedFlags', () => {
  it('keeps flags set before h', () => {
    expect(parseCombinedFlags('-ah', base)).toEqual({
      kind: 'help',
      flags: { shiftDigits: true, shiftPunctuation: true, showLog: false },
    });
  });

  it('does not touch earlier flags when the token is rejected', () => {
    const current = { shiftDigits: true, shiftPunctuation: false, showLog: true };
    const result = parseCombinedFlags('-px', current);
    expect(result.kind).toBe('error');
    expect(current).toEqual({ shiftDigits: true, shiftPunctuation: false, showLog: true });
  });

  it('merges into the existing flags', () => {
    expect(parseCombinedFlags('-l', { ...base, shiftDigits: true })).toEqual({
      kind: 'ok',
      flags: { shiftDigits: true, shiftPunctuation: false, showLog: true },
    });
  });
});
