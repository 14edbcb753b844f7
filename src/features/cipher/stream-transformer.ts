import { open, stat } from "node:fs/promises";
import type { FileHandle } from "node:fs/promises";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { SubstitutionTable, TextTransformResult, TransformResult } from "./types.js";
import { InputNotFoundError, OutputUnavailableError, errnoCode } from "../../utils/errors.js";

// Text is handled as latin1 so that one string code unit is exactly one byte:
// bytes outside the table (UTF-8 continuation bytes included) round-trip untouched.
export const BYTE_ENCODING = "latin1";

export const LINE_TERMINATOR = "\n";

export function transformLine(line: string, table: SubstitutionTable): string {
  let out = "";
  for (let i = 0; i < line.length; i++) {
    const byte = line.charCodeAt(i);
    const mapped = table.get(byte);
    out += mapped === undefined ? line[i] : String.fromCharCode(mapped);
  }
  return out;
}

/** Splits on \n or \r\n; a trailing terminator does not yield an empty last line. */
export function splitLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

/**
 * Streaming counterpart of {@link splitLines}. Only \n (optionally preceded
 * by \r) ends a line; a lone \r is line content.
 */
export async function* readLines(chunks: AsyncIterable<string>): AsyncGenerator<string> {
  let carry = "";
  for await (const chunk of chunks) {
    const segments = (carry + chunk).split("\n");
    carry = segments.pop() ?? "";
    for (const segment of segments) {
      yield segment.endsWith("\r") ? segment.slice(0, -1) : segment;
    }
  }
  if (carry) yield carry;
}

/** In-memory form of {@link transformFile}. Every output line ends with \n. */
export function transformText(text: string, table: SubstitutionTable): TextTransformResult {
  let bytesProcessed = 0;
  let output = "";
  for (const line of splitLines(text)) {
    bytesProcessed += line.length;
    output += transformLine(line, table) + LINE_TERMINATOR;
  }
  return { bytesProcessed, output };
}

/**
 * Streams `lines` through the table one line at a time. `counter.bytes` is
 * incremented as lines are consumed.
 */
export async function* transformLines(
  lines: AsyncIterable<string>,
  table: SubstitutionTable,
  counter: { bytes: number },
): AsyncGenerator<string> {
  for await (const line of lines) {
    counter.bytes += line.length;
    yield transformLine(line, table) + LINE_TERMINATOR;
  }
}

async function openInput(path: string): Promise<FileHandle> {
  try {
    return await open(path, "r");
  } catch (err) {
    if (errnoCode(err) === "ENOENT") throw new InputNotFoundError(path, { cause: err });
    throw err;
  }
}

async function openOutput(path: string): Promise<FileHandle> {
  try {
    return await open(path, "w");
  } catch (err) {
    throw new OutputUnavailableError(path, { cause: err });
  }
}

/** True when `path` already names the same file (by device and inode) as `input`. */
async function sameFile(input: { dev: number; ino: number }, path: string): Promise<boolean> {
  try {
    const target = await stat(path);
    return target.dev === input.dev && target.ino === input.ino;
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return false;
    throw new OutputUnavailableError(path, { cause: err });
  }
}

/**
 * Reads `inputPath` line by line, maps every byte through `table` and
 * (over)writes `outputPath`. Both files are opened before any byte is read,
 * and both handles are released on every path out.
 */
export async function transformFile(
  inputPath: string,
  outputPath: string,
  table: SubstitutionTable,
): Promise<TransformResult> {
  const input = await openInput(inputPath);
  let output: FileHandle | undefined;
  try {
    const info = await input.stat();
    if (!info.isFile()) {
      throw new InputNotFoundError(inputPath, { reason: "Input is not a regular file" });
    }
    // Opening the input (or a link to it) for writing would truncate it before it is read.
    if (await sameFile(info, outputPath)) {
      throw new OutputUnavailableError(outputPath);
    }
    output = await openOutput(outputPath);

    const source = input.createReadStream({ encoding: BYTE_ENCODING });
    const counter = { bytes: 0 };
    try {
      await pipeline(
        Readable.from(transformLines(readLines(source), table, counter)),
        output.createWriteStream({ encoding: BYTE_ENCODING }),
      );
    } finally {
      source.destroy();
    }
    return { bytesProcessed: counter.bytes };
  } finally {
    await output?.close();
    await input.close();
  }
}
