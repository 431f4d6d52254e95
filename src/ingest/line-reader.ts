import { createReadStream } from "node:fs";
import fs from "node:fs/promises";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { InvalidArgumentError, isIngestError, toFileError } from "./errors.js";
import { DEFAULT_FILE_PATTERN, findMatchingFiles } from "./file-discovery.js";

const log = createSubsystemLogger("ingest/line-reader");

const DEFAULT_HIGH_WATER_MARK = 64 * 1024;
const UTF8_BOM = Buffer.from([0xef, 0xbb, 0xbf]);

/**
 * One line plus its position in the file.
 */
export type LineChunk = {
  line: string;
  /** Byte offset of the first byte of the line */
  byteOffset: number;
  /**
   * Bytes the line occupies in the file up to its \n. A stripped \r or BOM
   * is counted, so offset + length + 1 is where the next line starts.
   */
  byteLength: number;
};

/**
 * A line tagged with the file it came from.
 */
export type SourcedLine = {
  filePath: string;
  line: string;
};

export type LineReaderOptions = {
  /** Read buffer size in bytes. Default: 64KB. */
  highWaterMark?: number;
};

/**
 * Checks the path up front so a missing file fails before any line is read.
 */
export async function assertReadableFile(filePath: string): Promise<number> {
  if (!filePath) {
    throw InvalidArgumentError.emptyPath("filePath");
  }
  const stat = await fs.stat(filePath).catch((err: unknown) => {
    throw toFileError(filePath, err);
  });
  if (!stat.isFile()) {
    throw new InvalidArgumentError(`Not a file: ${filePath}`);
  }
  return stat.size;
}

/**
 * Streams a file line by line without holding more than one line (plus the
 * current read buffer) in memory.
 *
 * - Splits on \n; a single trailing \r is stripped (CRLF safe).
 * - A leading UTF-8 BOM is dropped.
 * - A last line without a terminator is still yielded; a trailing
 *   terminator does not produce an extra empty line.
 *
 * The underlying stream is destroyed when the sequence ends, fails, or the
 * consumer stops early.
 */
export async function* streamLines(
  filePath: string,
  options: LineReaderOptions = {},
): AsyncGenerator<LineChunk> {
  await assertReadableFile(filePath);

  const stream = createReadStream(filePath, {
    highWaterMark: options.highWaterMark ?? DEFAULT_HIGH_WATER_MARK,
  });

  let pending: Buffer[] = [];
  let pendingBytes = 0;
  let lineStart = 0;
  let firstLine = true;

  const takeLine = (): LineChunk => {
    let buffer = pending.length === 1 && pending[0] ? pending[0] : Buffer.concat(pending);
    if (buffer.length > 0 && buffer[buffer.length - 1] === 0x0d) {
      buffer = buffer.subarray(0, buffer.length - 1);
    }
    if (firstLine && buffer.subarray(0, 3).equals(UTF8_BOM)) {
      buffer = buffer.subarray(3);
    }
    const chunk: LineChunk = {
      line: buffer.toString("utf8"),
      byteOffset: lineStart,
      byteLength: pendingBytes,
    };
    firstLine = false;
    pending = [];
    pendingBytes = 0;
    return chunk;
  };

  try {
    for await (const raw of stream) {
      const data: Buffer = Buffer.isBuffer(raw) ? raw : Buffer.from(String(raw));
      let start = 0;
      let newline = data.indexOf(0x0a, start);

      while (newline !== -1) {
        pending.push(data.subarray(start, newline));
        pendingBytes += newline - start;
        const chunk = takeLine();
        // +1 for the newline itself
        lineStart = chunk.byteOffset + chunk.byteLength + 1;
        yield chunk;
        start = newline + 1;
        newline = data.indexOf(0x0a, start);
      }

      if (start < data.length) {
        pending.push(Buffer.from(data.subarray(start)));
        pendingBytes += data.length - start;
      }
    }

    if (pendingBytes > 0) {
      yield takeLine();
    }
  } catch (err) {
    if (isIngestError(err)) {
      throw err;
    }
    log.error(`Read failed for ${filePath}: ${String(err)}`);
    throw toFileError(filePath, err);
  } finally {
    stream.destroy();
  }
}

/**
 * Lazily yields the lines of a single file, in order.
 */
export async function* loadLines(
  filePath: string,
  options: LineReaderOptions = {},
): AsyncGenerator<string> {
  for await (const chunk of streamLines(filePath, options)) {
    yield chunk.line;
  }
}

/**
 * Concatenates the lines of several files in the given order, tagging each
 * line with its file. Each file is opened only when the previous one is done.
 */
export async function* loadLinesFromFiles(
  filePaths: Iterable<string>,
  options: LineReaderOptions = {},
): AsyncGenerator<SourcedLine> {
  for (const filePath of filePaths) {
    log.debug(`Reading ${filePath}`);
    for await (const chunk of streamLines(filePath, options)) {
      yield { filePath, line: chunk.line };
    }
  }
}

/**
 * Lines of every file under a directory (recursively) whose name matches
 * the pattern, file by file in path order.
 */
export async function* loadLinesFromDirectory(
  directoryPath: string,
  pattern: string = DEFAULT_FILE_PATTERN,
  options: LineReaderOptions = {},
): AsyncGenerator<SourcedLine> {
  const files = await findMatchingFiles(directoryPath, pattern);
  yield* loadLinesFromFiles(files, options);
}
