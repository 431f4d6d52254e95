import fs from "node:fs/promises";

export const DEFAULT_MAX_BYTES = 1_000_000;

/**
 * Result from reading a log slice.
 */
export type TailReadResult = {
  /** Byte offset to resume from: just past the last complete line returned */
  cursor: number;
  /** Current file size */
  size: number;
  /** Complete lines read, without terminators */
  lines: string[];
  /** Whether more bytes remain beyond this slice's maxBytes window */
  hasMore: boolean;
  /** Whether a file rotation was detected (cursor > file size) */
  reset: boolean;
  /** Whether a line longer than maxBytes was cut at the window edge */
  splitLine: boolean;
};

/**
 * Reads complete lines appended after a byte cursor.
 *
 * A trailing line with no newline yet is left for the next call, so a
 * writer caught mid-line is never parsed twice. When the cursor is past the
 * end of the file the file was rotated or truncated and reading restarts
 * at 0.
 */
export async function readLogSlice(params: {
  file: string;
  cursor?: number;
  maxBytes?: number;
}): Promise<TailReadResult> {
  const maxBytes = Math.max(1, params.maxBytes ?? DEFAULT_MAX_BYTES);

  const stat = await fs.stat(params.file).catch(() => null);
  if (!stat) {
    return { cursor: 0, size: 0, lines: [], hasMore: false, reset: false, splitLine: false };
  }

  const size = stat.size;
  let start =
    typeof params.cursor === "number" && Number.isFinite(params.cursor)
      ? Math.max(0, Math.floor(params.cursor))
      : 0;
  let reset = false;

  if (start > size) {
    // File was rotated or truncated, start from beginning
    reset = true;
    start = 0;
  }

  if (size === 0 || start >= size) {
    return { cursor: start, size, lines: [], hasMore: false, reset, splitLine: false };
  }

  const length = Math.min(size - start, maxBytes);
  const handle = await fs.open(params.file, "r");
  try {
    const buffer = Buffer.alloc(length);
    const { bytesRead } = await handle.read(buffer, 0, length, start);
    const data = buffer.subarray(0, bytesRead);
    const hasMore = start + bytesRead < size;

    const lastNewline = data.lastIndexOf(0x0a);
    if (lastNewline === -1) {
      if (bytesRead < maxBytes) {
        // Incomplete last line, wait for its terminator
        return { cursor: start, size, lines: [], hasMore: false, reset, splitLine: false };
      }
      // A single line longer than the window: hand it over in pieces
      const cut = utf8Boundary(data);
      return {
        cursor: start + cut,
        size,
        lines: [stripLine(data.toString("utf8", 0, cut), start === 0)],
        hasMore: start + cut < size,
        reset,
        splitLine: true,
      };
    }

    const text = data.toString("utf8", 0, lastNewline);
    const lines = text.split("\n").map((line, index) => stripLine(line, start === 0 && index === 0));

    return {
      cursor: start + lastNewline + 1,
      size,
      lines,
      hasMore,
      reset,
      splitLine: false,
    };
  } finally {
    await handle.close();
  }
}

function stripLine(line: string, atFileStart: boolean): string {
  let result = line.endsWith("\r") ? line.slice(0, -1) : line;
  if (atFileStart && result.startsWith("\uFEFF")) {
    result = result.slice(1);
  }
  return result;
}

/**
 * Length of the longest prefix of `data` that does not end inside a UTF-8
 * sequence. Falls back to the whole buffer when the window cannot hold a
 * single character.
 */
function utf8Boundary(data: Buffer): number {
  let lead = data.length - 1;
  // Continuation bytes are 0b10xxxxxx
  while (lead > 0 && lead > data.length - 4 && ((data[lead] ?? 0) & 0xc0) === 0x80) {
    lead--;
  }
  const byte = data[lead] ?? 0;
  const expected = byte >= 0xf0 ? 4 : byte >= 0xe0 ? 3 : byte >= 0xc0 ? 2 : 1;
  if (lead + expected <= data.length) {
    return data.length;
  }
  return lead > 0 ? lead : data.length;
}
