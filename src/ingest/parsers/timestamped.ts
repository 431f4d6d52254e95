import { isValid, parse } from "date-fns";
import { createLogRecord, type LogLevel, type LogRecord } from "../record.js";
import type { LogLineParser, RecordFactory } from "./index.js";

/**
 * Lines of the form `2024-01-01 10:00:00,000 message` (comma or dot before
 * the milliseconds), as written by log4j-style layouts.
 */
const TIMESTAMP_PREFIX = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}[,.]\d{3}/;
const STRUCTURED_LINE = /^(\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}[,.]\d{3})\s+(.*)/;
const TIMESTAMP_FORMAT = "yyyy-MM-dd HH:mm:ss.SSS";

// "0 errors" / "0 warnings" summaries; the 0 must be a standalone token
const ZERO_COUNT = /\b0 (?:error|warning)s?/gi;

/**
 * Quick predicate: does the line start with a timestamp?
 */
export function isLogLine(line: string): boolean {
  return TIMESTAMP_PREFIX.test(line);
}

/**
 * Parses the timestamp prefix as local time, falling back to "now" when the
 * digits do not form a real date (month 13, Feb 30, ...).
 */
export function parseTimestamp(value: string): Date {
  const parsed = parse(value.replace(",", "."), TIMESTAMP_FORMAT, new Date());
  return isValid(parsed) ? parsed : new Date();
}

/**
 * Severity from free text. "error" outranks "warning"; zero-count summaries
 * are removed first so "0 errors and 0 warnings" stays INFO.
 */
export function classifyLevel(text: string): LogLevel {
  const scanned = text.replace(ZERO_COUNT, " ").toLowerCase();
  if (scanned.includes("error")) {
    return "ERROR";
  }
  if (scanned.includes("warning")) {
    return "WARNING";
  }
  return "INFO";
}

/**
 * Parses a timestamped line into a record taken from `acquire`.
 * Returns null for blank lines and for lines that are not log lines;
 * never throws.
 */
export function parseTimestampedLine(
  line: string,
  lineNumber: number,
  sourceFile: string,
  acquire: RecordFactory = createLogRecord,
): LogRecord | null {
  if (!line.trim()) {
    return null;
  }
  if (!isLogLine(line)) {
    return null;
  }
  const match = STRUCTURED_LINE.exec(line);
  if (!match) {
    return null;
  }

  const timestamp = match[1] ?? "";
  const rest = match[2] ?? "";

  const record = acquire();
  record.timestamp = parseTimestamp(timestamp);
  record.level = classifyLevel(rest);
  record.message = rest;
  record.sourceFile = sourceFile;
  record.lineNumber = lineNumber;
  record.rawLine = line;
  return record;
}

/**
 * Parser for timestamp-prefixed text logs.
 */
export const timestampedParser: LogLineParser = {
  format: "timestamped",
  isLogLine,
  parseLine: parseTimestampedLine,
};
