import type { LogRecord } from "../record.js";

export {
  classifyLevel,
  isLogLine,
  parseTimestamp,
  parseTimestampedLine,
  timestampedParser,
} from "./timestamped.js";

/**
 * Supplies the record a parser fills in; the pipeline passes the pool's get().
 */
export type RecordFactory = () => LogRecord;

/**
 * Log line parser interface.
 */
export type LogLineParser = {
  format: string;
  isLogLine: (line: string) => boolean;
  parseLine: (
    line: string,
    lineNumber: number,
    sourceFile: string,
    acquire?: RecordFactory,
  ) => LogRecord | null;
};

/**
 * Parses consecutive lines numbered from `startLine`.
 * Lines that do not produce a record are skipped but still counted.
 */
export function parseLines(
  parser: LogLineParser,
  lines: string[],
  sourceFile: string,
  startLine = 1,
  acquire?: RecordFactory,
): LogRecord[] {
  const records: LogRecord[] = [];
  let lineNumber = startLine;
  for (const line of lines) {
    const record = parser.parseLine(line, lineNumber, sourceFile, acquire);
    if (record) {
      records.push(record);
    }
    lineNumber++;
  }
  return records;
}
