export type LogLevel = "INFO" | "WARNING" | "ERROR";

export const LOG_LEVELS: readonly LogLevel[] = ["INFO", "WARNING", "ERROR"];

/**
 * A parsed log line. Records are mutable so the pool can recycle them;
 * whoever receives one owns it until it is released back to the pool.
 */
export type LogRecord = {
  timestamp: Date;
  level: LogLevel;
  /** Text after the timestamp prefix */
  message: string;
  sourceFile: string;
  /** 1-based line within sourceFile; 0 while idle in the pool */
  lineNumber: number;
  rawLine: string;
  // Filled in by downstream consumers
  correlationId?: string;
  errorType?: string;
  stackTrace?: string;
  recommendation?: string;
};

/**
 * Allocates a record in its default state.
 */
export function createLogRecord(): LogRecord {
  return {
    timestamp: new Date(),
    level: "INFO",
    message: "",
    sourceFile: "",
    lineNumber: 0,
    rawLine: "",
    correlationId: undefined,
    errorType: undefined,
    stackTrace: undefined,
    recommendation: undefined,
  };
}

/**
 * Puts every mutable field back to its default so nothing leaks into the
 * next owner.
 */
export function resetLogRecord(record: LogRecord): void {
  record.timestamp = new Date();
  record.level = "INFO";
  record.message = "";
  record.sourceFile = "";
  record.lineNumber = 0;
  record.rawLine = "";
  record.correlationId = undefined;
  record.errorType = undefined;
  record.stackTrace = undefined;
  record.recommendation = undefined;
}
