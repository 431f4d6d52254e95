/**
 * Streaming log ingestion.
 *
 * Reads plain-text log files line by line, keeps the lines that start with a
 * `YYYY-MM-DD HH:MM:SS,mmm` timestamp, and hands them out as pooled records.
 *
 * @example
 * ```ts
 * import { createPipeline } from "./ingest/index.js";
 *
 * const pipeline = createPipeline();
 * const total = await pipeline.estimateTotalLines("/var/log/app/server.log");
 *
 * const controller = new AbortController();
 * for await (const record of pipeline.parse("/var/log/app/server.log", controller.signal)) {
 *   if (record.level === "ERROR") {
 *     console.log(`${record.lineNumber}/${total}: ${record.message}`);
 *   }
 *   // Records come from a pool; hand them back when done
 *   pipeline.release(record);
 * }
 *
 * console.log(pipeline.getProgress(), pipeline.pool.getStatistics());
 * ```
 */

// Pipeline
export {
  LogIngestionPipeline,
  createPipeline,
  type IngestionProgress,
  type IngestionState,
  type PipelineOptions,
} from "./pipeline.js";
export { createPipelineFromConfig, createTailerFromConfig } from "./from-config.js";

// Records and pooling
export { LOG_LEVELS, createLogRecord, resetLogRecord, type LogLevel, type LogRecord } from "./record.js";
export {
  DEFAULT_POOL_CAPACITY,
  RecordPool,
  createRecordPool,
  type PoolStatistics,
  type RecordPoolOptions,
} from "./record-pool.js";
export { DEFAULT_BATCH_SIZE, batchRecords, normalizeBatchSize } from "./batch.js";
export {
  DEFAULT_TOP_ERRORS,
  StatisticsCollector,
  collectStatistics,
  filterByLevel,
  filterErrors,
  type CollectOptions,
  type ErrorFrequency,
  type LevelCounts,
  type LogStatistics,
} from "./statistics.js";

// Reading
export {
  assertReadableFile,
  loadLines,
  loadLinesFromDirectory,
  loadLinesFromFiles,
  streamLines,
  type LineChunk,
  type LineReaderOptions,
  type SourcedLine,
} from "./line-reader.js";
export { DEFAULT_FILE_PATTERN, findMatchingFiles, matchesPattern } from "./file-discovery.js";

// Live tailing
export { readLogSlice, type TailReadResult } from "./tail-reader.js";
export {
  createWatcher,
  type FileChangeCallback,
  type FileChangeEvent,
  type WatcherOptions,
} from "./watcher.js";
export { LogTailer, createTailer, type RecordsCallback, type TailerOptions } from "./tailer.js";

// Parsers
export {
  classifyLevel,
  isLogLine,
  parseLines,
  parseTimestamp,
  parseTimestampedLine,
  timestampedParser,
  type LogLineParser,
  type RecordFactory,
} from "./parsers/index.js";

// Errors
export {
  CancelledError,
  ConfigError,
  FileNotFoundError,
  IngestError,
  InvalidArgumentError,
  IoFailureError,
  PoolDisposedError,
  isIngestError,
  type IngestErrorCode,
} from "./errors.js";
