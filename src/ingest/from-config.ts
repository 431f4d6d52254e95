import type { LogsiftConfig } from "../config/config.js";
import { setLogLevel } from "../logging/subsystem.js";
import { LogIngestionPipeline } from "./pipeline.js";
import { RecordPool } from "./record-pool.js";
import { LogTailer, type RecordsCallback } from "./tailer.js";

/**
 * Builds a pipeline from loaded settings. Pass a pool to share it with other
 * pipelines; otherwise one sized by `pool.maxCapacity` is created.
 */
export function createPipelineFromConfig(
  config: LogsiftConfig,
  pool?: RecordPool,
): LogIngestionPipeline {
  setLogLevel(config.logLevel);
  return new LogIngestionPipeline({
    pool: pool ?? new RecordPool({ maxCapacity: config.pool.maxCapacity }),
    progressInterval: config.pipeline.progressInterval,
  });
}

/**
 * Builds a tailer for a directory from loaded settings.
 */
export function createTailerFromConfig(
  config: LogsiftConfig,
  directory: string,
  onRecords: RecordsCallback,
  pool?: RecordPool,
): LogTailer {
  setLogLevel(config.logLevel);
  return new LogTailer({
    directory,
    onRecords,
    pattern: config.reader.pattern,
    pool: pool ?? new RecordPool({ maxCapacity: config.pool.maxCapacity }),
    maxBytes: config.tail.maxBytes,
    debounceMs: config.tail.debounceMs,
    stabilityThresholdMs: config.tail.stabilityThresholdMs,
  });
}
