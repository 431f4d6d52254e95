import { createReadStream } from "node:fs";
import fs from "node:fs/promises";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { CancelledError, InvalidArgumentError, isIngestError, toFileError } from "./errors.js";
import { DEFAULT_FILE_PATTERN, findMatchingFiles } from "./file-discovery.js";
import { assertReadableFile, streamLines, type LineReaderOptions } from "./line-reader.js";
import { timestampedParser, type LogLineParser, type RecordFactory } from "./parsers/index.js";
import type { LogRecord } from "./record.js";
import { RecordPool } from "./record-pool.js";

const log = createSubsystemLogger("ingest/pipeline");

const DEFAULT_PROGRESS_INTERVAL = 1000;

export type IngestionState = "idle" | "running" | "completed" | "stopped" | "cancelled" | "failed";

/**
 * Snapshot of a parse run. Snapshots are frozen and replaced wholesale, so a
 * reader always sees one consistent state.
 */
export type IngestionProgress = Readonly<{
  filePath: string | null;
  state: IngestionState;
  /** Raw lines read, including skipped ones */
  processedLines: number;
  emittedRecords: number;
  bytesProcessed: number;
  totalBytes: number;
  percentComplete: number;
  startedAt: Date | null;
  elapsedMs: number;
}>;

const IDLE_PROGRESS: IngestionProgress = Object.freeze({
  filePath: null,
  state: "idle",
  processedLines: 0,
  emittedRecords: 0,
  bytesProcessed: 0,
  totalBytes: 0,
  percentComplete: 0,
  startedAt: null,
  elapsedMs: 0,
});

/**
 * Options for the ingestion pipeline.
 */
export type PipelineOptions = {
  /** Pool records are drawn from; shared pools are fine */
  pool?: RecordPool;
  /** Line parser (defaults to the timestamped parser) */
  parser?: LogLineParser;
  /** Publish a progress snapshot every N raw lines */
  progressInterval?: number;
  reader?: LineReaderOptions;
};

function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new CancelledError(signal.reason);
  }
}

/**
 * Reader → parser → pool. Produces pooled records lazily; the consumer owns
 * each record until it calls release().
 */
export class LogIngestionPipeline {
  readonly pool: RecordPool;
  private readonly parser: LogLineParser;
  private readonly progressInterval: number;
  private readonly readerOptions: LineReaderOptions;
  private readonly acquire: RecordFactory;
  private progress: IngestionProgress = IDLE_PROGRESS;

  constructor(options: PipelineOptions = {}) {
    this.pool = options.pool ?? new RecordPool();
    this.parser = options.parser ?? timestampedParser;
    this.progressInterval = Math.max(1, Math.floor(options.progressInterval ?? DEFAULT_PROGRESS_INTERVAL));
    this.readerOptions = options.reader ?? {};
    this.acquire = () => this.pool.get();
  }

  /**
   * Parses a file into records. Blank and non-log lines are skipped, but
   * every raw line advances the line number, so gaps are expected.
   *
   * The signal is checked before each line; once aborted the sequence ends
   * with CancelledError and no further record is produced.
   */
  async *parse(filePath: string, signal?: AbortSignal): AsyncGenerator<LogRecord> {
    if (!filePath) {
      throw InvalidArgumentError.emptyPath("filePath");
    }
    const totalBytes = await assertReadableFile(filePath);
    throwIfCancelled(signal);

    const startedAt = new Date();
    let processedLines = 0;
    let emittedRecords = 0;
    let bytesProcessed = 0;
    let finalState: IngestionState = "stopped";

    const publish = (state: IngestionState): void => {
      const done = state === "completed";
      this.progress = Object.freeze({
        filePath,
        state,
        processedLines,
        emittedRecords,
        bytesProcessed,
        totalBytes,
        percentComplete: done ? 100 : totalBytes > 0 ? (bytesProcessed / totalBytes) * 100 : 0,
        startedAt,
        elapsedMs: Date.now() - startedAt.getTime(),
      });
    };

    log.debug(`Parsing ${filePath}`, { totalBytes });
    publish("running");

    try {
      for await (const chunk of streamLines(filePath, this.readerOptions)) {
        throwIfCancelled(signal);

        processedLines++;
        bytesProcessed = Math.min(totalBytes, chunk.byteOffset + chunk.byteLength + 1);
        const record = this.parser.parseLine(chunk.line, processedLines, filePath, this.acquire);

        if (processedLines % this.progressInterval === 0) {
          publish("running");
        }
        if (record) {
          emittedRecords++;
          yield record;
        }
      }
      bytesProcessed = totalBytes;
      finalState = "completed";
    } catch (err) {
      finalState = isIngestError(err, "CANCELLED") ? "cancelled" : "failed";
      throw err;
    } finally {
      publish(finalState);
      log.debug(`Finished ${filePath}`, { state: finalState, processedLines, emittedRecords });
    }
  }

  /**
   * Parses several files in order; line numbers restart at 1 for each file.
   */
  async *parseFiles(filePaths: Iterable<string>, signal?: AbortSignal): AsyncGenerator<LogRecord> {
    for (const filePath of filePaths) {
      yield* this.parse(filePath, signal);
    }
  }

  /**
   * Parses every matching file under a directory (recursively).
   */
  async *parseDirectory(
    directoryPath: string,
    pattern: string = DEFAULT_FILE_PATTERN,
    signal?: AbortSignal,
  ): AsyncGenerator<LogRecord> {
    const files = await findMatchingFiles(directoryPath, pattern);
    log.info(`Parsing ${files.length} files from ${directoryPath}`, { pattern });
    yield* this.parseFiles(files, signal);
  }

  /**
   * Counts lines the same way the reader splits them, for progress-bar
   * scaling. Missing, empty or non-file paths count as 0.
   */
  async estimateTotalLines(filePath: string): Promise<number> {
    if (!filePath) {
      return 0;
    }
    const stat = await fs.stat(filePath).catch(() => null);
    if (!stat || !stat.isFile() || stat.size === 0) {
      return 0;
    }

    const stream = createReadStream(filePath);
    let count = 0;
    let lastByte = -1;
    try {
      for await (const raw of stream) {
        const data: Buffer = Buffer.isBuffer(raw) ? raw : Buffer.from(String(raw));
        let index = data.indexOf(0x0a);
        while (index !== -1) {
          count++;
          index = data.indexOf(0x0a, index + 1);
        }
        if (data.length > 0) {
          lastByte = data[data.length - 1] ?? lastByte;
        }
      }
    } catch (err) {
      throw toFileError(filePath, err);
    } finally {
      stream.destroy();
    }

    // Final line without a terminator
    if (lastByte !== -1 && lastByte !== 0x0a) {
      count++;
    }
    return count;
  }

  /**
   * Most recently published progress snapshot.
   */
  getProgress(): IngestionProgress {
    return this.progress;
  }

  /**
   * Hands a finished record back to the pool.
   */
  release(record: LogRecord | null | undefined): void {
    this.pool.release(record);
  }
}

/**
 * Creates an ingestion pipeline.
 */
export function createPipeline(options: PipelineOptions = {}): LogIngestionPipeline {
  return new LogIngestionPipeline(options);
}
