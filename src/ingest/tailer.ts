import type { FSWatcher } from "chokidar";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { DEFAULT_FILE_PATTERN, findMatchingFiles, matchesPattern } from "./file-discovery.js";
import { parseLines, timestampedParser, type LogLineParser, type RecordFactory } from "./parsers/index.js";
import type { LogRecord } from "./record.js";
import { RecordPool } from "./record-pool.js";
import { DEFAULT_MAX_BYTES, readLogSlice } from "./tail-reader.js";
import { createWatcher, type FileChangeEvent } from "./watcher.js";

const log = createSubsystemLogger("ingest/tailer");

const INGEST_DEBOUNCE_MS = 500;

/**
 * Receives newly parsed records. The callee owns them and releases them to
 * the pool when done.
 */
export type RecordsCallback = (records: LogRecord[], filePath: string) => void;

/**
 * Options for the log tailer.
 */
export type TailerOptions = {
  /** Directory to watch (recursively) */
  directory: string;
  /** File name pattern (default "*.log") */
  pattern?: string;
  onRecords: RecordsCallback;
  pool?: RecordPool;
  parser?: LogLineParser;
  /** Upper bound on bytes read per slice */
  maxBytes?: number;
  /** Delay before pending change events are processed */
  debounceMs?: number;
  /** Passed to the watcher's write-finish detection */
  stabilityThresholdMs?: number;
};

type FileCursor = {
  byteOffset: number;
  linesRead: number;
};

/**
 * Follows log files as they grow. Keeps a byte cursor and line count per
 * file so only appended complete lines are parsed, with line numbers that
 * continue where the previous read stopped.
 */
export class LogTailer {
  readonly pool: RecordPool;
  private readonly directory: string;
  private readonly pattern: string;
  private readonly onRecords: RecordsCallback;
  private readonly parser: LogLineParser;
  private readonly maxBytes: number;
  private readonly debounceMs: number;
  private readonly stabilityThresholdMs: number | undefined;
  private readonly acquire: RecordFactory;
  private readonly cursors = new Map<string, FileCursor>();
  private watcher: FSWatcher | null = null;
  private pendingFiles = new Set<string>();
  private ingestTimer: NodeJS.Timeout | null = null;
  private processing = false;
  private closed = false;
  private totalRecords = 0;

  constructor(options: TailerOptions) {
    this.directory = options.directory;
    this.pattern = options.pattern ?? DEFAULT_FILE_PATTERN;
    this.onRecords = options.onRecords;
    this.pool = options.pool ?? new RecordPool();
    this.parser = options.parser ?? timestampedParser;
    this.maxBytes = options.maxBytes ?? DEFAULT_MAX_BYTES;
    this.debounceMs = options.debounceMs ?? INGEST_DEBOUNCE_MS;
    this.stabilityThresholdMs = options.stabilityThresholdMs;
    this.acquire = () => this.pool.get();
  }

  /**
   * Ingests what is already on disk, then watches for appends.
   */
  async start(): Promise<void> {
    if (this.closed) {
      throw new Error("Tailer is closed");
    }
    if (this.watcher) {
      log.warn("Watcher already running");
      return;
    }

    log.info("Starting log tailer", { directory: this.directory, pattern: this.pattern });

    await this.ingestExisting();

    this.watcher = createWatcher(this.directory, this.pattern, (event) => this.onFileChange(event), {
      emitExisting: false,
      stabilityThreshold: this.stabilityThresholdMs,
    });
  }

  /**
   * Stops watching for file changes. Cursors are kept, so a later start()
   * resumes where this one stopped; pending change events are dropped.
   */
  async stop(): Promise<void> {
    if (this.ingestTimer) {
      clearTimeout(this.ingestTimer);
      this.ingestTimer = null;
    }
    this.pendingFiles.clear();

    const watcher = this.watcher;
    if (watcher) {
      this.watcher = null;
      await watcher.close();
      log.info("Log tailer stopped");
    }
  }

  /**
   * Ingests all matching files once (no watching).
   */
  async ingestExisting(): Promise<{ files: number; records: number; failed: number }> {
    if (this.closed) {
      throw new Error("Tailer is closed");
    }
    const files = await findMatchingFiles(this.directory, this.pattern);
    let records = 0;
    let failed = 0;

    for (const file of files) {
      try {
        records += await this.ingestFile(file);
      } catch (err) {
        failed++;
        log.error(`Failed to ingest ${file}: ${String(err)}`);
      }
    }

    log.info("Initial ingestion complete", { files: files.length, records, failed });
    return { files: files.length, records, failed };
  }

  /**
   * Parses the complete lines appended since the last read of this file and
   * hands the records to onRecords. Returns the number of records produced.
   */
  async ingestFile(filePath: string): Promise<number> {
    if (this.closed) {
      return 0;
    }
    let cursor = this.cursors.get(filePath) ?? { byteOffset: 0, linesRead: 0 };
    let produced = 0;

    for (;;) {
      const slice = await readLogSlice({
        file: filePath,
        cursor: cursor.byteOffset,
        maxBytes: this.maxBytes,
      });

      if (slice.reset) {
        log.info(`File rotation detected for ${filePath}, re-reading from start`);
        cursor = { byteOffset: 0, linesRead: 0 };
      }
      if (slice.lines.length === 0) {
        cursor = { byteOffset: slice.cursor, linesRead: cursor.linesRead };
        this.cursors.set(filePath, cursor);
        break;
      }

      const records = parseLines(
        this.parser,
        slice.lines,
        filePath,
        cursor.linesRead + 1,
        this.acquire,
      );
      cursor = {
        byteOffset: slice.cursor,
        // A split line continues on the next slice and keeps its number
        linesRead: cursor.linesRead + slice.lines.length - (slice.splitLine ? 1 : 0),
      };
      // Saved before delivery so a failing callback never replays this slice
      this.cursors.set(filePath, cursor);

      if (records.length > 0) {
        produced += records.length;
        this.totalRecords += records.length;
        this.onRecords(records, filePath);
      }
      if (!slice.hasMore) {
        break;
      }
    }

    log.debug(`Ingested ${produced} records from ${filePath}`, {
      byteOffset: cursor.byteOffset,
      linesRead: cursor.linesRead,
    });
    return produced;
  }

  /**
   * Handles file change events from the watcher.
   */
  private onFileChange(event: FileChangeEvent): void {
    if (event.eventType === "unlink") {
      // A recreated file starts over
      this.cursors.delete(event.path);
      this.pendingFiles.delete(event.path);
      return;
    }

    this.pendingFiles.add(event.path);
    this.scheduleIngest();
  }

  /**
   * Schedules a debounced ingestion of pending files.
   */
  private scheduleIngest(): void {
    if (this.ingestTimer) {
      return;
    }

    this.ingestTimer = setTimeout(() => {
      this.ingestTimer = null;
      void this.processPendingFiles();
    }, this.debounceMs);
  }

  /**
   * Processes all pending file changes.
   */
  private async processPendingFiles(): Promise<void> {
    if (this.closed || this.processing) {
      return;
    }
    this.processing = true;

    try {
      const files = Array.from(this.pendingFiles);
      this.pendingFiles.clear();

      for (const filePath of files) {
        if (this.closed) {
          break;
        }
        if (!matchesPattern(filePath, this.pattern)) {
          continue;
        }

        try {
          await this.ingestFile(filePath);
        } catch (err) {
          log.error(`Failed to ingest ${filePath}: ${String(err)}`);
        }
      }
    } finally {
      this.processing = false;
      // If new files arrived while processing, schedule another run
      if (this.pendingFiles.size > 0 && !this.closed && this.watcher) {
        this.scheduleIngest();
      }
    }
  }

  /**
   * Gets tailing status.
   */
  status(): {
    directory: string;
    pattern: string;
    watching: boolean;
    trackedFiles: number;
    totalRecords: number;
  } {
    return {
      directory: this.directory,
      pattern: this.pattern,
      watching: this.watcher !== null,
      trackedFiles: this.cursors.size,
      totalRecords: this.totalRecords,
    };
  }

  /**
   * Stops watching and refuses further ingestion. The pool is left alone,
   * since records handed out may still be in use.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    await this.stop();
    log.info("Log tailer closed");
  }
}

/**
 * Creates a log tailer.
 */
export function createTailer(options: TailerOptions): LogTailer {
  return new LogTailer(options);
}
