import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { CancelledError, FileNotFoundError, InvalidArgumentError, PoolDisposedError } from "./errors.js";
import { LogIngestionPipeline } from "./pipeline.js";
import type { LogLevel, LogRecord } from "./record.js";
import { RecordPool } from "./record-pool.js";

const SAMPLE_LINES = [
  "2024-01-01 10:00:00,000 Starting up",
  "",
  "   ",
  "continuation of previous entry",
  "2024-01-01 10:00:01.500 Error: disk full",
  "2024-01-01 10:00:02,000 Build succeeded with 0 errors and 0 warnings",
  "2024-01-01 10:00:03,000 Warning: cache miss rate high",
];

type Seen = { lineNumber: number; level: LogLevel; message: string; sourceFile: string };

describe("LogIngestionPipeline", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "logsift-pipeline-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function writeLog(name: string, lines: string[], trailingNewline = true): Promise<string> {
    const file = path.join(dir, name);
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, lines.join("\n") + (trailingNewline ? "\n" : ""));
    return file;
  }

  // Copies the fields out, then hands the record back
  async function drain(pipeline: LogIngestionPipeline, source: AsyncIterable<LogRecord>): Promise<Seen[]> {
    const seen: Seen[] = [];
    for await (const record of source) {
      seen.push({
        lineNumber: record.lineNumber,
        level: record.level,
        message: record.message,
        sourceFile: record.sourceFile,
      });
      pipeline.release(record);
    }
    return seen;
  }

  it("yields records for log lines only, numbered by raw line", async () => {
    const file = await writeLog("app.log", SAMPLE_LINES);
    const pipeline = new LogIngestionPipeline();

    const seen: Seen[] = [];
    for await (const record of pipeline.parse(file)) {
      seen.push({
        lineNumber: record.lineNumber,
        level: record.level,
        message: record.message,
        sourceFile: record.sourceFile,
      });
      pipeline.release(record);
    }

    expect(seen).toEqual<Seen[]>([
      { lineNumber: 1, level: "INFO", message: "Starting up", sourceFile: file },
      { lineNumber: 5, level: "ERROR", message: "Error: disk full", sourceFile: file },
      {
        lineNumber: 6,
        level: "INFO",
        message: "Build succeeded with 0 errors and 0 warnings",
        sourceFile: file,
      },
      { lineNumber: 7, level: "WARNING", message: "Warning: cache miss rate high", sourceFile: file },
    ]);
  });

  it("draws records from the pool and reuses released ones", async () => {
    const file = await writeLog("app.log", SAMPLE_LINES);
    const pool = new RecordPool();
    const pipeline = new LogIngestionPipeline({ pool });

    for await (const record of pipeline.parse(file)) {
      pipeline.release(record);
    }

    const stats = pool.getStatistics();
    expect(stats.totalGets).toBe(4);
    expect(stats.totalInstancesCreated).toBe(1);
    expect(stats.poolHits).toBe(3);
    expect(pool.availableCount).toBe(1);
  });

  it("leaves records with the consumer until released", async () => {
    const file = await writeLog("app.log", SAMPLE_LINES);
    const pool = new RecordPool();
    const pipeline = new LogIngestionPipeline({ pool });

    const held = [];
    for await (const record of pipeline.parse(file)) {
      held.push(record);
    }

    expect(new Set(held).size).toBe(4);
    expect(pool.availableCount).toBe(0);
    expect(held.map((r) => r.lineNumber)).toEqual([1, 5, 6, 7]);

    for (const record of held) {
      pool.release(record);
    }
    expect(pool.availableCount).toBe(4);
  });

  it("publishes progress while running and on completion", async () => {
    const file = await writeLog("app.log", SAMPLE_LINES);
    const pipeline = new LogIngestionPipeline({ progressInterval: 2 });
    const size = (await fs.stat(file)).size;

    expect(pipeline.getProgress().state).toBe("idle");

    const snapshots = [];
    for await (const record of pipeline.parse(file)) {
      snapshots.push(pipeline.getProgress());
      pipeline.release(record);
    }

    // Published at start, then after lines 2, 4 and 6
    expect(snapshots.map((p) => p.processedLines)).toEqual([0, 4, 6, 6]);
    expect(snapshots.every((p) => p.state === "running")).toBe(true);

    const done = pipeline.getProgress();
    expect(done.state).toBe("completed");
    expect(done.filePath).toBe(file);
    expect(done.processedLines).toBe(7);
    expect(done.emittedRecords).toBe(4);
    expect(done.totalBytes).toBe(size);
    expect(done.bytesProcessed).toBe(size);
    expect(done.percentComplete).toBe(100);
    expect(Object.isFrozen(done)).toBe(true);
  });

  it("handles a final line without a terminator", async () => {
    const file = await writeLog("app.log", ["2024-01-01 10:00:00,000 a", "2024-01-01 10:00:01,000 b"], false);
    const pipeline = new LogIngestionPipeline();

    const seen = await drain(pipeline, pipeline.parse(file));
    expect(seen.map((s) => s.message)).toEqual(["a", "b"]);
    expect(pipeline.getProgress().bytesProcessed).toBe((await fs.stat(file)).size);
  });

  it("parses a larger file end to end", async () => {
    const lines = Array.from(
      { length: 3000 },
      (_, i) => `2024-01-01 10:${String(Math.floor(i / 60) % 60).padStart(2, "0")}:${String(i % 60).padStart(2, "0")},000 event ${i + 1}`,
    );
    const file = await writeLog("big.log", lines);
    const pipeline = new LogIngestionPipeline({ reader: { highWaterMark: 1024 } });

    let count = 0;
    let last = 0;
    for await (const record of pipeline.parse(file)) {
      count++;
      last = record.lineNumber;
      pipeline.release(record);
    }

    expect(count).toBe(3000);
    expect(last).toBe(3000);
    expect(await pipeline.estimateTotalLines(file)).toBe(3000);
  });

  describe("errors", () => {
    it("rejects an empty path", async () => {
      const pipeline = new LogIngestionPipeline();
      await expect(drain(pipeline, pipeline.parse(""))).rejects.toBeInstanceOf(InvalidArgumentError);
    });

    it("rejects a missing file", async () => {
      const pipeline = new LogIngestionPipeline();
      await expect(drain(pipeline, pipeline.parse(path.join(dir, "missing.log")))).rejects.toBeInstanceOf(
        FileNotFoundError,
      );
    });

    it("rejects a directory", async () => {
      const pipeline = new LogIngestionPipeline();
      await expect(drain(pipeline, pipeline.parse(dir))).rejects.toBeInstanceOf(InvalidArgumentError);
    });

    it("fails when the pool has been disposed", async () => {
      const file = await writeLog("app.log", SAMPLE_LINES);
      const pool = new RecordPool();
      pool.dispose();
      const pipeline = new LogIngestionPipeline({ pool });

      await expect(drain(pipeline, pipeline.parse(file))).rejects.toBeInstanceOf(PoolDisposedError);
      expect(pipeline.getProgress().state).toBe("failed");
    });
  });

  describe("cancellation", () => {
    it("stops before the next line once aborted", async () => {
      const file = await writeLog("app.log", SAMPLE_LINES);
      const pipeline = new LogIngestionPipeline();
      const controller = new AbortController();

      const seen: number[] = [];
      const run = async () => {
        for await (const record of pipeline.parse(file, controller.signal)) {
          seen.push(record.lineNumber);
          controller.abort();
        }
      };

      await expect(run()).rejects.toBeInstanceOf(CancelledError);
      expect(seen).toEqual([1]);
      expect(pipeline.getProgress().state).toBe("cancelled");
      expect(pipeline.getProgress().processedLines).toBe(1);
    });

    it("yields nothing when already aborted", async () => {
      const file = await writeLog("app.log", SAMPLE_LINES);
      const pipeline = new LogIngestionPipeline();

      await expect(drain(pipeline, pipeline.parse(file, AbortSignal.abort()))).rejects.toBeInstanceOf(
        CancelledError,
      );
      expect(pipeline.pool.getStatistics().totalGets).toBe(0);
    });

    it("marks a run the consumer abandons as stopped", async () => {
      const file = await writeLog("app.log", SAMPLE_LINES);
      const pipeline = new LogIngestionPipeline();

      for await (const record of pipeline.parse(file)) {
        pipeline.release(record);
        break;
      }

      expect(pipeline.getProgress().state).toBe("stopped");
      expect(pipeline.getProgress().processedLines).toBe(1);
    });
  });

  describe("estimateTotalLines", () => {
    it("counts lines with and without a trailing newline", async () => {
      const pipeline = new LogIngestionPipeline();
      const withNewline = await writeLog("a.log", SAMPLE_LINES);
      const withoutNewline = await writeLog("b.log", SAMPLE_LINES, false);

      expect(await pipeline.estimateTotalLines(withNewline)).toBe(7);
      expect(await pipeline.estimateTotalLines(withoutNewline)).toBe(7);
    });

    it("returns 0 for empty, missing and blank paths", async () => {
      const pipeline = new LogIngestionPipeline();
      const empty = await writeLog("empty.log", [], false);

      expect(await pipeline.estimateTotalLines(empty)).toBe(0);
      expect(await pipeline.estimateTotalLines(path.join(dir, "missing.log"))).toBe(0);
      expect(await pipeline.estimateTotalLines("")).toBe(0);
      expect(await pipeline.estimateTotalLines(dir)).toBe(0);
    });

    it("agrees with the number of lines the parser reads", async () => {
      const file = await writeLog("app.log", SAMPLE_LINES);
      const pipeline = new LogIngestionPipeline();

      await drain(pipeline, pipeline.parse(file));
      expect(pipeline.getProgress().processedLines).toBe(await pipeline.estimateTotalLines(file));
    });
  });

  describe("multiple files", () => {
    it("restarts line numbers per file", async () => {
      const first = await writeLog("one.log", ["2024-01-01 10:00:00,000 a", "noise", "2024-01-01 10:00:01,000 b"]);
      const second = await writeLog("two.log", ["2024-01-01 11:00:00,000 c"]);
      const pipeline = new LogIngestionPipeline();

      const seen = await drain(pipeline, pipeline.parseFiles([first, second]));

      expect(seen.map((s) => [s.sourceFile, s.lineNumber, s.message])).toEqual([
        [first, 1, "a"],
        [first, 3, "b"],
        [second, 1, "c"],
      ]);
    });

    it("parses matching files under a directory", async () => {
      const nested = await writeLog(path.join("nested", "z.log"), ["2024-01-01 10:00:00,000 nested"]);
      const top = await writeLog("a.log", ["2024-01-01 10:00:00,000 top"]);
      await writeLog("skip.txt", ["2024-01-01 10:00:00,000 skipped"]);
      const pipeline = new LogIngestionPipeline();

      const seen = await drain(pipeline, pipeline.parseDirectory(dir));

      expect(seen.map((s) => [s.sourceFile, s.message])).toEqual([
        [top, "top"],
        [nested, "nested"],
      ]);
    });
  });
});
