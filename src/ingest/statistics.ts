import { createSubsystemLogger } from "../logging/subsystem.js";
import { LOG_LEVELS, type LogLevel, type LogRecord } from "./record.js";

const log = createSubsystemLogger("ingest/statistics");

const MS_PER_HOUR = 60 * 60 * 1000;
export const DEFAULT_TOP_ERRORS = 10;

export type LevelCounts = Readonly<Record<LogLevel, number>>;

export type ErrorFrequency = Readonly<{ message: string; count: number }>;

/**
 * Summary of a record sequence. Times are taken from record timestamps, so
 * `firstTimestamp` is the earliest entry, not the first one read.
 */
export type LogStatistics = Readonly<{
  totalRecords: number;
  levelCounts: LevelCounts;
  /** Share of each level in percent; all 0 for an empty sequence */
  levelPercentages: LevelCounts;
  firstTimestamp: Date | null;
  lastTimestamp: Date | null;
  spanMs: number;
  /** 0 when all records share one timestamp */
  recordsPerHour: number;
  uniqueSources: number;
  /** Record count per local hour of day, index 0..23 */
  hourlyDistribution: readonly number[];
  /** Busiest hour of day (lowest on ties), null when empty */
  peakHour: number | null;
  /** Most frequent ERROR messages, most frequent first */
  topErrors: readonly ErrorFrequency[];
}>;

function zeroCounts(): Record<LogLevel, number> {
  return { INFO: 0, WARNING: 0, ERROR: 0 };
}

/**
 * Accumulates statistics one record at a time. Only plain values are copied
 * out of each record, so a record may go back to the pool right after add().
 */
export class StatisticsCollector {
  private counts = zeroCounts();
  private total = 0;
  private first = Number.POSITIVE_INFINITY;
  private last = Number.NEGATIVE_INFINITY;
  private readonly sources = new Set<string>();
  private readonly hours: number[] = new Array<number>(24).fill(0);
  private readonly errorMessages = new Map<string, number>();

  add(record: LogRecord): void {
    this.total++;
    this.counts[record.level]++;

    const time = record.timestamp.getTime();
    if (time < this.first) {
      this.first = time;
    }
    if (time > this.last) {
      this.last = time;
    }

    if (record.sourceFile) {
      this.sources.add(record.sourceFile);
    }
    const hour = record.timestamp.getHours();
    this.hours[hour] = (this.hours[hour] ?? 0) + 1;

    if (record.level === "ERROR") {
      this.errorMessages.set(record.message, (this.errorMessages.get(record.message) ?? 0) + 1);
    }
  }

  snapshot(topErrors: number = DEFAULT_TOP_ERRORS): LogStatistics {
    const total = this.total;
    const empty = total === 0;
    const spanMs = empty ? 0 : this.last - this.first;

    const levelPercentages = zeroCounts();
    for (const level of LOG_LEVELS) {
      levelPercentages[level] = empty ? 0 : (this.counts[level] / total) * 100;
    }

    let peakHour: number | null = null;
    let peakCount = 0;
    for (let hour = 0; hour < this.hours.length; hour++) {
      const count = this.hours[hour] ?? 0;
      if (count > peakCount) {
        peakCount = count;
        peakHour = hour;
      }
    }

    // Stable sort keeps first-seen order among equal counts
    const ranked = Array.from(this.errorMessages, ([message, count]) => ({ message, count }))
      .sort((a, b) => b.count - a.count)
      .slice(0, Math.max(0, topErrors));

    return Object.freeze({
      totalRecords: total,
      levelCounts: Object.freeze({ ...this.counts }),
      levelPercentages: Object.freeze(levelPercentages),
      firstTimestamp: empty ? null : new Date(this.first),
      lastTimestamp: empty ? null : new Date(this.last),
      spanMs,
      recordsPerHour: spanMs > 0 ? total / (spanMs / MS_PER_HOUR) : 0,
      uniqueSources: this.sources.size,
      hourlyDistribution: Object.freeze([...this.hours]),
      peakHour,
      topErrors: Object.freeze(ranked.map((entry) => Object.freeze(entry))),
    });
  }

  reset(): void {
    this.counts = zeroCounts();
    this.total = 0;
    this.first = Number.POSITIVE_INFINITY;
    this.last = Number.NEGATIVE_INFINITY;
    this.sources.clear();
    this.hours.fill(0);
    this.errorMessages.clear();
  }
}

export type CollectOptions = {
  /** Called with each record once it has been counted, e.g. pipeline.release */
  release?: (record: LogRecord) => void;
  topErrors?: number;
};

/**
 * Drains a record sequence into a statistics snapshot.
 */
export async function collectStatistics(
  source: AsyncIterable<LogRecord>,
  options: CollectOptions = {},
): Promise<LogStatistics> {
  const collector = new StatisticsCollector();
  for await (const record of source) {
    collector.add(record);
    options.release?.(record);
  }
  const stats = collector.snapshot(options.topErrors);
  log.debug("Statistics collected", {
    total: stats.totalRecords,
    errors: stats.levelCounts.ERROR,
    warnings: stats.levelCounts.WARNING,
  });
  return stats;
}

/**
 * Passes through records of the given levels. Records that are filtered out
 * go to `release` when one is supplied, since nobody downstream will see them.
 */
export async function* filterByLevel(
  source: AsyncIterable<LogRecord>,
  levels: Iterable<LogLevel>,
  release?: (record: LogRecord) => void,
): AsyncGenerator<LogRecord> {
  const wanted = new Set(levels);
  for await (const record of source) {
    if (wanted.has(record.level)) {
      yield record;
    } else {
      release?.(record);
    }
  }
}

/**
 * ERROR records only.
 */
export function filterErrors(
  source: AsyncIterable<LogRecord>,
  release?: (record: LogRecord) => void,
): AsyncGenerator<LogRecord> {
  return filterByLevel(source, ["ERROR"], release);
}
