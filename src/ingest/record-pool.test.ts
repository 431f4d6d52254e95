import { describe, expect, it } from "vitest";
import { PoolDisposedError } from "./errors.js";
import type { LogRecord } from "./record.js";
import { DEFAULT_POOL_CAPACITY, RecordPool } from "./record-pool.js";

function take(pool: RecordPool, count: number): LogRecord[] {
  return Array.from({ length: count }, () => pool.get());
}

describe("RecordPool", () => {
  it("defaults to a capacity of 1000 and enforces a floor of 10", () => {
    expect(new RecordPool().maxCapacity).toBe(DEFAULT_POOL_CAPACITY);
    expect(new RecordPool({ maxCapacity: 3 }).maxCapacity).toBe(10);
    expect(new RecordPool({ maxCapacity: 25 }).maxCapacity).toBe(25);
  });

  it("keeps every returned record when under capacity and reuses them", () => {
    const pool = new RecordPool({ maxCapacity: 50 });
    const records = take(pool, 20);
    for (const record of records) {
      pool.release(record);
    }

    expect(pool.availableCount).toBe(20);
    expect(pool.getStatistics().totalInstancesCreated).toBe(20);

    const reused = pool.get();
    // FIFO: the first record released is the first handed out again
    expect(reused).toBe(records[0]);
    expect(pool.getStatistics().totalInstancesCreated).toBe(20);
    expect(pool.availableCount).toBe(19);
  });

  it("never grows beyond its capacity", () => {
    const pool = new RecordPool({ maxCapacity: 10 });
    const records = take(pool, 15);
    for (const record of records) {
      pool.release(record);
    }

    const stats = pool.getStatistics();
    expect(pool.availableCount).toBe(10);
    expect(stats.totalReturns).toBe(15);
    expect(stats.currentPoolSize).toBe(10);
  });

  it("resets every field before a record is reused", () => {
    const pool = new RecordPool();
    const record = pool.get();
    record.timestamp = new Date(2001, 0, 1);
    record.level = "ERROR";
    record.message = "boom";
    record.sourceFile = "/logs/app.log";
    record.lineNumber = 42;
    record.rawLine = "2001-01-01 00:00:00,000 boom";
    record.correlationId = "corr-1";
    record.errorType = "IOException";
    record.stackTrace = "at main()";
    record.recommendation = "check the disk";

    pool.release(record);
    const reused = pool.get();

    expect(reused).toBe(record);
    expect(reused.level).toBe("INFO");
    expect(reused.message).toBe("");
    expect(reused.sourceFile).toBe("");
    expect(reused.lineNumber).toBe(0);
    expect(reused.rawLine).toBe("");
    expect(reused.correlationId).toBeUndefined();
    expect(reused.errorType).toBeUndefined();
    expect(reused.stackTrace).toBeUndefined();
    expect(reused.recommendation).toBeUndefined();
    expect(reused.timestamp.getFullYear()).not.toBe(2001);
  });

  it("ignores null and undefined releases", () => {
    const pool = new RecordPool();
    pool.release(null);
    pool.release(undefined);

    expect(pool.availableCount).toBe(0);
    expect(pool.getStatistics().totalReturns).toBe(0);
  });

  it("ignores a second release of an idle record", () => {
    const pool = new RecordPool();
    const record = pool.get();
    pool.release(record);
    pool.release(record);

    expect(pool.availableCount).toBe(1);
    expect(pool.getStatistics().totalReturns).toBe(1);

    const first = pool.get();
    const second = pool.get();
    expect(first).toBe(record);
    expect(second).not.toBe(record);
  });

  it("counts hits, misses and the derived figures", () => {
    const pool = new RecordPool();
    const a = pool.get();
    pool.get();
    pool.release(a);
    pool.get();

    const stats = pool.getStatistics();
    expect(stats.totalGets).toBe(3);
    expect(stats.totalReturns).toBe(1);
    expect(stats.poolHits).toBe(1);
    expect(stats.poolMisses).toBe(2);
    expect(stats.totalInstancesCreated).toBe(2);
    expect(stats.currentPoolSize).toBe(0);
    expect(stats.maxPoolSize).toBe(1000);
    expect(stats.hitRatio).toBeCloseTo(1 / 3);
    expect(stats.memorySavedBytes).toBe(200);
  });

  it("reports a zero hit ratio before any get", () => {
    expect(new RecordPool().getStatistics().hitRatio).toBe(0);
  });

  it("returns snapshots rather than live counters", () => {
    const pool = new RecordPool();
    const before = pool.getStatistics();
    pool.get();

    expect(before.totalGets).toBe(0);
    expect(Object.isFrozen(before)).toBe(true);
    expect(pool.getStatistics().totalGets).toBe(1);
  });

  it("clears idle records without touching checked-out ones", () => {
    const pool = new RecordPool();
    const [kept, idle] = take(pool, 2);
    pool.release(idle);
    pool.clear();

    expect(pool.availableCount).toBe(0);

    pool.release(kept);
    expect(pool.availableCount).toBe(1);
    expect(pool.get()).toBe(kept);
  });

  it("refuses gets after dispose and drops releases", () => {
    const pool = new RecordPool();
    const record = pool.get();
    pool.release(pool.get());
    pool.dispose();

    expect(pool.isDisposed).toBe(true);
    expect(pool.availableCount).toBe(0);
    expect(() => pool.get()).toThrow(PoolDisposedError);

    pool.release(record);
    expect(pool.availableCount).toBe(0);
    expect(pool.getStatistics().totalReturns).toBe(1);
  });
});
