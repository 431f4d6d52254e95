import { createSubsystemLogger } from "../logging/subsystem.js";
import { PoolDisposedError } from "./errors.js";
import { createLogRecord, resetLogRecord, type LogRecord } from "./record.js";

const log = createSubsystemLogger("ingest/record-pool");

export const DEFAULT_POOL_CAPACITY = 1000;
const MIN_POOL_CAPACITY = 10;
// Rough footprint of one record, used for the memory-saved estimate
const ESTIMATED_RECORD_BYTES = 200;

/**
 * Read-only snapshot of pool counters.
 */
export type PoolStatistics = Readonly<{
  totalGets: number;
  totalReturns: number;
  poolHits: number;
  poolMisses: number;
  currentPoolSize: number;
  maxPoolSize: number;
  totalInstancesCreated: number;
  /** poolHits / totalGets, 0 before the first get */
  hitRatio: number;
  memorySavedBytes: number;
}>;

export type RecordPoolOptions = {
  /** Maximum idle records kept for reuse (default 1000, minimum 10) */
  maxCapacity?: number;
};

/**
 * Recycles LogRecord instances to bound allocation under sustained parsing.
 *
 * Idle records sit in a FIFO queue. Every method is synchronous, so on
 * Node's single thread each call completes without interleaving and several
 * pipelines may share one pool.
 */
export class RecordPool {
  private readonly idle: LogRecord[] = [];
  // Guards against the same instance being queued twice and handed out to two owners
  private readonly idleSet = new Set<LogRecord>();
  private readonly capacity: number;
  private disposed = false;
  private totalGets = 0;
  private totalReturns = 0;
  private poolHits = 0;
  private poolMisses = 0;
  private totalInstancesCreated = 0;

  constructor(options: RecordPoolOptions = {}) {
    this.capacity = Math.max(options.maxCapacity ?? DEFAULT_POOL_CAPACITY, MIN_POOL_CAPACITY);
    log.debug("Record pool initialized", { maxCapacity: this.capacity });
  }

  get availableCount(): number {
    return this.idle.length;
  }

  get maxCapacity(): number {
    return this.capacity;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Takes an idle record, or allocates one when none is idle.
   */
  get(): LogRecord {
    if (this.disposed) {
      throw new PoolDisposedError();
    }
    this.totalGets++;

    const record = this.idle.shift();
    if (record) {
      this.idleSet.delete(record);
      this.poolHits++;
      log.trace("Reused record from pool", { available: this.idle.length });
      return record;
    }

    this.poolMisses++;
    this.totalInstancesCreated++;
    log.trace("Allocated new record", { misses: this.poolMisses });
    return createLogRecord();
  }

  /**
   * Resets a record and keeps it for reuse if there is room; otherwise it
   * is dropped for the garbage collector.
   */
  release(record: LogRecord | null | undefined): void {
    if (this.disposed) {
      log.debug("Ignoring release on disposed pool");
      return;
    }
    if (!record) {
      log.warn("Attempted to release a null record to the pool");
      return;
    }
    if (this.idleSet.has(record)) {
      log.warn("Record released twice; ignoring duplicate release");
      return;
    }

    resetLogRecord(record);
    this.totalReturns++;

    if (this.idle.length < this.capacity) {
      this.idle.push(record);
      this.idleSet.add(record);
      log.trace("Returned record to pool", { available: this.idle.length });
    } else {
      log.trace("Pool at capacity, discarding record");
    }
  }

  getStatistics(): PoolStatistics {
    return Object.freeze({
      totalGets: this.totalGets,
      totalReturns: this.totalReturns,
      poolHits: this.poolHits,
      poolMisses: this.poolMisses,
      currentPoolSize: this.idle.length,
      maxPoolSize: this.capacity,
      totalInstancesCreated: this.totalInstancesCreated,
      hitRatio: this.totalGets > 0 ? this.poolHits / this.totalGets : 0,
      memorySavedBytes: this.poolHits * ESTIMATED_RECORD_BYTES,
    });
  }

  /**
   * Drops every idle record. Records currently checked out are unaffected
   * and may still be released afterwards.
   */
  clear(): void {
    if (this.disposed) {
      return;
    }
    const cleared = this.idle.length;
    this.idle.length = 0;
    this.idleSet.clear();
    log.debug(`Cleared ${cleared} records from pool`);
  }

  /**
   * Releases all idle records and makes the pool unusable.
   */
  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.clear();
    this.disposed = true;

    const stats = this.getStatistics();
    log.info("Record pool disposed", {
      gets: stats.totalGets,
      returns: stats.totalReturns,
      hits: stats.poolHits,
      misses: stats.poolMisses,
      hitRatio: stats.hitRatio,
      memorySavedBytes: stats.memorySavedBytes,
    });
  }
}

/**
 * Creates a record pool.
 */
export function createRecordPool(options: RecordPoolOptions = {}): RecordPool {
  return new RecordPool(options);
}
