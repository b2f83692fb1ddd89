/**
 * Metrics tracking for materialization and query operations
 */

export interface IndexMetrics {
  recordsWritten: number;
  recordsFailed: number;
  batches: number;
  batchesFailed: number;
  recordsRead: number;
  pagesRead: number;
  writeTimeMs: number[];
  queryTimeMs: number[];
  backfillTimeMs: number[];
}

const MAX_SAMPLES = 100;

function pushSample(samples: number[], ms: number): void {
  samples.push(ms);
  if (samples.length > MAX_SAMPLES) {
    samples.shift();
  }
}

class MetricsCollector {
  #metrics = new Map<string, IndexMetrics>();

  #getMetrics(table: string, index: string): IndexMetrics {
    const key = `${table}/${index}`;
    let metrics = this.#metrics.get(key);
    if (!metrics) {
      metrics = {
        recordsWritten: 0,
        recordsFailed: 0,
        batches: 0,
        batchesFailed: 0,
        recordsRead: 0,
        pagesRead: 0,
        writeTimeMs: [],
        queryTimeMs: [],
        backfillTimeMs: [],
      };
      this.#metrics.set(key, metrics);
    }
    return metrics;
  }

  /**
   * Record a dispatched transaction group
   */
  recordBatch(table: string, index: string, operations: number, ok: boolean, ms: number): void {
    const metrics = this.#getMetrics(table, index);
    metrics.batches++;
    if (ok) {
      metrics.recordsWritten += operations;
    } else {
      metrics.batchesFailed++;
      metrics.recordsFailed += operations;
    }
    pushSample(metrics.writeTimeMs, ms);
  }

  /**
   * Record a record rejected before dispatch (e.g. too large)
   */
  recordRejected(table: string, index: string): void {
    this.#getMetrics(table, index).recordsFailed++;
  }

  recordPage(table: string, partition: string, entities: number): void {
    const metrics = this.#getMetrics(table, partition);
    metrics.pagesRead++;
    metrics.recordsRead += entities;
  }

  recordQueryTime(table: string, partition: string, ms: number): void {
    pushSample(this.#getMetrics(table, partition).queryTimeMs, ms);
  }

  recordBackfillTime(table: string, index: string, ms: number): void {
    pushSample(this.#getMetrics(table, index).backfillTimeMs, ms);
  }

  getMetrics(table: string, index: string): IndexMetrics | undefined {
    return this.#metrics.get(`${table}/${index}`);
  }

  getAllMetrics(): Map<string, IndexMetrics> {
    return new Map(this.#metrics);
  }

  /**
   * 95th percentile of a sample set
   */
  getP95(values: number[]): number {
    if (values.length === 0) return 0;

    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.max(0, Math.ceil(sorted.length * 0.95) - 1);
    return sorted[idx] ?? 0;
  }

  getP95WriteTime(table: string, index: string): number {
    return this.getP95(this.#getMetrics(table, index).writeTimeMs);
  }

  reset(table?: string, index?: string): void {
    if (table && index) {
      this.#metrics.delete(`${table}/${index}`);
    } else {
      this.#metrics.clear();
    }
  }
}

/**
 * Global metrics collector instance
 */
export const metrics = new MetricsCollector();
