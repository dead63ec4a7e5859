/**
 * Metrics tracking for index queries
 */

export interface IndexMetrics {
  hitCount: number;
  missCount: number;
  rangeCount: number;
  queryTimeMs: number[];
  buildTimeMs: number;
  records: number;
  keys: number;
}

const MAX_SAMPLES = 100;

class MetricsCollector {
  #metrics = new Map<string, IndexMetrics>();

  /**
   * Get or create metrics for an index
   */
  #getMetrics(index: string): IndexMetrics {
    let metrics = this.#metrics.get(index);
    if (!metrics) {
      metrics = {
        hitCount: 0,
        missCount: 0,
        rangeCount: 0,
        queryTimeMs: [],
        buildTimeMs: 0,
        records: 0,
        keys: 0,
      };
      this.#metrics.set(index, metrics);
    }
    return metrics;
  }

  /**
   * Record a key lookup that matched at least one record
   */
  recordHit(index: string): void {
    this.#getMetrics(index).hitCount++;
  }

  /**
   * Record a key lookup that matched nothing
   */
  recordMiss(index: string): void {
    this.#getMetrics(index).missCount++;
  }

  /**
   * Record a range query
   */
  recordRange(index: string): void {
    this.#getMetrics(index).rangeCount++;
  }

  /**
   * Record query time
   */
  recordQueryTime(index: string, ms: number): void {
    const metrics = this.#getMetrics(index);
    metrics.queryTimeMs.push(ms);

    if (metrics.queryTimeMs.length > MAX_SAMPLES) {
      metrics.queryTimeMs.shift();
    }
  }

  /**
   * Record how an index was built
   */
  recordBuild(index: string, ms: number, records: number, keys: number): void {
    const metrics = this.#getMetrics(index);
    metrics.buildTimeMs = ms;
    metrics.records = records;
    metrics.keys = keys;
  }

  /**
   * Get metrics for an index
   */
  getMetrics(index: string): IndexMetrics | undefined {
    return this.#metrics.get(index);
  }

  /**
   * Get all metrics
   */
  getAllMetrics(): Map<string, IndexMetrics> {
    return new Map(this.#metrics);
  }

  /**
   * Calculate hit rate for an index
   */
  getHitRate(index: string): number {
    const metrics = this.#metrics.get(index);
    if (!metrics) return 0;
    const total = metrics.hitCount + metrics.missCount;
    return total > 0 ? metrics.hitCount / total : 0;
  }

  /**
   * Calculate p95 for a metric
   */
  getP95(values: number[]): number {
    if (values.length === 0) return 0;

    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.ceil(sorted.length * 0.95) - 1;
    return sorted[Math.max(0, idx)]!;
  }

  /**
   * Get p95 query time
   */
  getP95QueryTime(index: string): number {
    return this.getP95(this.#metrics.get(index)?.queryTimeMs ?? []);
  }

  /**
   * Reset metrics for one index, or all of them
   */
  reset(index?: string): void {
    if (index) {
      this.#metrics.delete(index);
    } else {
      this.#metrics.clear();
    }
  }
}

/**
 * Global metrics collector instance
 */
export const metrics = new MetricsCollector();
