/**
 * Fixed-capacity ring of numeric samples
 */
export class MetricsWindow {
  private samples: Float64Array;
  private next = 0;
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`MetricsWindow capacity must be a positive integer, got ${capacity}`);
    }
    this.samples = new Float64Array(capacity);
  }

  /**
   * Add a sample, evicting the oldest once full
   */
  push(value: number): void {
    if (this.count < this.capacity) {
      this.count++;
    }
    this.samples[this.next] = value;
    this.next = (this.next + 1) % this.capacity;
  }

  get size(): number {
    return this.count;
  }

  mean(): number {
    if (this.count === 0) return 0;
    let sum = 0;
    for (const value of this.values()) sum += value;
    return sum / this.count;
  }

  min(): number {
    return this.count === 0 ? 0 : Math.min(...this.values());
  }

  max(): number {
    return this.count === 0 ? 0 : Math.max(...this.values());
  }

  /**
   * Samples from oldest to newest
   */
  values(): number[] {
    const start = this.count === this.capacity ? this.next : 0;
    const result: number[] = [];
    for (let i = 0; i < this.count; i++) {
      result.push(this.samples[(start + i) % this.capacity]);
    }
    return result;
  }

  clear(): void {
    this.next = 0;
    this.count = 0;
  }
}
