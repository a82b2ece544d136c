/**
 * Active connection counter shared by all clients of one endpoint type
 */
export class ConnectionCounter {
  private count: number = 0;
  private peak: number = 0;

  /**
   * Register a connection; returns the new count
   */
  increment(): number {
    this.count++;
    this.peak = Math.max(this.peak, this.count);
    return this.count;
  }

  /**
   * Release a connection; returns the new count
   */
  decrement(): number {
    if (this.count > 0) {
      this.count--;
    }
    return this.count;
  }

  get value(): number {
    return this.count;
  }

  get peakValue(): number {
    return this.peak;
  }
}
