/**
 * Trailing debounce that collects the values passed to `trigger`.
 *
 * - Every call restarts the quiet period
 * - Once the period passes without calls, `fn` runs once with every
 *   distinct value collected since the last run, in arrival order
 */
export class BatchingDebounce<T> {
  private timeout: ReturnType<typeof setTimeout> | undefined;
  private batch = new Set<T>();

  constructor(
    private readonly fn: (batch: T[]) => void,
    private readonly delayMs: number,
  ) {}

  trigger(value: T): void {
    this.batch.add(value);
    if (this.timeout) {
      clearTimeout(this.timeout);
    }
    this.timeout = setTimeout((): void => {
      this.flush();
    }, this.delayMs);
  }

  /**
   * Run now with whatever is pending
   */
  flush(): void {
    if (this.timeout) {
      clearTimeout(this.timeout);
      this.timeout = undefined;
    }
    if (this.batch.size === 0) {
      return;
    }
    const values = [...this.batch];
    this.batch = new Set();
    this.fn(values);
  }

  get pending(): number {
    return this.batch.size;
  }

  dispose(): void {
    if (this.timeout) {
      clearTimeout(this.timeout);
      this.timeout = undefined;
    }
    this.batch.clear();
  }
}
