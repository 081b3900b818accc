/**
 * Lazily computed value, resolved at most once.
 *
 * Concurrent first callers share one in-flight initialisation. A failed
 * initialisation is not cached, so the next `get()` starts a new one.
 */
export class Once<T> {
  private cell: { value: T } | undefined;
  private pending: Promise<T> | undefined;

  constructor(
    private readonly init: () => Promise<T>,
    seed?: T
  ) {
    if (seed !== undefined) {
      this.cell = { value: seed };
    }
  }

  get(): Promise<T> {
    if (this.cell) return Promise.resolve(this.cell.value);
    if (!this.pending) {
      this.pending = this.init().then(
        (value) => {
          this.cell = { value };
          this.pending = undefined;
          return value;
        },
        (err: unknown) => {
          this.pending = undefined;
          throw err;
        }
      );
    }
    return this.pending;
  }

  /** The cached value, without triggering initialisation */
  peek(): T | undefined {
    return this.cell?.value;
  }
}
