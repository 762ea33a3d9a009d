/**
 * Single-value cache with explicit invalidation
 */
export class Memo<T> {
  private cell: { value: T } | null = null;

  get(compute: () => T): T {
    if (this.cell === null) {
      this.cell = { value: compute() };
    }
    return this.cell.value;
  }

  clear(): void {
    this.cell = null;
  }
}
