/**
 * Carousel positions for the current boot session.
 *
 * Indices are 1-based. A carousel nobody has touched sits on its first
 * choice, which by convention is the default (default kernel, active BE).
 */
export class CarouselStore {
  private readonly indices = new Map<string, number>();

  get(id: string): number {
    return this.indices.get(id) ?? 1;
  }

  set(id: string, index: number): void {
    this.indices.set(id, index);
  }

  /**
   * Moves to the next of `count` choices, wrapping from the last to the first
   *
   * @returns The new index
   */
  advance(id: string, count: number): number {
    const next = nextCarouselIndex(this.get(id), count);
    this.set(id, next);
    return next;
  }

  reset(id: string): void {
    this.indices.delete(id);
  }
}

/**
 * Wrap rule for a carousel with `count` > 0 choices
 */
export function nextCarouselIndex(index: number, count: number): number {
  return (index % count) + 1;
}
