/**
 * LIFO of open groups, used while generating to know which group a new
 * connective belongs to.
 */
export class NestingStack<T> {
  private readonly items: T[] = [];

  get size(): number {
    return this.items.length;
  }

  push(item: T): void {
    this.items.push(item);
  }

  top(): T | undefined {
    return this.items[this.items.length - 1];
  }

  /** Pops `count` items and returns the last one popped (the outermost). */
  pop(count = 1): T | undefined {
    let popped: T | undefined;
    for (let i = 0; i < count && this.items.length > 0; i++) {
      popped = this.items.pop();
    }
    return popped;
  }
}
