/**
 * Inbox: bridges push-based frame delivery into pull-based reads.
 *
 * The transport pushes frames as they arrive; the receive loop pulls them
 * one at a time with `for await...of`, so it never handles two at once.
 */
export class Inbox<T> implements AsyncIterable<T> {
  readonly #items: T[] = [];
  #ended = false;
  #stopped = false;
  #wake: (() => void) | null = null;

  /** Queue an item. Ignored once the inbox has ended or stopped. */
  push(item: T): void {
    if (this.#ended || this.#stopped) return;
    this.#items.push(item);
    this.#wake?.();
  }

  /** No more items will arrive; readers drain what is buffered, then finish. */
  end(): void {
    this.#ended = true;
    this.#wake?.();
  }

  /** Finish readers immediately, discarding anything buffered. */
  stop(): void {
    this.#stopped = true;
    this.#items.length = 0;
    this.#wake?.();
  }

  /** Number of buffered items. */
  get size(): number {
    return this.#items.length;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    try {
      while (!this.#stopped) {
        const item = this.#items.shift();
        if (item !== undefined) {
          yield item;
          continue;
        }
        if (this.#ended) return;

        await new Promise<void>((r) => {
          this.#wake = r;
        });
        this.#wake = null;
      }
    } finally {
      this.#wake = null;
    }
  }
}
