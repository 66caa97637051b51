import { unsupportedOperationError } from "../errors";

/**
 * A single-pass traversal over its own working copy of a sequence.
 *
 * Every instance owns a private array, so callers get a fresh, independent
 * traversal per request. Removal through the iterator is not a capability it
 * offers: `remove()` is typed `never` and always throws.
 */
export class GuardedIterator<E> implements IterableIterator<E> {
  readonly #items: readonly E[];
  readonly #name: string;
  #cursor = 0;

  constructor(items: Iterable<E>, name?: string) {
    this.#items = [...items];
    this.#name = name ?? "GuardedIterator";
  }

  hasNext(): boolean {
    return this.#cursor < this.#items.length;
  }

  next(): IteratorResult<E, undefined> {
    if (!this.hasNext()) {
      return { done: true, value: undefined };
    }
    const value = this.#items[this.#cursor];
    this.#cursor += 1;
    return { done: false, value };
  }

  /** @throws unsupportedOperationError, always */
  remove(): never {
    return unsupportedOperationError.throw({
      operation: "remove",
      target: this.#name,
    });
  }

  [Symbol.iterator](): this {
    return this;
  }
}
