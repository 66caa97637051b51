import { unsupportedOperationError } from "../errors";
import { GuardedIterator } from "./GuardedIterator";

/**
 * Read-only capabilities of a list view.
 */
export interface ReadonlyList<E> extends Iterable<E> {
  readonly length: number;
  at(index: number): E | undefined;
  includes(item: E): boolean;
  indexOf(item: E): number;
  forEach(action: (item: E, index: number) => void): void;
  map<R>(fn: (item: E, index: number) => R): R[];
  toArray(): E[];
  iterator(): GuardedIterator<E>;
}

/**
 * A list view that rejects every structural change.
 *
 * Reads behave like a regular array. Structural mutators (`add`, `insert`,
 * `set`, `remove`, `removeAt`, `clear`, `sort`, `reverse`) return `never`,
 * so the compiler flags code after them as unreachable, and at runtime they
 * throw `unsupportedOperationError` without touching the wrapped sequence.
 * Elements are shared, not copied: their own state stays mutable.
 */
export class UnmodifiableList<E> implements ReadonlyList<E> {
  readonly #items: readonly E[];
  readonly #name: string;

  constructor(items: readonly E[], name?: string) {
    this.#items = items;
    this.#name = name ?? "UnmodifiableList";
  }

  get length(): number {
    return this.#items.length;
  }

  at(index: number): E | undefined {
    return this.#items.at(index);
  }

  includes(item: E): boolean {
    return this.#items.includes(item);
  }

  indexOf(item: E): number {
    return this.#items.indexOf(item);
  }

  forEach(action: (item: E, index: number) => void): void {
    this.#items.forEach((item, index) => action(item, index));
  }

  map<R>(fn: (item: E, index: number) => R): R[] {
    return this.#items.map((item, index) => fn(item, index));
  }

  /** A fresh, structurally independent copy of the content. */
  toArray(): E[] {
    return [...this.#items];
  }

  iterator(): GuardedIterator<E> {
    return new GuardedIterator(this.#items, this.#name);
  }

  [Symbol.iterator](): GuardedIterator<E> {
    return this.iterator();
  }

  add(_item: E): never {
    return this.reject("add");
  }

  insert(_index: number, _item: E): never {
    return this.reject("insert");
  }

  set(_index: number, _item: E): never {
    return this.reject("set");
  }

  remove(_item: E): never {
    return this.reject("remove");
  }

  removeAt(_index: number): never {
    return this.reject("removeAt");
  }

  clear(): never {
    return this.reject("clear");
  }

  sort(_compare?: (a: E, b: E) => number): never {
    return this.reject("sort");
  }

  reverse(): never {
    return this.reject("reverse");
  }

  toString(): string {
    return `[${this.#items.map((item) => String(item)).join(", ")}]`;
  }

  /** @throws unsupportedOperationError */
  private reject(operation: string): never {
    return unsupportedOperationError.throw({ operation, target: this.#name });
  }
}
