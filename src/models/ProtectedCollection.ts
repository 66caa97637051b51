import { GuardedIterator } from "./GuardedIterator";
import { UnmodifiableList } from "./UnmodifiableList";

/**
 * Owns a sequence of elements and decides how callers may reach it.
 *
 * The original sequence is a structural copy of the constructor input and is
 * never handed out. Every exposing call derives a fresh working copy holding
 * the same element references, so:
 * - structural changes made by callers never reach the original sequence;
 * - state changes made to the elements themselves are visible everywhere.
 *
 * Access modes:
 * - `getMutableView()` — a plain array; changing it has no lasting effect.
 * - `getImmutableView()` — an {@link UnmodifiableList}; structural changes throw.
 * - `iterate()` / `for..of` — a {@link GuardedIterator}; `remove()` throws.
 * - `forEach(action)` — the caller only ever sees individual elements.
 */
export class ProtectedCollection<E> implements Iterable<E> {
  readonly #original: readonly E[];
  readonly #name: string;

  constructor(items: Iterable<E>, name?: string) {
    this.#original = Object.freeze([...items]);
    this.#name = name ?? "ProtectedCollection";
  }

  get size(): number {
    return this.#original.length;
  }

  /**
   * A working copy the caller may change at will. Changes to the array are
   * discarded; changes to the elements are not.
   */
  getMutableView(): E[] {
    return this.derive();
  }

  getImmutableView(): UnmodifiableList<E> {
    return new UnmodifiableList(this.derive(), this.#name);
  }

  iterate(): GuardedIterator<E> {
    return new GuardedIterator(this.derive(), this.#name);
  }

  [Symbol.iterator](): GuardedIterator<E> {
    return this.iterate();
  }

  /**
   * Calls `action` once per element, synchronously and in order.
   */
  forEach(action: (item: E) => void): void {
    for (const item of this.derive()) {
      action(item);
    }
  }

  toString(): string {
    return this.getImmutableView().toString();
  }

  private derive(): E[] {
    return [...this.#original];
  }
}
