/**
 * A minimal element with internal mutable state.
 */
export class Counter {
  #count: number;

  constructor(value: number) {
    this.#count = value;
  }

  get value(): number {
    return this.#count;
  }

  add(amount: number): void {
    this.#count += amount;
  }

  double(): void {
    this.#count *= 2;
  }

  toString(): string {
    return String(this.#count);
  }
}
