import type { ProtectedCollection } from "../models/ProtectedCollection";
import type { Counter } from "./Counter";

/**
 * Combines its own data with every counter of a collection, once per
 * access mode.
 */
export class Client {
  constructor(
    private readonly data: number,
    private readonly collection: ProtectedCollection<Counter>,
  ) {}

  simpleLoop(): void {
    const values = this.collection.getMutableView();
    for (const counter of values) {
      counter.add(this.data);
    }
    // Only the working copy is emptied
    values.splice(0, values.length);
  }

  immutableLoop(): void {
    const values = this.collection.getImmutableView();
    for (const counter of values) {
      counter.add(this.data);
    }
    values.clear();
  }

  iteratorLoop(): void {
    for (const counter of this.collection) {
      counter.add(this.data);
    }

    const iter = this.collection.iterate();
    while (iter.hasNext()) {
      const step = iter.next();
      if (step.done) break;
      step.value.add(this.data);
      if (step.value.toString().startsWith("5")) {
        iter.remove();
      }
    }
  }

  callbackLoop(): void {
    this.collection.forEach((counter) => counter.add(this.data));
    this.collection.forEach((counter) => counter.double());
  }

  toString(): string {
    return this.collection.toString();
  }
}
