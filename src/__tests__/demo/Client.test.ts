import { Client } from "../../demo/Client";
import { Counter } from "../../demo/Counter";
import { ProtectedCollection } from "../../models/ProtectedCollection";
import { unsupportedOperationError } from "../../errors";

describe("Client", () => {
  const setup = (data = 10, ...seed: number[]) => {
    const counters = (seed.length ? seed : [1, 2, 3]).map(
      (n) => new Counter(n),
    );
    const collection = new ProtectedCollection(counters);
    return { client: new Client(data, collection), collection };
  };

  it("simpleLoop updates every counter and clears only its own copy", () => {
    const { client, collection } = setup();

    client.simpleLoop();

    expect(collection.size).toBe(3);
    expect(client.toString()).toBe("[11, 12, 13]");
  });

  it("immutableLoop updates every counter, then fails to clear", () => {
    const { client } = setup();

    expect(() => client.immutableLoop()).toThrow('Cannot clear "');
    expect(client.toString()).toBe("[11, 12, 13]");
  });

  it("iteratorLoop fails on the first counter starting with 5", () => {
    const { client } = setup(2, 1, 2, 3);

    let caught: unknown;
    try {
      client.iteratorLoop();
    } catch (error) {
      caught = error;
    }

    // for..of gives [3, 4, 5]; the explicit pass lifts the first counter to 5
    expect(unsupportedOperationError.is(caught)).toBe(true);
    expect(client.toString()).toBe("[5, 4, 5]");
  });

  it("iteratorLoop completes when no counter starts with 5", () => {
    const { client } = setup(1, 1, 2);

    client.iteratorLoop();

    expect(client.toString()).toBe("[3, 4]");
  });

  it("callbackLoop adds then doubles without exposing the collection", () => {
    const { client } = setup(10, 1, 2);

    client.callbackLoop();

    expect(client.toString()).toBe("[22, 24]");
  });
});
