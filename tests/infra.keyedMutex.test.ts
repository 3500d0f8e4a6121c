import { describe, it } from "mocha";
import { expect } from "chai";

import { KeyedMutex } from "../src/infra/keyedMutex.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((settle) => {
    resolve = settle;
  });
  return { promise, resolve };
}

describe("infra/keyedMutex", () => {
  it("runs tasks sharing a key one at a time in arrival order", async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    const gate = deferred();

    const first = mutex.runExclusive("session-1", async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
      return 1;
    });
    const second = mutex.runExclusive("session-1", async () => {
      order.push("second");
      return 2;
    });

    await Promise.resolve();
    expect(order).to.deep.equal(["first:start"]);
    expect(mutex.isLocked("session-1")).to.equal(true);

    gate.resolve();
    expect(await Promise.all([first, second])).to.deep.equal([1, 2]);
    expect(order).to.deep.equal(["first:start", "first:end", "second"]);
    expect(mutex.isLocked("session-1")).to.equal(false);
  });

  it("never blocks tasks holding different keys", async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const blocked = mutex.runExclusive("session-1", () => gate.promise);

    const other = await mutex.runExclusive("session-2", async () => "done");

    expect(other).to.equal("done");
    gate.resolve();
    await blocked;
  });

  it("releases the key when a task throws", async () => {
    const mutex = new KeyedMutex();

    let caught: unknown = null;
    try {
      await mutex.runExclusive("session-1", async () => {
        throw new Error("boom");
      });
    } catch (error) {
      caught = error;
    }

    expect(caught).to.be.instanceOf(Error);
    expect(await mutex.runExclusive("session-1", async () => "after")).to.equal("after");
    expect(mutex.isLocked("session-1")).to.equal(false);
  });
});
