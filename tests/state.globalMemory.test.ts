import { describe, it } from "mocha";
import { expect } from "chai";
import { ZodError } from "zod";

import { GlobalMemory } from "../src/state/globalMemory.js";
import { compareCodeUnits, jsonPayload, textPayload } from "../src/state/payload.js";

describe("state/globalMemory", () => {
  it("stores copies of the values it is given", () => {
    const memory = new GlobalMemory();
    const plan = { steps: ["search"] };

    memory.set("plan", plan);
    plan.steps.push("mutated");

    expect(memory.get("plan")).to.deep.equal({ steps: ["search"] });
    expect(memory.has("plan")).to.equal(true);
    expect(memory.get("missing")).to.equal(undefined);
  });

  it("rejects blank keys", () => {
    expect(() => new GlobalMemory().set("  ", 1)).to.throw(TypeError, "memory keys must not be blank");
  });

  it("serialises entries with sorted keys and reads them back", () => {
    const memory = new GlobalMemory();
    memory.set("zeta", 1);
    memory.set("alpha", { nested: true });

    const payload = memory.toPayload();
    expect(payload.bytes.toString("utf8")).to.equal(
      '{\n  "entries": {\n    "alpha": {\n      "nested": true\n    },\n    "zeta": 1\n  }\n}\n',
    );

    const copy = new GlobalMemory();
    copy.set("stale", true);
    copy.replaceFrom(payload);
    expect(copy.entries()).to.deep.equal([
      ["alpha", { nested: true }],
      ["zeta", 1],
    ]);
  });

  it("orders keys by code unit whatever the host locale", () => {
    const memory = new GlobalMemory();
    memory.set("b", 1);
    memory.set("B", 2);
    memory.set("a", 3);
    memory.set("Z", 4);

    expect(memory.entries().map(([key]) => key)).to.deep.equal(["B", "Z", "a", "b"]);
    expect(jsonPayload({ b: 1, B: 2, a: 3 }).bytes.toString("utf8")).to.equal('{\n  "B": 2,\n  "a": 3,\n  "b": 1\n}\n');
    expect(compareCodeUnits("Z", "a")).to.equal(-1);
    expect(compareCodeUnits("a", "Z")).to.equal(1);
    expect(compareCodeUnits("a", "a")).to.equal(0);
  });

  it("refuses payloads that are not memory documents", () => {
    const memory = new GlobalMemory();
    memory.set("kept", 1);

    expect(() => memory.replaceFrom(jsonPayload({ other: true }))).to.throw(ZodError);
    expect(() => memory.replaceFrom(textPayload("plain"))).to.throw(TypeError);
    expect(memory.entries()).to.deep.equal([["kept", 1]]);
  });
});
