import { z } from "zod";

import { compareCodeUnits, decodeJsonPayload, jsonPayload, type StatePayload } from "./payload.js";

const MemoryDocumentSchema = z
  .object({
    entries: z.record(z.string(), z.unknown()),
  })
  .strict();

/**
 * Agent-wide key/value memory. It outlives every session and is captured
 * under the `"global"` snapshot owner as a JSON document with sorted keys.
 */
export class GlobalMemory {
  private values = new Map<string, unknown>();

  set(key: string, value: unknown): void {
    if (key.trim().length === 0) {
      throw new TypeError("memory keys must not be blank");
    }
    this.values.set(key, structuredClone(value));
  }

  get(key: string): unknown {
    const value = this.values.get(key);
    return value === undefined ? undefined : structuredClone(value);
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  delete(key: string): boolean {
    return this.values.delete(key);
  }

  /** Entries sorted by key. */
  entries(): Array<[string, unknown]> {
    return Array.from(this.values.entries())
      .sort(([left], [right]) => compareCodeUnits(left, right))
      .map(([key, value]) => [key, structuredClone(value)]);
  }

  toPayload(): StatePayload {
    return jsonPayload({ entries: Object.fromEntries(this.values) });
  }

  /** Replaces the whole memory with the content of a `"global"` snapshot payload. */
  replaceFrom(payload: StatePayload): void {
    const document = MemoryDocumentSchema.parse(decodeJsonPayload(payload));
    this.values = new Map(Object.entries(document.entries));
  }
}
