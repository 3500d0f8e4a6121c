import { z } from "zod";

import type { SupervisorToolContext } from "./sessionTools.js";

const MemoryKeySchema = z.string().trim().min(1).max(256);

export const MemorySetInputSchema = z
  .object({
    key: MemoryKeySchema,
    value: z.unknown(),
  })
  .strict();
export const MemorySetInputShape = MemorySetInputSchema.shape;
export type MemorySetInput = z.infer<typeof MemorySetInputSchema>;

export const MemoryGetInputSchema = z
  .object({
    /** Omit to read every entry. */
    key: MemoryKeySchema.optional(),
  })
  .strict();
export const MemoryGetInputShape = MemoryGetInputSchema.shape;
export type MemoryGetInput = z.infer<typeof MemoryGetInputSchema>;

export function handleMemorySet(context: SupervisorToolContext, input: MemorySetInput): Record<string, unknown> {
  // A missing value deletes the key; JSON has no way to store `undefined`.
  if (input.value === undefined) {
    const deleted = context.supervisor.memory.delete(input.key);
    return { key: input.key, deleted };
  }
  context.supervisor.memory.set(input.key, input.value);
  context.logger.debug("memory_set", { key: input.key });
  return { key: input.key, stored: true };
}

export function handleMemoryGet(context: SupervisorToolContext, input: MemoryGetInput): Record<string, unknown> {
  const memory = context.supervisor.memory;
  if (input.key !== undefined) {
    return { key: input.key, found: memory.has(input.key), value: memory.get(input.key) ?? null };
  }
  return { entries: Object.fromEntries(memory.entries()) };
}
