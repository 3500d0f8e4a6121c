import { Buffer } from "node:buffer";
import { createHash } from "node:crypto";

/**
 * Encoding tags stored next to every payload. `json` and `text` payloads are
 * written as readable files; `binary` payloads are kept verbatim.
 */
export const PAYLOAD_ENCODINGS = ["json", "text", "binary"] as const;
export type PayloadEncoding = (typeof PAYLOAD_ENCODINGS)[number];

/** Opaque state bytes plus the encoding declared by their producer. */
export interface StatePayload {
  readonly encoding: PayloadEncoding;
  readonly bytes: Buffer;
}

const FILE_EXTENSIONS: Record<PayloadEncoding, string> = {
  json: ".json",
  text: ".txt",
  binary: ".bin",
};

/** Orders strings by UTF-16 code unit, independent of the host locale. */
export function compareCodeUnits(left: string, right: string): number {
  if (left === right) {
    return 0;
  }
  return left < right ? -1 : 1;
}

/**
 * Recursively sorts plain object keys so equal values always serialise to the
 * same bytes and therefore hash to the same snapshot.
 */
function stabilise(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((entry) => stabilise(entry));
  }
  if (value !== null && typeof value === "object") {
    const prototype = Object.getPrototypeOf(value);
    if (prototype === Object.prototype || prototype === null) {
      const sorted: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value).sort(([left], [right]) => compareCodeUnits(left, right))) {
        sorted[key] = stabilise(entry);
      }
      return sorted;
    }
  }
  return value;
}

/** JSON with sorted keys and two-space indentation, terminated by a newline. */
export function stableStringify(value: unknown): string {
  return `${JSON.stringify(stabilise(value), null, 2)}\n`;
}

export function jsonPayload(value: unknown): StatePayload {
  return { encoding: "json", bytes: Buffer.from(stableStringify(value), "utf8") };
}

export function textPayload(text: string): StatePayload {
  return { encoding: "text", bytes: Buffer.from(text, "utf8") };
}

export function binaryPayload(bytes: Uint8Array): StatePayload {
  return { encoding: "binary", bytes: Buffer.from(bytes) };
}

/** Parses a `json` payload. Other encodings are rejected. */
export function decodeJsonPayload(payload: StatePayload): unknown {
  if (payload.encoding !== "json") {
    throw new TypeError(`expected a json payload, received ${payload.encoding}`);
  }
  return JSON.parse(payload.bytes.toString("utf8"));
}

export function payloadFileExtension(encoding: PayloadEncoding): string {
  return FILE_EXTENSIONS[encoding];
}

export function sha256Hex(data: string | Uint8Array): string {
  return createHash("sha256").update(data).digest("hex");
}
