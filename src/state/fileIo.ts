import { randomUUID } from "node:crypto";
import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import { isErrnoException } from "../nodePrimitives.js";

/**
 * Writes {@link contents} to a unique staging file and renames it into place
 * so readers only ever observe complete files, even when several writers
 * target the same path.
 */
export async function writeFileAtomic(filePath: string, contents: string | Uint8Array): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.${randomUUID()}.tmp`;
  await writeFile(tmpPath, contents);
  await rename(tmpPath, filePath);
}

/** Reads a UTF-8 file, returning `null` when it does not exist. */
export async function readOptionalText(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, "utf8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return null;
    }
    throw error;
  }
}

/** Reads raw bytes, returning `null` when the file does not exist. */
export async function readOptionalBytes(filePath: string): Promise<Buffer | null> {
  try {
    return await readFile(filePath);
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return null;
    }
    throw error;
  }
}
