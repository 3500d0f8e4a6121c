import { mkdir, readdir, stat } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";

import { describeError, NotFoundError, SnapshotIntegrityError } from "../errors.js";
import { StructuredLogger } from "../logger.js";
import { isErrnoException } from "../nodePrimitives.js";
import { readOptionalBytes, readOptionalText, writeFileAtomic } from "./fileIo.js";
import {
  compareCodeUnits,
  PAYLOAD_ENCODINGS,
  payloadFileExtension,
  sha256Hex,
  stableStringify,
  type StatePayload,
} from "./payload.js";

/** Owner used for agent-wide memory snapshots that belong to no session. */
export const GLOBAL_OWNER = "global";

const DigestSchema = z.string().regex(/^[a-f0-9]{64}$/, "expected a sha256 hex digest");

/**
 * Manifest persisted next to every payload. It is the human readable record
 * of a snapshot: who owns it, when it was taken, how the payload is encoded
 * and the full ancestor chain (nearest parent first).
 */
export const SnapshotManifestSchema = z
  .object({
    snapshotId: DigestSchema,
    sessionId: z.string().min(1),
    capturedAt: z.string().datetime(),
    encoding: z.enum(PAYLOAD_ENCODINGS),
    payloadDigest: DigestSchema,
    payloadFile: z.string().min(1),
    sizeBytes: z.number().int().nonnegative(),
    parentSnapshotId: DigestSchema.nullable(),
    chain: z.array(DigestSchema),
  })
  .strict();

export type SnapshotManifest = z.infer<typeof SnapshotManifestSchema>;

const HeadsSchema = z.record(z.string(), DigestSchema);

export interface SnapshotStoreOptions {
  /** Directory receiving `blobs/`, `manifests/` and `heads.json`. */
  readonly directory: string;
  readonly logger?: StructuredLogger;
  readonly now?: () => number;
}

/**
 * Identifier of a snapshot: the digest of its canonical record. Lineage is
 * part of the record, so a child can never share the id of an ancestor and
 * the parent graph stays acyclic by construction.
 */
export function computeSnapshotId(input: {
  sessionId: string;
  encoding: StatePayload["encoding"];
  payloadDigest: string;
  parentSnapshotId: string | null;
}): string {
  return sha256Hex(
    stableStringify({
      encoding: input.encoding,
      parentSnapshotId: input.parentSnapshotId,
      payloadDigest: input.payloadDigest,
      sessionId: input.sessionId,
    }),
  );
}

/**
 * Content-addressed, write-once snapshot arena. Payload bytes live under
 * their digest, manifests under the snapshot id; neither is ever rewritten,
 * so concurrent duplicate writes of the same content are no-ops.
 */
export class SnapshotStore {
  private readonly blobsDir: string;
  private readonly manifestsDir: string;
  private readonly headsFile: string;
  private readonly logger: StructuredLogger;
  private readonly now: () => number;
  private readonly manifests = new Map<string, SnapshotManifest>();
  private heads: Record<string, string> = {};
  private headsQueue: Promise<void> = Promise.resolve();

  private constructor(options: SnapshotStoreOptions) {
    this.blobsDir = path.join(options.directory, "blobs");
    this.manifestsDir = path.join(options.directory, "manifests");
    this.headsFile = path.join(options.directory, "heads.json");
    this.logger = options.logger ?? new StructuredLogger();
    this.now = options.now ?? (() => Date.now());
  }

  /** Opens the store, loading every readable manifest into the arena. */
  static async open(options: SnapshotStoreOptions): Promise<SnapshotStore> {
    const store = new SnapshotStore(options);
    await mkdir(store.blobsDir, { recursive: true });
    await mkdir(store.manifestsDir, { recursive: true });
    await store.load();
    return store;
  }

  /**
   * Persists {@link payload} as a snapshot owned by {@link owner} whose parent
   * is {@link parentSnapshotId}. The parent must already exist. Returns the
   * existing manifest unchanged when the same snapshot was stored before.
   */
  async put(owner: string, payload: StatePayload, parentSnapshotId: string | null): Promise<SnapshotManifest> {
    const parent = parentSnapshotId === null ? null : await this.getManifest(parentSnapshotId);
    const payloadDigest = sha256Hex(payload.bytes);
    const snapshotId = computeSnapshotId({
      sessionId: owner,
      encoding: payload.encoding,
      payloadDigest,
      parentSnapshotId,
    });

    const existing = this.manifests.get(snapshotId);
    if (existing) {
      return existing;
    }

    const payloadFile = `${payloadDigest}${payloadFileExtension(payload.encoding)}`;
    const blobPath = path.join(this.blobsDir, payloadFile);
    if (!(await fileExists(blobPath))) {
      await writeFileAtomic(blobPath, payload.bytes);
    }

    const manifest: SnapshotManifest = {
      snapshotId,
      sessionId: owner,
      capturedAt: new Date(this.now()).toISOString(),
      encoding: payload.encoding,
      payloadDigest,
      payloadFile,
      sizeBytes: payload.bytes.byteLength,
      parentSnapshotId,
      chain: parent ? [parent.snapshotId, ...parent.chain] : [],
    };
    await writeFileAtomic(this.manifestPath(snapshotId), stableStringify(manifest));
    this.manifests.set(snapshotId, manifest);
    this.logger.debug("snapshot_stored", {
      snapshot_id: snapshotId,
      owner,
      encoding: payload.encoding,
      size_bytes: manifest.sizeBytes,
      parent_snapshot_id: parentSnapshotId,
    });
    return manifest;
  }

  /** Pure read of a snapshot payload, verified against its recorded digest. */
  async restore(snapshotId: string): Promise<StatePayload> {
    const manifest = await this.getManifest(snapshotId);
    const bytes = await readOptionalBytes(path.join(this.blobsDir, manifest.payloadFile));
    if (bytes === null) {
      throw new SnapshotIntegrityError(snapshotId, "payload file is missing", { payload_file: manifest.payloadFile });
    }
    const actualDigest = sha256Hex(bytes);
    if (actualDigest !== manifest.payloadDigest) {
      throw new SnapshotIntegrityError(snapshotId, "payload digest mismatch", {
        expected_digest: manifest.payloadDigest,
        actual_digest: actualDigest,
      });
    }
    return { encoding: manifest.encoding, bytes };
  }

  async getManifest(snapshotId: string): Promise<SnapshotManifest> {
    const cached = this.manifests.get(snapshotId);
    if (cached) {
      return cached;
    }
    if (!DigestSchema.safeParse(snapshotId).success) {
      throw new NotFoundError("snapshot", snapshotId);
    }
    const raw = await readOptionalText(this.manifestPath(snapshotId));
    if (raw === null) {
      throw new NotFoundError("snapshot", snapshotId);
    }
    const manifest = this.parseManifest(snapshotId, raw);
    if (!manifest) {
      throw new SnapshotIntegrityError(snapshotId, "manifest is unreadable");
    }
    this.manifests.set(snapshotId, manifest);
    return manifest;
  }

  async has(snapshotId: string): Promise<boolean> {
    try {
      await this.getManifest(snapshotId);
      return true;
    } catch (error) {
      if (error instanceof NotFoundError) {
        return false;
      }
      throw error;
    }
  }

  /** Manifests from {@link snapshotId} back to its root, nearest first. */
  async chain(snapshotId: string): Promise<SnapshotManifest[]> {
    const chain: SnapshotManifest[] = [];
    let cursor: string | null = snapshotId;
    while (cursor !== null) {
      const manifest: SnapshotManifest = await this.getManifest(cursor);
      chain.push(manifest);
      cursor = manifest.parentSnapshotId;
    }
    return chain;
  }

  /** Manifests currently known, optionally restricted to one owner, oldest first. */
  list(owner?: string): SnapshotManifest[] {
    return Array.from(this.manifests.values())
      .filter((manifest) => owner === undefined || manifest.sessionId === owner)
      .sort((left, right) => {
        const byTime = compareCodeUnits(left.capturedAt, right.capturedAt);
        return byTime !== 0 ? byTime : left.chain.length - right.chain.length;
      });
  }

  /** Latest snapshot recorded for an owner that is not a session (e.g. {@link GLOBAL_OWNER}). */
  headOf(owner: string): string | null {
    return this.heads[owner] ?? null;
  }

  async setHead(owner: string, snapshotId: string): Promise<void> {
    await this.getManifest(snapshotId);
    this.heads = { ...this.heads, [owner]: snapshotId };
    const contents = stableStringify(this.heads);
    const write = this.headsQueue.then(() => writeFileAtomic(this.headsFile, contents));
    // The failure reaches this caller; later writes queue behind a settled tail.
    this.headsQueue = write.catch((error: unknown) => {
      this.logger.error("snapshot_heads_write_failed", {
        owner,
        snapshot_id: snapshotId,
        message: describeError(error),
      });
    });
    await write;
  }

  private manifestPath(snapshotId: string): string {
    return path.join(this.manifestsDir, `${snapshotId}.json`);
  }

  private parseManifest(snapshotId: string, raw: string): SnapshotManifest | null {
    const parsed = SnapshotManifestSchema.safeParse(parseJsonOrNull(raw));
    if (parsed.success && parsed.data.snapshotId === snapshotId) {
      return parsed.data;
    }
    this.logger.warn("snapshot_manifest_invalid", { snapshot_id: snapshotId });
    return null;
  }

  private async load(): Promise<void> {
    for (const file of await readdir(this.manifestsDir)) {
      if (!file.endsWith(".json")) {
        continue;
      }
      const snapshotId = file.slice(0, -".json".length);
      const raw = await readOptionalText(this.manifestPath(snapshotId));
      const manifest = raw === null ? null : this.parseManifest(snapshotId, raw);
      if (manifest) {
        this.manifests.set(snapshotId, manifest);
      }
    }

    const rawHeads = await readOptionalText(this.headsFile);
    if (rawHeads !== null) {
      const parsed = HeadsSchema.safeParse(parseJsonOrNull(rawHeads));
      if (parsed.success) {
        this.heads = parsed.data;
      } else {
        this.logger.warn("snapshot_heads_invalid", { file: this.headsFile });
      }
    }
  }
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return false;
    }
    throw error;
  }
}

function parseJsonOrNull(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}
