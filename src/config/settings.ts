import path from "node:path";
import { z } from "zod";

import { omitUndefinedEntries } from "../utils/object.js";
import { readOptionalInt, readOptionalNumber, readOptionalString } from "./env.js";

/** Upper bound accepted for any duration knob (10 minutes). */
const MAX_DURATION_MS = 600_000;

const DurationSchema = z.number().int().min(1).max(MAX_DURATION_MS);

/**
 * Schema validating the effective supervisor settings once explicit
 * overrides, environment variables and defaults have been merged.
 */
export const SupervisorSettingsSchema = z
  .object({
    runsRoot: z.string().trim().min(1),
    probeIntervalMs: DurationSchema,
    probeTimeoutMs: DurationSchema,
    failureThreshold: z.number().int().min(1).max(100),
    maxRecoveryAttempts: z.number().int().min(1).max(100),
    recoveryBackoffMinMs: z.number().int().min(0).max(MAX_DURATION_MS),
    recoveryBackoffMaxMs: z.number().int().min(0).max(MAX_DURATION_MS),
    recoveryBackoffFactor: z.number().min(1).max(10),
    adapterTimeoutMs: DurationSchema,
    startRetries: z.number().int().min(0).max(1),
    logFile: z.string().trim().min(1).nullable(),
  })
  .strict()
  .refine((value) => value.recoveryBackoffMaxMs >= value.recoveryBackoffMinMs, {
    message: "recoveryBackoffMaxMs must be >= recoveryBackoffMinMs",
    path: ["recoveryBackoffMaxMs"],
  });

export type SupervisorSettings = z.infer<typeof SupervisorSettingsSchema>;

export const DEFAULT_SETTINGS: SupervisorSettings = {
  runsRoot: "runs/supervisor",
  probeIntervalMs: 5_000,
  probeTimeoutMs: 2_000,
  failureThreshold: 3,
  maxRecoveryAttempts: 3,
  recoveryBackoffMinMs: 500,
  recoveryBackoffMaxMs: 10_000,
  recoveryBackoffFactor: 2,
  adapterTimeoutMs: 30_000,
  startRetries: 1,
  logFile: null,
};

/** Reads the `SUPERVISOR_*` variables, leaving unset or invalid ones out. */
function readEnvironmentOverrides(): Partial<SupervisorSettings> {
  const overrides: Partial<SupervisorSettings> = {};
  const runsRoot = readOptionalString("SUPERVISOR_RUNS_ROOT");
  if (runsRoot !== undefined) overrides.runsRoot = runsRoot;
  const probeInterval = readOptionalInt("SUPERVISOR_PROBE_INTERVAL_MS", { min: 1, max: MAX_DURATION_MS });
  if (probeInterval !== undefined) overrides.probeIntervalMs = probeInterval;
  const probeTimeout = readOptionalInt("SUPERVISOR_PROBE_TIMEOUT_MS", { min: 1, max: MAX_DURATION_MS });
  if (probeTimeout !== undefined) overrides.probeTimeoutMs = probeTimeout;
  const threshold = readOptionalInt("SUPERVISOR_FAILURE_THRESHOLD", { min: 1, max: 100 });
  if (threshold !== undefined) overrides.failureThreshold = threshold;
  const attempts = readOptionalInt("SUPERVISOR_MAX_RECOVERY_ATTEMPTS", { min: 1, max: 100 });
  if (attempts !== undefined) overrides.maxRecoveryAttempts = attempts;
  const backoffMin = readOptionalInt("SUPERVISOR_RECOVERY_BACKOFF_MIN_MS", { min: 0, max: MAX_DURATION_MS });
  if (backoffMin !== undefined) overrides.recoveryBackoffMinMs = backoffMin;
  const backoffMax = readOptionalInt("SUPERVISOR_RECOVERY_BACKOFF_MAX_MS", { min: 0, max: MAX_DURATION_MS });
  if (backoffMax !== undefined) overrides.recoveryBackoffMaxMs = backoffMax;
  const factor = readOptionalNumber("SUPERVISOR_RECOVERY_BACKOFF_FACTOR", { min: 1, max: 10 });
  if (factor !== undefined) overrides.recoveryBackoffFactor = factor;
  const adapterTimeout = readOptionalInt("SUPERVISOR_ADAPTER_TIMEOUT_MS", { min: 1, max: MAX_DURATION_MS });
  if (adapterTimeout !== undefined) overrides.adapterTimeoutMs = adapterTimeout;
  const logFile = readOptionalString("SUPERVISOR_LOG_FILE");
  if (logFile !== undefined) overrides.logFile = logFile;
  return overrides;
}

/**
 * Resolves the effective settings. Precedence: explicit overrides, then
 * `SUPERVISOR_*` environment variables, then {@link DEFAULT_SETTINGS}. The
 * runs root is made absolute against the current working directory.
 */
export function loadSupervisorSettings(overrides: Partial<SupervisorSettings> = {}): SupervisorSettings {
  const merged = {
    ...DEFAULT_SETTINGS,
    ...readEnvironmentOverrides(),
    ...omitUndefinedEntries(overrides),
  };
  const parsed = SupervisorSettingsSchema.parse(merged);
  return { ...parsed, runsRoot: path.resolve(process.cwd(), parsed.runsRoot) };
}
