export { DEFAULT_SETTINGS, loadSupervisorSettings, type SupervisorSettings } from "./config/settings.js";
export {
  ENVIRONMENT_KINDS,
  isEnvironmentKind,
  type DriverConfig,
  type EnvironmentDriver,
  type EnvironmentKind,
  type HealthVerdict,
} from "./drivers/contract.js";
export { DriverRegistry } from "./drivers/registry.js";
export {
  CaptureError,
  InvalidTransitionError,
  NotFoundError,
  ProbeError,
  RecoveryExhaustedError,
  RestoreError,
  ShutdownError,
  SnapshotIntegrityError,
  StartupError,
  SupervisorError,
  TimeoutExceededError,
} from "./errors.js";
export {
  EVENT_KINDS,
  EventNotifier,
  EventSubscription,
  type EventFilter,
  type EventKind,
  type SupervisorEvent,
} from "./events/notifier.js";
export { StructuredLogger, type LogEntry, type LoggerOptions } from "./logger.js";
export { HealthMonitor, type ProbeOutcome } from "./monitor/healthMonitor.js";
export { RecoveryCoordinator, type RecoveryOutcome } from "./recovery/recoveryCoordinator.js";
export { createSupervisorServer, SERVER_NAME, SERVER_VERSION } from "./server.js";
export { GlobalMemory } from "./state/globalMemory.js";
export {
  binaryPayload,
  decodeJsonPayload,
  jsonPayload,
  textPayload,
  type PayloadEncoding,
  type StatePayload,
} from "./state/payload.js";
export { SESSION_STATES, canTransition, isTerminalState, type SessionState } from "./state/sessionLifecycle.js";
export { SessionRegistry, type Session } from "./state/sessionRegistry.js";
export { GLOBAL_OWNER, SnapshotStore, type SnapshotManifest } from "./state/snapshotStore.js";
export { RunSupervisor, type RunSupervisorOptions } from "./supervisor.js";
