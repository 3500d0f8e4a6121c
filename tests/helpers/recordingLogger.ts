import { getSessionContext } from "../../src/infra/sessionContext.js";
import { StructuredLogger, type LogLevel } from "../../src/logger.js";

export interface RecordedLogEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly payload?: unknown;
  /** Session bound through the supervision context when the entry was emitted. */
  readonly sessionId: string | null;
}

/**
 * Logger capturing entries in memory instead of writing JSON lines to stdout,
 * so tests can assert on what the supervisor reported.
 */
export class RecordingLogger extends StructuredLogger {
  public readonly entries: RecordedLogEntry[] = [];

  constructor() {
    super({ logFile: null, redactionEnabled: false });
  }

  /** Messages emitted so far, optionally restricted to one level. */
  messages(level?: LogLevel): string[] {
    return this.entries.filter((entry) => level === undefined || entry.level === level).map((entry) => entry.message);
  }

  override debug(message: string, payload?: unknown): void {
    this.record("debug", message, payload);
  }

  override info(message: string, payload?: unknown): void {
    this.record("info", message, payload);
  }

  override warn(message: string, payload?: unknown): void {
    this.record("warn", message, payload);
  }

  override error(message: string, payload?: unknown): void {
    this.record("error", message, payload);
  }

  private record(level: LogLevel, message: string, payload?: unknown): void {
    this.entries.push({ level, message, payload, sessionId: getSessionContext()?.sessionId ?? null });
  }
}
