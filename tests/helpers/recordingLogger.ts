import { StructuredLogger, type LogLevel } from "../../src/logger.js";

export interface RecordedEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly payload?: unknown;
}

/**
 * {@link StructuredLogger} keeping every entry in memory instead of writing
 * JSON lines, so tests can assert on event names and payloads.
 */
export class RecordingLogger extends StructuredLogger {
  public readonly entries: RecordedEntry[] = [];

  constructor() {
    super({ logFile: null, stream: "none", redactionEnabled: false, minLevel: "debug" });
  }

  /** Entries carrying {@link message}, in emission order. */
  find(message: string): RecordedEntry[] {
    return this.entries.filter((entry) => entry.message === message);
  }

  messages(): string[] {
    return this.entries.map((entry) => entry.message);
  }

  override debug(message: string, payload?: unknown): void {
    this.entries.push({ level: "debug", message, payload });
  }

  override info(message: string, payload?: unknown): void {
    this.entries.push({ level: "info", message, payload });
  }

  override warn(message: string, payload?: unknown): void {
    this.entries.push({ level: "warn", message, payload });
  }

  override error(message: string, payload?: unknown): void {
    this.entries.push({ level: "error", message, payload });
  }
}
