import { Buffer } from "node:buffer";
import { appendFile, mkdir, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";
import process from "node:process";

import { getTurnContext } from "./infra/turnContext.js";
import { isErrnoException } from "./nodePrimitives.js";

/** Placeholder inserted when a secret is redacted. */
const REDACTION_TOKEN = "[REDACTED]";

const REDACTION_ENABLE_TOKENS = new Set(["on", "true", "yes", "1", "enable", "enabled"]);
const REDACTION_DISABLE_TOKENS = new Set(["off", "false", "no", "0", "disable", "disabled"]);

/** Payload keys whose values are replaced when redaction is enabled. */
const SENSITIVE_KEYS = new Set([
  "authorization",
  "api_key",
  "api-key",
  "apikey",
  "x-api-key",
  "token",
  "access_token",
  "refresh_token",
  "password",
  "secret",
]);

/**
 * Parses the `TOOLGATE_LOG_REDACT` directive. Accepts comma-separated toggles
 * and literal substrings, e.g. `"on,sk-"`; providing substrings without an
 * explicit toggle enables redaction.
 */
export function parseRedactionDirectives(raw: string | undefined): { enabled: boolean; tokens: string[] } {
  if (!raw) {
    return { enabled: false, tokens: [] };
  }

  let enabled: boolean | undefined;
  const tokens: string[] = [];
  for (const directive of raw.split(",").map((value) => value.trim()).filter((value) => value.length > 0)) {
    const normalised = directive.toLowerCase();
    if (REDACTION_DISABLE_TOKENS.has(normalised)) {
      enabled = false;
    } else if (REDACTION_ENABLE_TOKENS.has(normalised)) {
      enabled = true;
    } else {
      tokens.push(directive);
    }
  }

  return { enabled: enabled ?? tokens.length > 0, tokens: Array.from(new Set(tokens)) };
}

/** Size of the mirror file (bytes) that triggers a rotation. */
const DEFAULT_MAX_FILE_SIZE = 5 * 1024 * 1024;
/** Rotated files kept next to the active one. */
const DEFAULT_MAX_FILE_COUNT = 5;

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  turn_id?: string;
  conversation_id?: string | null;
  payload?: unknown;
}

export interface LoggerOptions {
  /** Optional file mirroring every entry (JSON lines). */
  readonly logFile?: string | null;
  /** Maximum size in bytes before the mirror file is rotated. */
  readonly maxFileSizeBytes?: number;
  /** Number of files retained during rotation (including the active one). */
  readonly maxFileCount?: number;
  /**
   * Stream receiving the JSON lines. Defaults to stderr because stdout carries
   * the MCP stdio protocol when the management server runs.
   */
  readonly stream?: "stdout" | "stderr" | "none";
  /** Literal substrings or patterns scrubbed from string payload values. */
  readonly redactSecrets?: Array<string | RegExp>;
  /** Explicit redaction toggle; falls back to `TOOLGATE_LOG_REDACT`. */
  readonly redactionEnabled?: boolean;
  /** Entries below this level are dropped. Defaults to `info`. */
  readonly minLevel?: LogLevel;
  /** Listener invoked with a copy of every emitted entry. */
  readonly onEntry?: (entry: LogEntry) => void;
}

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

/**
 * Structured logger emitting JSON lines and optionally mirroring them to a
 * file. File writes are queued sequentially to keep their order.
 */
export class StructuredLogger {
  private readonly logFile: string | null;
  private readonly maxFileSizeBytes: number;
  private readonly maxFileCount: number;
  private readonly stream: "stdout" | "stderr" | "none";
  private readonly redactSecrets: Array<string | RegExp>;
  private readonly redactionEnabled: boolean;
  private readonly minRank: number;
  private readonly entryListener?: (entry: LogEntry) => void;
  private writeQueue: Promise<void> = Promise.resolve();
  /** Whether the mirror file's directory has been created already. */
  private logDirectoryReady = false;

  constructor(options: LoggerOptions = {}) {
    this.logFile = options.logFile ?? null;
    this.maxFileSizeBytes = options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE;
    this.maxFileCount = Math.max(1, options.maxFileCount ?? DEFAULT_MAX_FILE_COUNT);
    this.stream = options.stream ?? "stderr";
    const directives = parseRedactionDirectives(process.env.TOOLGATE_LOG_REDACT);
    this.redactSecrets = [...new Set<string | RegExp>([...directives.tokens, ...(options.redactSecrets ?? [])])];
    this.redactionEnabled = options.redactionEnabled ?? directives.enabled;
    this.minRank = LEVEL_RANK[options.minLevel ?? "info"];
    this.entryListener = options.onEntry;
  }

  info(message: string, payload?: unknown): void {
    this.log("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.log("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.log("error", message, payload);
  }

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
  }

  /** Waits for pending file writes. Tests use it before reading the mirror. */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    if (LEVEL_RANK[level] < this.minRank) {
      return;
    }

    const turn = getTurnContext();
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(turn ? { turn_id: turn.turnId, conversation_id: turn.conversationId } : {}),
      ...(payload !== undefined ? { payload: this.redact(payload) } : {}),
    };
    const line = `${JSON.stringify(entry)}\n`;

    if (this.stream === "stdout") {
      process.stdout.write(line);
    } else if (this.stream === "stderr") {
      process.stderr.write(line);
    }
    this.entryListener?.(structuredClone(entry));

    const logFile = this.logFile;
    if (!logFile) {
      return;
    }
    this.writeQueue = this.writeQueue.then(async () => {
      try {
        await this.ensureLogDestination(logFile);
        await this.rotateIfNeeded(logFile, Buffer.byteLength(line, "utf8"));
        await appendFile(logFile, line, "utf8");
      } catch (error) {
        reportInternalFailure("log_file_write_failed", error);
        // Retry the directory creation on the next entry.
        this.logDirectoryReady = false;
      }
    });
  }

  private async ensureLogDestination(logFile: string): Promise<void> {
    if (this.logDirectoryReady) {
      return;
    }
    await mkdir(dirname(logFile), { recursive: true });
    this.logDirectoryReady = true;
  }

  /** Rotates the mirror file when appending {@link pendingBytes} would exceed the limit. */
  private async rotateIfNeeded(logFile: string, pendingBytes: number): Promise<void> {
    let currentSize: number;
    try {
      currentSize = (await stat(logFile)).size;
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return;
      }
      throw error;
    }
    if (currentSize + pendingBytes <= this.maxFileSizeBytes) {
      return;
    }

    if (this.maxFileCount === 1) {
      await rm(logFile, { force: true });
      return;
    }
    await rm(`${logFile}.${this.maxFileCount - 1}`, { force: true });
    for (let index = this.maxFileCount - 2; index >= 1; index -= 1) {
      await renameIfPresent(`${logFile}.${index}`, `${logFile}.${index + 1}`);
    }
    await renameIfPresent(logFile, `${logFile}.1`);
  }

  private redact(value: unknown): unknown {
    if (!this.redactionEnabled) {
      return value;
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.redact(item));
    }
    if (typeof value === "string") {
      return this.scrub(value);
    }
    if (value && typeof value === "object") {
      const result: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        result[key] = SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTION_TOKEN : this.redact(entry);
      }
      return result;
    }
    return value;
  }

  private scrub(value: string): string {
    let sanitized = value;
    for (const pattern of this.redactSecrets) {
      if (typeof pattern === "string") {
        if (pattern.length > 0) {
          sanitized = sanitized.split(pattern).join(REDACTION_TOKEN);
        }
      } else {
        sanitized = sanitized.replace(pattern, REDACTION_TOKEN);
      }
    }
    return sanitized;
  }
}

async function renameIfPresent(source: string, target: string): Promise<void> {
  try {
    await rename(source, target);
  } catch (error) {
    if (!(isErrnoException(error) && error.code === "ENOENT")) {
      throw error;
    }
  }
}

/** Failures of the logger itself go to stderr as a bare entry. */
function reportInternalFailure(message: string, error: unknown): void {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level: "error",
    message,
    payload: { message: error instanceof Error ? error.message : String(error) },
  };
  process.stderr.write(`${JSON.stringify(entry)}\n`);
}
