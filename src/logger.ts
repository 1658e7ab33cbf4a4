import { appendFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";

/** Placeholder inserted when a sensitive value is redacted. */
const REDACTION_TOKEN = "[REDACTED]";

/** Directives accepted by `COACH_LOG_REDACT` to turn redaction on. */
const REDACTION_ENABLE_TOKENS = new Set(["on", "true", "yes", "1", "enable", "enabled"]);

/** Payload keys whose values are replaced when redaction is enabled. */
const SENSITIVE_KEYS = new Set([
  "authorization",
  "x-api-key",
  "api-key",
  "api_key",
  "apikey",
  "token",
  "access_token",
  "refresh_token",
  "secret",
  "password",
]);

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Numeric rank used to filter entries below the configured threshold. */
const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
}

/** Minimal writable surface the logger needs; `process.stderr` satisfies it. */
export interface LogSink {
  write(chunk: string): unknown;
}

export interface LoggerOptions {
  /** Optional file mirroring every emitted line. */
  readonly logFile?: string | null;
  /** Entries below this level are dropped. Defaults to `info`. */
  readonly level?: LogLevel;
  /**
   * Destination of the JSON lines. Defaults to stderr because stdout carries
   * the MCP protocol frames when the stdio transport is active.
   */
  readonly sink?: LogSink;
  /** Explicit redaction toggle; falls back to `COACH_LOG_REDACT`. */
  readonly redactionEnabled?: boolean;
  /** Fields merged into every object payload. */
  readonly bindings?: Record<string, unknown>;
  /** Optional listener invoked every time an entry is emitted. */
  readonly onEntry?: (entry: LogEntry) => void;
}

/** Interprets the `COACH_LOG_REDACT` directive. */
export function parseRedactionDirective(raw: string | undefined): boolean {
  if (!raw) {
    return false;
  }
  return REDACTION_ENABLE_TOKENS.has(raw.trim().toLowerCase());
}

/**
 * Structured logger that emits JSON lines and optionally mirrors them to a
 * file. File writes are queued sequentially so lines keep their order.
 */
export class StructuredLogger {
  private readonly logFile: string | null;
  private readonly threshold: number;
  private readonly sink: LogSink;
  private readonly redactionEnabled: boolean;
  private readonly bindings: Record<string, unknown>;
  private readonly entryListener: ((entry: LogEntry) => void) | undefined;
  private writeQueue: Promise<void> = Promise.resolve();
  private logDirectoryReady = false;

  constructor(options: LoggerOptions = {}) {
    this.logFile = options.logFile ?? null;
    this.threshold = LEVEL_RANK[options.level ?? "info"];
    this.sink = options.sink ?? process.stderr;
    this.redactionEnabled = options.redactionEnabled ?? parseRedactionDirective(process.env.COACH_LOG_REDACT);
    this.bindings = { ...(options.bindings ?? {}) };
    this.entryListener = options.onEntry;
  }

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
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

  /**
   * Returns a logger sharing this one's destination whose object payloads are
   * enriched with `bindings` (for example the run identifier).
   */
  child(bindings: Record<string, unknown>): StructuredLogger {
    return new BoundLogger(this, bindings);
  }

  /** Waits for pending file writes. Tests use it before reading the mirror. */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  /** @internal Entry point shared with bound loggers. */
  protected log(level: LogLevel, message: string, payload?: unknown): void {
    if (LEVEL_RANK[level] < this.threshold) {
      return;
    }
    const merged = this.mergeBindings(payload, this.bindings);
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(merged !== undefined ? { payload: this.redact(merged) } : {}),
    };
    this.emit(entry);
  }

  /** Merges bindings into plain-object payloads; other payloads stay as they are. */
  protected mergeBindings(payload: unknown, bindings: Record<string, unknown>): unknown {
    if (Object.keys(bindings).length === 0) {
      return payload;
    }
    if (payload === undefined) {
      return { ...bindings };
    }
    if (payload && typeof payload === "object" && !Array.isArray(payload)) {
      return { ...bindings, ...payload };
    }
    return { ...bindings, value: payload };
  }

  private emit(entry: LogEntry): void {
    const line = `${JSON.stringify(entry)}\n`;
    this.sink.write(line);
    if (this.entryListener) {
      this.entryListener(structuredClone(entry));
    }
    const logFile = this.logFile;
    if (!logFile) {
      return;
    }
    this.writeQueue = this.writeQueue
      .then(async () => {
        try {
          await this.ensureLogDirectory(logFile);
          await appendFile(logFile, line, "utf8");
        } catch (error) {
          const failure: LogEntry = {
            timestamp: new Date().toISOString(),
            level: "error",
            message: "log_file_write_failed",
            payload: { file: logFile, message: error instanceof Error ? error.message : String(error) },
          };
          this.sink.write(`${JSON.stringify(failure)}\n`);
          this.logDirectoryReady = false;
        }
      });
  }

  private async ensureLogDirectory(logFile: string): Promise<void> {
    if (this.logDirectoryReady) {
      return;
    }
    await mkdir(dirname(logFile), { recursive: true });
    this.logDirectoryReady = true;
  }

  private redact(value: unknown): unknown {
    if (!this.redactionEnabled) {
      return value;
    }
    return deepRedact(value);
  }
}

/** Logger view that prepends fixed bindings before delegating to its parent. */
class BoundLogger extends StructuredLogger {
  constructor(
    private readonly parent: StructuredLogger,
    private readonly extra: Record<string, unknown>,
  ) {
    super({ level: "debug" });
  }

  protected override log(level: LogLevel, message: string, payload?: unknown): void {
    const merged = this.mergeBindings(payload, this.extra);
    switch (level) {
      case "debug":
        this.parent.debug(message, merged);
        break;
      case "info":
        this.parent.info(message, merged);
        break;
      case "warn":
        this.parent.warn(message, merged);
        break;
      case "error":
        this.parent.error(message, merged);
        break;
    }
  }

  override child(bindings: Record<string, unknown>): StructuredLogger {
    return new BoundLogger(this.parent, { ...this.extra, ...bindings });
  }

  override async flush(): Promise<void> {
    await this.parent.flush();
  }
}

function deepRedact(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => deepRedact(item));
  }
  if (value && typeof value === "object") {
    const result: Record<string, unknown> = {};
    const entries: Array<[string, unknown]> = Object.entries(value);
    for (const [key, entry] of entries) {
      result[key] = SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTION_TOKEN : deepRedact(entry);
    }
    return result;
  }
  return value;
}
