import { appendFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
}

/** Anything with a `write(line)` method; `process.stdout` by default. */
export interface LogStream {
  write(chunk: string): unknown;
}

export interface LoggerOptions {
  /** Mirrors every entry to this file; `null` or absent disables mirroring. */
  readonly logFile?: string | null;
  /** Entries below this level are dropped. Defaults to `info`. */
  readonly level?: LogLevel;
  /** Destination of the JSON lines; `null` silences it. Defaults to stdout. */
  readonly stream?: LogStream | null;
  /** Optional listener invoked every time an entry is emitted. */
  readonly onEntry?: (entry: LogEntry) => void;
}

/**
 * Output shared by a logger and its children, so a child's file writes join
 * the same ordered queue and `flush()` on any of them waits for all.
 */
export class LogSink {
  private writeQueue: Promise<void> = Promise.resolve();
  private directoryReady = false;

  constructor(
    private readonly logFile: string | undefined,
    private readonly stream: LogStream | undefined,
    private readonly listener: ((entry: LogEntry) => void) | undefined,
  ) {}

  emit(entry: LogEntry): void {
    const line = `${JSON.stringify(entry)}\n`;
    this.stream?.write(line);
    this.listener?.(structuredClone(entry));
    const { logFile } = this;
    if (!logFile) {
      return;
    }
    this.writeQueue = this.writeQueue.then(async () => {
      try {
        if (!this.directoryReady) {
          await mkdir(dirname(logFile), { recursive: true });
          this.directoryReady = true;
        }
        await appendFile(logFile, line, "utf8");
      } catch (err) {
        const failure: LogEntry = {
          timestamp: new Date().toISOString(),
          level: "error",
          message: "log_file_write_failed",
          payload: err instanceof Error ? { message: err.message } : { error: String(err) },
        };
        process.stderr.write(`${JSON.stringify(failure)}\n`);
        // Retry directory creation on the next entry.
        this.directoryReady = false;
      }
    });
  }

  flush(): Promise<void> {
    return this.writeQueue;
  }
}

/**
 * Structured logger that emits JSON lines on stdout and optionally mirrors them
 * to a file. File writes are queued sequentially to guarantee ordering.
 */
export class StructuredLogger {
  private readonly threshold: number;

  constructor(
    options: LoggerOptions = {},
    private readonly bindings: Readonly<Record<string, unknown>> = {},
    private readonly sink: LogSink = new LogSink(
      options.logFile ?? undefined,
      options.stream === null ? undefined : options.stream ?? process.stdout,
      options.onEntry,
    ),
    readonly level: LogLevel = options.level ?? "info",
  ) {
    this.threshold = LEVEL_RANK[level];
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

  isEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= this.threshold;
  }

  /**
   * Logger whose object payloads carry `bindings` as extra fields. Fields set
   * on the payload itself win over bound ones.
   */
  child(bindings: Readonly<Record<string, unknown>>): StructuredLogger {
    return new StructuredLogger({}, { ...this.bindings, ...bindings }, this.sink, this.level);
  }

  /**
   * Waits for all pending log writes to be flushed. Tests rely on this helper
   * to deterministically assert the content of mirrored log files.
   */
  flush(): Promise<void> {
    return this.sink.flush();
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    if (!this.isEnabled(level)) {
      return;
    }
    const merged = this.bind(payload);
    this.sink.emit({
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(merged !== undefined ? { payload: merged } : {}),
    });
  }

  private bind(payload: unknown): unknown {
    if (Object.keys(this.bindings).length === 0) {
      return payload;
    }
    if (payload === undefined) {
      return { ...this.bindings };
    }
    if (isPlainRecord(payload)) {
      return { ...this.bindings, ...payload };
    }
    return { ...this.bindings, value: payload };
  }
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
