import { getListStore } from "@/lib/storage";
import type { ListStore } from "@/lib/storage";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMeta = Record<string, unknown>;

type LoggerOptions = {
  level?: LogLevel;
  console?: boolean; // also log to console
  key?: string; // list key to use in the store
  maxKeep?: number; // keep last N entries in the list
  store?: ListStore; // defaults to getListStore("logs")
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function parseIntFromEnv(value: string | undefined, fallback: number): number {
  const n = Number(value);
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

function levelFromEnv(value: string | undefined): LogLevel {
  const v = (value || "").toLowerCase();
  return v === "debug" || v === "info" || v === "warn" || v === "error" ? v : "info";
}

/**
 * errorMeta flattens an unknown thrown value into loggable fields.
 */
export function errorMeta(err: unknown): LogMeta {
  if (err instanceof Error) return { error: err.message, errorName: err.name };
  return { error: String(err) };
}

/**
 * StoreLogger writes one JSON line per event to the console and appends the
 * same line to a ListStore, trimmed to the newest `maxKeep` lines.
 * Persistence runs on a single promise chain so lines keep their order.
 */
export class StoreLogger {
  private readonly minLevel: LogLevel;
  private readonly alsoConsole: boolean;
  private readonly key: string;
  private readonly maxKeep: number;
  private readonly store: ListStore | undefined;
  private operationChain: Promise<void> = Promise.resolve();

  constructor(options?: LoggerOptions) {
    this.minLevel = options?.level ?? levelFromEnv(process.env.LOG_LEVEL);
    this.alsoConsole = options?.console ?? (process.env.NODE_ENV !== "production");
    this.key = options?.key ?? "guestbook:logs";
    this.maxKeep = options?.maxKeep ?? parseIntFromEnv(process.env.LOG_MAX_LINES, 5000);
    this.store = options?.store;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.minLevel];
  }

  private async persist(line: string): Promise<void> {
    const store = this.store ?? getListStore("logs");
    await store.push(this.key, line);
    await store.trimToLast(this.key, this.maxKeep);
  }

  private enqueue(line: string): void {
    this.operationChain = this.operationChain
      .then(() => this.persist(line))
      .catch((err: unknown) => {
        // keep the chain alive; the console copy (if enabled) already has the line
        if (!this.alsoConsole) console.error("logger.persist failed", err);
      });
  }

  private formatLine(level: LogLevel, message: string, meta?: LogMeta): string {
    const payload: LogMeta = {
      ts: new Date().toISOString(),
      level,
      msg: message,
      ...(meta || {}),
    };
    return JSON.stringify(payload);
  }

  log(level: LogLevel, message: string, meta?: LogMeta): void {
    if (!this.shouldLog(level)) return;

    const line = this.formatLine(level, message, meta);
    if (this.alsoConsole) {
      const printer = level === "error" ? console.error : level === "warn" ? console.warn : console.log;
      printer(line);
    }
    this.enqueue(line);
  }

  /** Resolves once every line logged so far has been persisted (or dropped). */
  flush(): Promise<void> {
    return this.operationChain;
  }

  debug(message: string, meta?: LogMeta) { this.log("debug", message, meta); }
  info(message: string, meta?: LogMeta) { this.log("info", message, meta); }
  warn(message: string, meta?: LogMeta) { this.log("warn", message, meta); }
  error(message: string, meta?: LogMeta) { this.log("error", message, meta); }
}

export const logger = new StoreLogger();
