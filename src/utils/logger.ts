import chalk from "chalk";

export type Level = "debug" | "info" | "warn" | "error";

export type LogMeta = Record<string, unknown>;

const levelOrder: Record<Level, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const levelColor: Record<Level, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

export function parseLevel(raw: string | undefined, fallback: Level = "info"): Level {
  const value = raw?.trim().toLowerCase();
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  return fallback;
}

// errors raised by Node internals may come from another realm and fail `instanceof Error`
function isErrorLike(value: unknown): value is Error {
  return value instanceof Error || Object.prototype.toString.call(value) === "[object Error]";
}

function errorReplacer(_key: string, value: unknown) {
  if (isErrorLike(value)) {
    return { name: value.name, message: value.message };
  }
  return value;
}

/** Shared by a logger and all of its children, so `setLevel` reaches every scope. */
export interface Threshold {
  level: Level;
}

/**
 * One line per event: timestamp, colored level, optional scope, message and
 * the JSON meta. Everything goes to stderr; stdout carries model output.
 */
export class Logger {
  constructor(
    private readonly threshold: Threshold = { level: parseLevel(process.env.LOG_LEVEL) },
    private readonly scope?: string,
    private readonly bound: LogMeta = {}
  ) {}

  /** A logger that prefixes `scope` and adds `bound` to every event's meta. */
  child(scope: string, bound: LogMeta = {}): Logger {
    const nested = this.scope ? `${this.scope}:${scope}` : scope;
    return new Logger(this.threshold, nested, { ...this.bound, ...bound });
  }

  setLevel(level: Level) {
    this.threshold.level = level;
  }

  get level(): Level {
    return this.threshold.level;
  }

  isEnabled(level: Level) {
    return levelOrder[level] >= levelOrder[this.threshold.level];
  }

  log(level: Level, message: string, meta?: LogMeta) {
    if (!this.isEnabled(level)) return;
    console.error(this.format(level, message, { ...this.bound, ...meta }));
  }

  debug(message: string, meta?: LogMeta) {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: LogMeta) {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: LogMeta) {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: LogMeta) {
    this.log("error", message, meta);
  }

  private format(level: Level, message: string, meta: LogMeta) {
    const head = [new Date().toISOString(), levelColor[level](level.toUpperCase())];
    if (this.scope) head.push(chalk.magenta(`[${this.scope}]`));
    const line = `${head.join(" ")} ${message}`;
    return Object.keys(meta).length ? `${line} ${chalk.gray(JSON.stringify(meta, errorReplacer))}` : line;
  }
}

export const logger = new Logger();
