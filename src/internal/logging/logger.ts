export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Readonly<Record<string, unknown>>;

export interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly timestamp: string;
  readonly context: LogContext;
  readonly error?: {
    readonly name: string;
    readonly message: string;
    readonly stack?: string;
  };
}

export interface LoggerOptions {
  readonly level?: LogLevel;
  readonly format?: "json" | "pretty";
  readonly context?: LogContext;
  readonly output?: (entry: LogEntry) => void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

const PRETTY_COLORS: Record<LogLevel, string> = {
  debug: "\x1b[36m",
  info: "\x1b[32m",
  warn: "\x1b[33m",
  error: "\x1b[31m"
};

const RESET = "\x1b[0m";
const DIM = "\x1b[2m";

export class Logger {
  #level: LogLevel;
  readonly #format: "json" | "pretty";
  readonly #context: LogContext;
  readonly #output: (entry: LogEntry) => void;

  constructor(options: LoggerOptions = {}) {
    this.#level = options.level ?? "info";
    this.#format = options.format ?? "json";
    this.#context = options.context ?? {};
    this.#output = options.output ?? ((entry) => this.#write(entry));
  }

  get level(): LogLevel {
    return this.#level;
  }

  debug(message: string, context?: LogContext): void {
    this.#log("debug", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.#log("info", message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.#log("warn", message, context);
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    this.#log("error", message, context, error);
  }

  child(context: LogContext): Logger {
    return new Logger({
      level: this.#level,
      format: this.#format,
      context: { ...this.#context, ...context },
      output: this.#output
    });
  }

  setLevel(level: LogLevel): void {
    this.#level = level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.#level];
  }

  #log(level: LogLevel, message: string, context?: LogContext, error?: unknown): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      context: { ...this.#context, ...context },
      ...(error === undefined ? {} : { error: toErrorRecord(error) })
    };

    this.#output(entry);
  }

  #write(entry: LogEntry): void {
    if (this.#format === "json") {
      process.stderr.write(`${JSON.stringify(entry)}\n`);
      return;
    }

    const level = PRETTY_COLORS[entry.level] + entry.level.toUpperCase().padEnd(5) + RESET;
    let line = `${DIM}${entry.timestamp}${RESET} ${level} ${entry.message}`;

    if (Object.keys(entry.context).length > 0) {
      line += ` ${DIM}${JSON.stringify(entry.context)}${RESET}`;
    }

    process.stderr.write(`${line}\n`);

    if (entry.error?.stack !== undefined) {
      process.stderr.write(`${DIM}${entry.error.stack}${RESET}\n`);
    }
  }
}

function toErrorRecord(error: unknown): NonNullable<LogEntry["error"]> {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      ...(error.stack === undefined ? {} : { stack: error.stack })
    };
  }

  return { name: "NonError", message: String(error) };
}

let defaultLogger: Logger | null = null;

export function getLogger(): Logger {
  if (defaultLogger === null) {
    const env = process.env["NODE_ENV"] ?? "development";
    defaultLogger = new Logger({
      level: env === "production" ? "info" : env === "test" ? "error" : "debug",
      format: env === "production" ? "json" : "pretty"
    });
  }

  return defaultLogger;
}

export function setLogger(logger: Logger): void {
  defaultLogger = logger;
}
