import { STYLEPACK_LOG_LEVELS, type StylepackLogLevel } from "@stylepack/types";
import pino, { type DestinationStream, type Logger as PinoInstance } from "pino";

export type LogMetadata = {
  destination?: string;
  path?: string;
  [key: string]: unknown;
};

export type Logger = {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string | Error, metadata?: LogMetadata): void;
};

export type LoggerConfig = {
  /** Defaults to `STYLEPACK_LOG_LEVEL`, then `info`. */
  level?: StylepackLogLevel;
  /** pino-pretty output; defaults to on outside production. */
  prettyPrint?: boolean;
  /** Fields bound to every line. */
  baseContext?: Record<string, unknown>;
  /** Where JSON lines go when not pretty-printing; stdout by default. */
  destination?: DestinationStream;
};

function isLogLevel(value: string): value is StylepackLogLevel {
  return STYLEPACK_LOG_LEVELS.some((level) => level === value);
}

/** Reads a level name case-insensitively; unknown names mean `info`. */
export function resolveLogLevel(value: string | undefined): StylepackLogLevel {
  const normalized = (value ?? "").trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : "info";
}

function levelEnabled(level: StylepackLogLevel, threshold: StylepackLogLevel): boolean {
  return STYLEPACK_LOG_LEVELS.indexOf(level) >= STYLEPACK_LOG_LEVELS.indexOf(threshold);
}

/** pino-backed logger, pretty-printed through pino-pretty for terminals. */
export class StructuredLogger implements Logger {
  private readonly pino: PinoInstance;

  constructor(config: LoggerConfig = {}) {
    const level = config.level ?? resolveLogLevel(process.env.STYLEPACK_LOG_LEVEL);
    const pretty = config.prettyPrint ?? process.env.NODE_ENV !== "production";
    const base = { name: "stylepack", ...config.baseContext };

    this.pino = pretty
      ? pino({
          level,
          base,
          transport: {
            target: "pino-pretty",
            options: {
              colorize: true,
              translateTime: "SYS:standard",
              ignore: "pid,hostname,name",
            },
          },
        })
      : pino({ level, base }, config.destination ?? pino.destination(1));
  }

  get level(): StylepackLogLevel {
    return resolveLogLevel(this.pino.level);
  }

  debug(message: string, metadata: LogMetadata = {}): void {
    this.pino.debug(metadata, message);
  }

  info(message: string, metadata: LogMetadata = {}): void {
    this.pino.info(metadata, message);
  }

  warn(message: string, metadata: LogMetadata = {}): void {
    this.pino.warn(metadata, message);
  }

  error(message: string | Error, metadata: LogMetadata = {}): void {
    if (typeof message === "string") {
      this.pino.error(metadata, message);
      return;
    }
    this.pino.error({ ...metadata, err: message }, message.message);
  }
}

/**
 * Plain `[LEVEL] message [key="value"]` lines for hosts where pino's worker
 * transport is unwanted. Warnings and errors go to stderr.
 */
export class ConsoleLogger implements Logger {
  debug(message: string, metadata?: LogMetadata): void {
    this.emit("debug", message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.emit("info", message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.emit("warn", message, metadata);
  }

  error(message: string | Error, metadata?: LogMetadata): void {
    if (typeof message === "string") {
      this.emit("error", message, metadata);
      return;
    }
    this.emit("error", message.message, metadata, message.stack);
  }

  private emit(
    level: StylepackLogLevel,
    message: string,
    metadata: LogMetadata = {},
    trailer?: string
  ): void {
    if (!levelEnabled(level, resolveLogLevel(process.env.STYLEPACK_LOG_LEVEL))) {
      return;
    }
    const pairs = Object.entries(metadata)
      .filter(([, value]) => value !== undefined && value !== null)
      .map(([key, value]) => `${key}=${JSON.stringify(value)}`);
    const suffix = pairs.length > 0 ? ` [${pairs.join(" ")}]` : "";
    const line = `[${level.toUpperCase()}] ${message}${suffix}`;
    const stream = level === "warn" || level === "error" ? process.stderr : process.stdout;
    stream.write(trailer ? `${line}\n${trailer}\n` : `${line}\n`);
  }
}

export function createDefaultLogger(config?: LoggerConfig): Logger {
  return new StructuredLogger(config);
}
