import type { Logger, LogMetadata } from "@stylepack/core";
import { STYLEPACK_LOG_LEVELS, type StylepackLogLevel } from "@stylepack/types";

export type LogLevel = StylepackLogLevel;

const ANSI_PATTERN = /\u001B\[[0-9;]*[A-Za-z]/g;

function stripAnsi(input: string): string {
  return input.replace(ANSI_PATTERN, "");
}

function isLogLevel(value: string): value is LogLevel {
  return STYLEPACK_LOG_LEVELS.some((level) => level === value);
}

function currentLevel(): LogLevel {
  const configured = (process.env.STYLEPACK_LOG_LEVEL ?? "").toLowerCase();
  return isLogLevel(configured) ? configured : "info";
}

export function isJsonMode(): boolean {
  return process.env.STYLEPACK_LOG_FORMAT === "json";
}

function shouldLog(level: LogLevel): boolean {
  return (
    STYLEPACK_LOG_LEVELS.indexOf(level) >=
    STYLEPACK_LOG_LEVELS.indexOf(currentLevel())
  );
}

function write(stream: NodeJS.WritableStream, message: string): void {
  stream.write(message.endsWith("\n") ? message : `${message}\n`);
}

function definedMetadata(metadata?: LogMetadata): Array<[string, unknown]> {
  return Object.entries(metadata ?? {}).filter(
    ([, value]) => value !== undefined && value !== null
  );
}

function emit(
  level: LogLevel,
  message: string,
  metadata?: LogMetadata,
  extra: Record<string, unknown> = {}
): void {
  if (!shouldLog(level)) {
    return;
  }
  const stream = level === "warn" || level === "error" ? process.stderr : process.stdout;

  if (isJsonMode()) {
    write(
      stream,
      JSON.stringify({
        level,
        ts: new Date().toISOString(),
        message: stripAnsi(message),
        ...Object.fromEntries(definedMetadata(metadata)),
        ...extra,
      })
    );
    return;
  }

  // Text mode shows destination and path; the rest is for JSON consumers.
  const context = [metadata?.destination, metadata?.path]
    .filter((value): value is string => typeof value === "string" && value.length > 0)
    .join(" ");
  write(stream, context ? `${message} (${context})` : message);
}

/**
 * Logger that honours `STYLEPACK_LOG_LEVEL` / `STYLEPACK_LOG_FORMAT` and
 * emits either plain text or one JSON object per line.
 */
export const logger: Logger = {
  debug(message: string, metadata?: LogMetadata): void {
    emit("debug", message, metadata);
  },
  info(message: string, metadata?: LogMetadata): void {
    emit("info", message, metadata);
  },
  warn(message: string, metadata?: LogMetadata): void {
    emit("warn", message, metadata);
  },
  error(message: string | Error, metadata?: LogMetadata): void {
    if (!(message instanceof Error)) {
      emit("error", message, metadata);
      return;
    }
    if (isJsonMode()) {
      emit("error", message.message, metadata, { stack: message.stack });
    } else {
      emit("error", message.stack ?? message.message, metadata);
    }
  },
};
