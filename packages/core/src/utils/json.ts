import { isDeepStrictEqual } from "node:util";
import { createStylepackError, type JsonValue } from "@stylepack/types";
import {
  applyEdits,
  type FormattingOptions,
  modify,
  type ParseError,
  parse,
  printParseErrorCode,
} from "jsonc-parser";
import type { LogMetadata, Logger } from "../interfaces/logger";

export type JsonRecord = Record<string, JsonValue>;

/** A value to set at an object key path inside a JSON document. */
export type JsonEdit = {
  path: readonly string[];
  value: JsonValue;
};

const FORMATTING: FormattingOptions = {
  insertSpaces: true,
  tabSize: 2,
  eol: "\n",
};

export function isJsonRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isStringArray(
  value: JsonValue | undefined
): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

/** Union that keeps first-seen order and drops repeats. */
export function unionInOrder(...lists: ReadonlyArray<readonly string[]>): string[] {
  const seen = new Set<string>();
  for (const list of lists) {
    for (const item of list) {
      seen.add(item);
    }
  }
  return Array.from(seen);
}

/**
 * Parses an existing JSON or JSONC document (tsconfig.json and VS Code
 * files routinely carry comments and trailing commas). The top level must
 * be an object.
 */
export function parseJsonDocument(contents: string, filePath: string): JsonRecord {
  const errors: ParseError[] = [];
  const parsed: unknown = parse(contents, errors, { allowTrailingComma: true });
  const [first] = errors;
  if (first) {
    throw createStylepackError({
      code: "EXISTING_FILE_UNREADABLE",
      message: `Could not parse ${filePath}: ${printParseErrorCode(first.error)} at offset ${first.offset}`,
      details: { path: filePath },
      help: "Fix the syntax error or rerun with --only to skip this destination.",
    });
  }
  if (!isJsonRecord(parsed)) {
    throw createStylepackError({
      code: "EXISTING_FILE_UNREADABLE",
      message: `Expected ${filePath} to contain a JSON object`,
      details: { path: filePath },
    });
  }
  return parsed;
}

export function stringifyJson(value: JsonValue): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}

/** Edits that turn `current` into `next`, descending into nested objects. */
export function diffJsonRecords(
  current: JsonRecord,
  next: JsonRecord,
  prefix: readonly string[] = []
): JsonEdit[] {
  const edits: JsonEdit[] = [];
  for (const [key, value] of Object.entries(next)) {
    const previous = current[key];
    if (isJsonRecord(previous) && isJsonRecord(value)) {
      edits.push(...diffJsonRecords(previous, value, [...prefix, key]));
    } else if (!isDeepStrictEqual(previous, value)) {
      edits.push({ path: [...prefix, key], value });
    }
  }
  return edits;
}

function withValueAt(
  record: JsonRecord,
  [key, ...rest]: readonly string[],
  value: JsonValue
): JsonRecord {
  if (key === undefined) {
    return record;
  }
  if (rest.length === 0) {
    return { ...record, [key]: value };
  }
  const child = record[key];
  return {
    ...record,
    [key]: withValueAt(isJsonRecord(child) ? child : {}, rest, value),
  };
}

function describeJsonPath(path: readonly string[]): string {
  return path
    .map((segment, index) => {
      if (/^[A-Za-z_$][\w$]*$/.test(segment)) {
        return index === 0 ? segment : `.${segment}`;
      }
      return `[${JSON.stringify(segment)}]`;
    })
    .join("");
}

/**
 * Applies `edits` to an existing JSONC document in place, so comments and
 * layout outside the edited values stay as they were. Without an existing
 * document the edits build a new two-space JSON file.
 */
export function writeJsonEdits(
  existing: string | undefined,
  edits: readonly JsonEdit[],
  log: { logger: Logger; metadata: LogMetadata }
): string {
  for (const { path } of edits) {
    log.logger.debug(`Set ${describeJsonPath(path)}`, log.metadata);
  }

  if (existing === undefined) {
    return stringifyJson(
      edits.reduce<JsonRecord>(
        (document, { path, value }) => withValueAt(document, path, value),
        {}
      )
    );
  }

  if (edits.length === 0) {
    return existing;
  }
  let text = existing;
  for (const { path, value } of edits) {
    text = applyEdits(
      text,
      modify(text, [...path], value, { formattingOptions: FORMATTING })
    );
  }
  return text.endsWith("\n") ? text : `${text}\n`;
}
