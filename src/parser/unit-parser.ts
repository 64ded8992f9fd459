// Line-oriented parser for product configuration files.
// Grammar: [Section] headers, `key = value` lines, indented continuation lines
// that turn a key into an ordered list, `#`/`;` comments, blank lines.
// Single-line values of the form `<number> <byte unit>` become Quantity values.
import { readFileSync } from "node:fs";
import { ParseError, ProductConfigError, ProductConfigErrorCode } from "../shared/errors.js";
import type { ConfigEntry, ConfigFile, ConfigValue } from "../types/config.js";
import { matchQuantity } from "./quantity.js";

export interface ParseOptions {
  /** Let a repeated key (or section) replace the earlier one instead of failing. */
  allowDuplicateKeys?: boolean;
}

const SECTION_HEADER = /^\[([^[\]]+)\]$/;

interface PendingKey {
  readonly entries: Map<string, ConfigEntry>;
  readonly section: string;
  readonly key: string;
  readonly line: number;
  readonly head: string;
  readonly items: string[];
}

export function parseConfigText(text: string, path: string, options: ParseOptions = {}): ConfigFile {
  const allowDuplicates = options.allowDuplicateKeys ?? false;
  const sections = new Map<string, Map<string, ConfigEntry>>();
  let current: { name: string; entries: Map<string, ConfigEntry> } | null = null;
  let pending: PendingKey | null = null;

  const lines = text.split(/\r?\n/);
  for (const [index, raw] of lines.entries()) {
    const line = index + 1;
    const trimmed = raw.trim();
    if (trimmed === "" || trimmed.startsWith("#") || trimmed.startsWith(";")) continue;

    if (/^\s/.test(raw)) {
      if (!pending) {
        throw new ParseError("continuation line outside a value", { path, line, section: current?.name });
      }
      pending.items.push(trimmed);
      continue;
    }

    if (pending) {
      commit(pending, path);
      pending = null;
    }

    if (trimmed.startsWith("[")) {
      if (!trimmed.includes("]")) throw new ParseError("unterminated section header", { path, line }, { text: trimmed });
      const name = SECTION_HEADER.exec(trimmed)?.[1]?.trim();
      if (!name) throw new ParseError("malformed section header", { path, line }, { text: trimmed });
      let entries = sections.get(name);
      if (entries && !allowDuplicates) {
        throw new ParseError(`duplicate section [${name}]`, { path, line, section: name });
      }
      if (!entries) {
        entries = new Map();
        sections.set(name, entries);
      }
      current = { name, entries };
      continue;
    }

    const eq = raw.indexOf("=");
    if (eq < 0) throw new ParseError('expected "key = value"', { path, line, section: current?.name }, { text: trimmed });
    if (!current) throw new ParseError("key outside of any section", { path, line }, { text: trimmed });
    const key = raw.slice(0, eq).trim();
    if (key === "") throw new ParseError("empty key", { path, line, section: current.name });
    if (current.entries.has(key) && !allowDuplicates) {
      throw new ParseError(`duplicate key "${key}"`, { path, line, section: current.name, key });
    }
    pending = { entries: current.entries, section: current.name, key, line, head: raw.slice(eq + 1).trim(), items: [] };
  }

  if (pending) commit(pending, path);

  return Object.freeze({ path, sections });
}

function commit(pending: PendingKey, path: string): void {
  pending.entries.set(pending.key, Object.freeze({ value: finishValue(pending, path), line: pending.line }));
}

function finishValue(pending: PendingKey, path: string): ConfigValue {
  const location = { path, line: pending.line, section: pending.section, key: pending.key };
  if (pending.items.length > 0) {
    return Object.freeze(pending.head === "" ? [...pending.items] : [pending.head, ...pending.items]);
  }
  if (pending.head === "") return "";
  const match = matchQuantity(pending.head);
  if (match.kind === "bad-unit") {
    throw new ParseError(`unrecognized quantity unit "${match.unit}"`, location, { value: pending.head });
  }
  return match.kind === "quantity" ? match.quantity : pending.head;
}

/** Read and parse one configuration file from disk. */
export function loadConfigFile(path: string, options: ParseOptions = {}): ConfigFile {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (err) {
    throw new ProductConfigError(
      ProductConfigErrorCode.FILE_UNREADABLE,
      `Cannot read configuration file ${path}: ${err instanceof Error ? err.message : String(err)}`,
      { path },
    );
  }
  return parseConfigText(text, path, options);
}

export function lookup(file: ConfigFile, section: string, key: string): ConfigEntry | undefined {
  return file.sections.get(section)?.get(key);
}

/** A scalar string value, or `undefined` when the key is absent, empty, or not a plain string. */
export function lookupString(file: ConfigFile, section: string, key: string): string | undefined {
  const value = lookup(file, section, key)?.value;
  return typeof value === "string" && value !== "" ? value : undefined;
}
