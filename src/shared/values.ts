// Typed readers over merged raw values. Each reader takes the value's location
// so a malformed value is reported with its section, key and source file.
import type { z } from "zod";
import { formatQuantity } from "../parser/quantity.js";
import { isList, isQuantity, type ConfigValue } from "../types/config.js";
import { ParseError } from "./errors.js";

export interface ValueLocation {
  section: string;
  key: string;
  /** File that supplied the value. */
  source?: string;
}

const TRUE_WORDS = new Set(["true", "yes", "on", "1"]);
const FALSE_WORDS = new Set(["false", "no", "off", "0"]);

function invalid(message: string, loc: ValueLocation, value: ConfigValue): ParseError {
  const shown = isQuantity(value) ? formatQuantity(value) : value;
  return new ParseError(message, { path: loc.source ?? "<merged>", section: loc.section, key: loc.key }, { value: shown });
}

export function readString(value: ConfigValue | undefined, loc: ValueLocation): string | undefined {
  if (value === undefined) return undefined;
  if (isQuantity(value)) return formatQuantity(value);
  if (isList(value)) throw invalid("expected a single value, found a list", loc, value);
  return value === "" ? undefined : value;
}

export function readBoolean(value: ConfigValue | undefined, loc: ValueLocation, fallback: boolean): boolean {
  const text = readString(value, loc);
  if (text === undefined) return fallback;
  const word = text.toLowerCase();
  if (TRUE_WORDS.has(word)) return true;
  if (FALSE_WORDS.has(word)) return false;
  throw invalid(`expected a boolean, found "${text}"`, loc, text);
}

/** List items in order; a scalar is a one-item list and an empty value is an empty list. */
export function readList(value: ConfigValue | undefined, loc: ValueLocation): string[] {
  if (value === undefined) return [];
  if (isQuantity(value)) throw invalid("expected a list, found a quantity", loc, value);
  if (isList(value)) return [...value];
  return value === "" ? [] : [value];
}

/** Like readList, but whitespace also separates tokens (`LVM LVM_THINP`). */
export function readTokens(value: ConfigValue | undefined, loc: ValueLocation): string[] {
  return readList(value, loc).flatMap((item) => item.split(/\s+/).filter(Boolean));
}

export function readEnum<T extends string>(
  schema: z.ZodType<T>,
  value: ConfigValue | undefined,
  loc: ValueLocation,
  fallback: T,
): T {
  const text = readString(value, loc);
  if (text === undefined) return fallback;
  const parsed = schema.safeParse(text);
  if (!parsed.success) throw invalid(`unsupported value "${text}"`, loc, text);
  return parsed.data;
}
