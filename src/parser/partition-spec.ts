import { PartitionSyntaxError } from "../shared/errors.js";
import { isQuantity, type ConfigValue, type Quantity } from "../types/config.js";
import type { PartitionRule } from "../types/storage.js";
import { formatQuantity, matchQuantity, parseQuantity } from "./quantity.js";

/**
 * `layout` reads `default_partitioning`: `<mount> (min|size <quantity>)`, or a
 * bare mount point for a rule without a size.
 * `requirements` reads `req_partition_sizes`: `<mount> <quantity>` or
 * `<mount> (min <quantity>)`.
 */
export type PartitionSpecMode = "layout" | "requirements";

export interface PartitionSpecOptions {
  mode: PartitionSpecMode;
  /** Included in error context, e.g. "Storage.default_partitioning". */
  key?: string;
  source?: string;
}

const RULE_LINE = /^([^\s(]+)\s*(.*)$/;
const QUALIFIED = /^(\S+)\s+(.+)$/;

export function parsePartitionRules(value: ConfigValue | undefined, options: PartitionSpecOptions): PartitionRule[] {
  if (value === undefined) return [];
  const context = { key: options.key, source: options.source };
  if (isQuantity(value)) {
    throw new PartitionSyntaxError("expected partition rules, found a bare quantity", formatQuantity(value), context);
  }
  const lines = typeof value === "string" ? (value === "" ? [] : [value]) : value;

  const rules: PartitionRule[] = [];
  const seen = new Set<string>();
  for (const text of lines) {
    const rule = parseRuleLine(text, options.mode, context);
    if (seen.has(rule.mountPoint)) {
      throw new PartitionSyntaxError(`duplicate mount point ${rule.mountPoint}`, text, context);
    }
    seen.add(rule.mountPoint);
    rules.push(rule);
  }
  return rules;
}

function parseRuleLine(text: string, mode: PartitionSpecMode, context: Record<string, unknown>): PartitionRule {
  const fail = (message: string): never => {
    throw new PartitionSyntaxError(message, text, context);
  };

  const m = RULE_LINE.exec(text.trim());
  const mountPoint = m?.[1];
  const rest = m?.[2]?.trim() ?? "";
  if (!mountPoint) return fail("empty partition rule");
  if (!mountPoint.startsWith("/")) return fail("mount point must be an absolute path");

  if (rest === "") {
    if (mode === "requirements") return fail("missing required size");
    return { mountPoint, kind: "unspecified" };
  }

  if (!rest.startsWith("(")) {
    if (mode === "layout") return fail("expected (min <size>) or (size <size>)");
    const size = parseQuantity(rest) ?? fail("malformed quantity");
    return { mountPoint, kind: "min", size };
  }

  if (!rest.endsWith(")") || rest.indexOf("(", 1) >= 0 || rest.indexOf(")") !== rest.length - 1) {
    return fail("unbalanced parentheses");
  }
  const inner = rest.slice(1, -1).trim();
  if (inner.includes(",")) return fail("a rule takes exactly one of min or size");
  if (inner === "" || matchQuantity(inner).kind === "quantity") return fail("missing qualifier (min or size)");

  const parts = QUALIFIED.exec(inner);
  const qualifier = parts?.[1];
  const amount = parts?.[2];
  if (qualifier === undefined || amount === undefined) return fail("malformed rule");
  if (qualifier !== "min" && qualifier !== "size") return fail(`unknown qualifier "${qualifier}"`);
  if (qualifier === "size" && mode === "requirements") return fail("required sizes accept only min");

  const size: Quantity = parseQuantity(amount) ?? fail("malformed quantity");
  return qualifier === "min" ? { mountPoint, kind: "min", size } : { mountPoint, kind: "size", size };
}
