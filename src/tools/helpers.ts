import { ZodError } from "zod";
import type { ServerContext } from "./context.js";
import type { ToolResponse, SuccessResponse, ErrorResponse, ErrorCategory } from "../types/response.js";
import type { ToolMetadata } from "../types/tool.js";
import { ProductConfigError, ProductConfigErrorCode } from "../shared/errors.js";

// ── Response Builders ──────────────────────────────────────────────

export function success(tool: string, durationMs: number, data: Record<string, unknown>, summary?: string): SuccessResponse {
  return { status: "success", tool, duration_ms: durationMs, data, ...(summary !== undefined ? { summary } : {}) };
}

export function error(tool: string, durationMs: number, opts: { code: string; category: ErrorCategory; message: string; context?: Record<string, unknown>; remediation?: string[] }): ErrorResponse {
  return {
    status: "error", tool, duration_ms: durationMs,
    error_code: opts.code, error_category: opts.category, message: opts.message,
    context: opts.context ?? {},
    remediation: opts.remediation ?? [],
  };
}

// ── Error Categorization ───────────────────────────────────────────

const CATEGORY: Record<ProductConfigErrorCode, ErrorCategory> = {
  [ProductConfigErrorCode.PARSE_ERROR]: "syntax",
  [ProductConfigErrorCode.PARTITION_SYNTAX]: "syntax",
  [ProductConfigErrorCode.UNKNOWN_PRODUCT]: "not_found",
  [ProductConfigErrorCode.BASE_PRODUCT_CYCLE]: "structure",
  [ProductConfigErrorCode.DUPLICATE_PRODUCT]: "structure",
  [ProductConfigErrorCode.CONSTRAINT_VIOLATION]: "validation",
  [ProductConfigErrorCode.MISSING_REQUIRED_KEY]: "validation",
  [ProductConfigErrorCode.FILE_UNREADABLE]: "io",
  [ProductConfigErrorCode.INVALID_SETTINGS]: "settings",
};

const REMEDIATION: Record<ProductConfigErrorCode, string[]> = {
  [ProductConfigErrorCode.PARSE_ERROR]: ["Fix the syntax at the reported file and line"],
  [ProductConfigErrorCode.PARTITION_SYNTAX]: ["Write each rule as '<mount point> (min <size>)' or '<mount point> (size <size>)'"],
  [ProductConfigErrorCode.UNKNOWN_PRODUCT]: ["Run product_list to see the available products", "Check [Base Product] product_name for typos"],
  [ProductConfigErrorCode.BASE_PRODUCT_CYCLE]: ["Break the loop in the reported [Base Product] pointers"],
  [ProductConfigErrorCode.DUPLICATE_PRODUCT]: ["Give each product file a unique product_name/variant_name pair"],
  [ProductConfigErrorCode.CONSTRAINT_VIOLATION]: ["Run storage_check to list every violation"],
  [ProductConfigErrorCode.MISSING_REQUIRED_KEY]: ["Add the key to the product file or the built-in defaults"],
  [ProductConfigErrorCode.FILE_UNREADABLE]: ["Check the file exists and is readable"],
  [ProductConfigErrorCode.INVALID_SETTINGS]: ["Fix the reported keys in the settings file"],
};

/** Turn a thrown error into an error envelope; unexpected errors are reported as internal. */
export function errorResponse(tool: string, durationMs: number, err: unknown): ErrorResponse {
  if (err instanceof ProductConfigError) {
    return error(tool, durationMs, {
      code: err.code,
      category: CATEGORY[err.code],
      message: err.message,
      context: err.context,
      remediation: REMEDIATION[err.code],
    });
  }
  if (err instanceof ZodError) {
    return error(tool, durationMs, {
      code: "INVALID_ARGUMENTS",
      category: "validation",
      message: err.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "),
    });
  }
  return error(tool, durationMs, {
    code: "INTERNAL_ERROR",
    category: "internal",
    message: err instanceof Error ? err.message : String(err),
    remediation: ["Check server logs for details"],
  });
}

// ── Registration ───────────────────────────────────────────────────

/**
 * Register a tool whose handler may throw. Thrown errors become error envelopes;
 * `duration_ms` is filled in here.
 */
export function registerTool(
  ctx: ServerContext,
  metadata: ToolMetadata,
  handler: (args: Record<string, unknown>) => { data: Record<string, unknown>; summary?: string },
): void {
  ctx.registry.register({
    metadata,
    execute: async (args): Promise<ToolResponse> => {
      const started = Date.now();
      try {
        const { data, summary } = handler(args);
        return success(metadata.name, Date.now() - started, data, summary);
      } catch (err) {
        return errorResponse(metadata.name, Date.now() - started, err);
      }
    },
  });
}
