/** Error categories reported by the inspection tools. */
export type ErrorCategory =
  | "syntax"
  | "not_found"
  | "structure"
  | "validation"
  | "settings"
  | "io"
  | "internal";

/** Base fields present in every response. */
export interface ResponseBase {
  status: "success" | "error";
  tool: string;
  duration_ms: number;
}

export interface SuccessResponse extends ResponseBase {
  status: "success";
  data: Record<string, unknown>;
  summary?: string;
}

export interface ErrorResponse extends ResponseBase {
  status: "error";
  error_code: string;
  error_category: ErrorCategory;
  message: string;
  context: Record<string, unknown>;
  remediation: string[];
}

export type ToolResponse = SuccessResponse | ErrorResponse;
