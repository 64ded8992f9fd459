export enum ProductConfigErrorCode {
  PARSE_ERROR = "PARSE_ERROR",
  PARTITION_SYNTAX = "PARTITION_SYNTAX",
  UNKNOWN_PRODUCT = "UNKNOWN_PRODUCT",
  BASE_PRODUCT_CYCLE = "BASE_PRODUCT_CYCLE",
  CONSTRAINT_VIOLATION = "CONSTRAINT_VIOLATION",
  MISSING_REQUIRED_KEY = "MISSING_REQUIRED_KEY",
  DUPLICATE_PRODUCT = "DUPLICATE_PRODUCT",
  FILE_UNREADABLE = "FILE_UNREADABLE",
  INVALID_SETTINGS = "INVALID_SETTINGS",
}

export class ProductConfigError extends Error {
  readonly code: ProductConfigErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: ProductConfigErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "ProductConfigError";
    this.code = code;
    this.context = context;
  }
}

/** Where in a configuration file something went wrong. */
export interface SourceLocation {
  path: string;
  line?: number;
  section?: string;
  key?: string;
}

function describeLocation(loc: SourceLocation): string {
  let where = loc.path;
  if (loc.line !== undefined) where += `:${loc.line}`;
  if (loc.section !== undefined) {
    where += ` [${loc.section}]`;
    if (loc.key !== undefined) where += ` ${loc.key}`;
  }
  return where;
}

export class ParseError extends ProductConfigError {
  readonly location: SourceLocation;

  constructor(message: string, location: SourceLocation, context?: Record<string, unknown>) {
    super(ProductConfigErrorCode.PARSE_ERROR, `${describeLocation(location)}: ${message}`, { ...location, ...context });
    this.name = "ParseError";
    this.location = location;
  }
}

export class PartitionSyntaxError extends ProductConfigError {
  readonly ruleText: string;

  constructor(message: string, ruleText: string, context?: Record<string, unknown>) {
    super(ProductConfigErrorCode.PARTITION_SYNTAX, `${message}: "${ruleText}"`, { ruleText, ...context });
    this.name = "PartitionSyntaxError";
    this.ruleText = ruleText;
  }
}

export class UnknownProductError extends ProductConfigError {
  readonly productName: string;

  constructor(productName: string, context?: Record<string, unknown>) {
    super(ProductConfigErrorCode.UNKNOWN_PRODUCT, `No configuration found for product "${productName}"`, { productName, ...context });
    this.name = "UnknownProductError";
    this.productName = productName;
  }
}

export class BaseProductCycleError extends ProductConfigError {
  readonly cycle: readonly string[];

  constructor(cycle: readonly string[], reason = "base product chain revisits a product") {
    super(ProductConfigErrorCode.BASE_PRODUCT_CYCLE, `${reason}: ${cycle.join(" -> ")}`, { cycle: [...cycle] });
    this.name = "BaseProductCycleError";
    this.cycle = cycle;
  }
}

/** One failed storage check. `check` names which of the validator checks produced it. */
export interface ConstraintIssue {
  readonly check: "root-scheme" | "dedicated-volume" | "minimum-size";
  readonly message: string;
  readonly mountPoint?: string;
  readonly detail: Readonly<Record<string, unknown>>;
}

export class ConstraintViolation extends ProductConfigError {
  readonly violations: readonly ConstraintIssue[];

  constructor(violations: readonly ConstraintIssue[]) {
    const summary = violations.map((v) => v.message).join("; ");
    super(
      ProductConfigErrorCode.CONSTRAINT_VIOLATION,
      `Storage configuration violates ${violations.length} constraint(s): ${summary}`,
      { violations: violations.map((v) => ({ ...v })) },
    );
    this.name = "ConstraintViolation";
    this.violations = violations;
  }
}

export class MissingRequiredKeyError extends ProductConfigError {
  readonly section: string;
  readonly key: string;

  constructor(section: string, key: string, context?: Record<string, unknown>) {
    super(ProductConfigErrorCode.MISSING_REQUIRED_KEY, `Required key "${key}" missing from section [${section}]`, { section, key, ...context });
    this.name = "MissingRequiredKeyError";
    this.section = section;
    this.key = key;
  }
}
