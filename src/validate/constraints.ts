// Constraint Validator: checks the merged [Storage] directives against the
// merged [Storage Constraints] section. Every check runs and every violation is
// collected; nothing stops at the first failure.
import { logger } from "../logger.js";
import { parsePartitionRules } from "../parser/partition-spec.js";
import { compareQuantities, formatQuantity } from "../parser/quantity.js";
import { ConstraintViolation, type ConstraintIssue } from "../shared/errors.js";
import { readBoolean, readString, readTokens, type ValueLocation } from "../shared/values.js";
import type { ConfigValue } from "../types/config.js";
import type {
  PartitionRule,
  RuleVerdict,
  StorageConstraints,
  UnlistedMountPolicy,
  ValidatedStorageConfig,
} from "../types/storage.js";

export type SectionValues = ReadonlyMap<string, ConfigValue>;

export interface StorageCheckOptions {
  /** Default `on-root`: a mount point without its own layout rule lives on the root volume. */
  unlistedMountPolicy?: UnlistedMountPolicy;
  /** Resolves the file a key came from, for error reports. */
  sourceOf?: (section: string, key: string) => string | undefined;
}

const STORAGE = "Storage";
const CONSTRAINTS = "Storage Constraints";

function locate(options: StorageCheckOptions, section: string, key: string): ValueLocation {
  return { section, key, source: options.sourceOf?.(section, key) };
}

export function readConstraints(constraints: SectionValues, options: StorageCheckOptions = {}): StorageConstraints {
  const rootTypes = readTokens(constraints.get("root_device_types"), locate(options, CONSTRAINTS, "root_device_types"));
  return Object.freeze({
    rootDeviceTypes: rootTypes.length > 0 ? Object.freeze(rootTypes) : undefined,
    mustNotBeOnRoot: Object.freeze(
      readTokens(constraints.get("must_not_be_on_root"), locate(options, CONSTRAINTS, "must_not_be_on_root")),
    ),
    requiredSizes: Object.freeze(
      parsePartitionRules(constraints.get("req_partition_sizes"), {
        mode: "requirements",
        key: `${CONSTRAINTS}.req_partition_sizes`,
        source: options.sourceOf?.(CONSTRAINTS, "req_partition_sizes"),
      }),
    ),
    swapRecommended: readBoolean(
      constraints.get("swap_is_recommended"),
      locate(options, CONSTRAINTS, "swap_is_recommended"),
      true,
    ),
  });
}

/** Run every storage check and return the annotated result without throwing on violations. */
export function checkStorage(
  storage: SectionValues,
  constraintValues: SectionValues,
  options: StorageCheckOptions = {},
): ValidatedStorageConfig {
  const policy = options.unlistedMountPolicy ?? "on-root";
  const rules = parsePartitionRules(storage.get("default_partitioning"), {
    mode: "layout",
    key: `${STORAGE}.default_partitioning`,
    source: options.sourceOf?.(STORAGE, "default_partitioning"),
  });
  const constraints = readConstraints(constraintValues, options);
  const scheme = readString(storage.get("default_scheme"), locate(options, STORAGE, "default_scheme"));

  const violations: ConstraintIssue[] = [];

  // 1. root scheme allow-list
  const allowed = constraints.rootDeviceTypes;
  if (scheme !== undefined && allowed !== undefined && !allowed.includes(scheme)) {
    violations.push({
      check: "root-scheme",
      message: `unsupported root scheme: ${scheme} (allowed: ${allowed.join(", ")})`,
      detail: { scheme, allowed: [...allowed] },
    });
  }

  // 2. mount points that need their own volume
  if (policy === "on-root") {
    for (const mountPoint of constraints.mustNotBeOnRoot) {
      if (rules.some((r) => r.mountPoint === mountPoint)) continue;
      violations.push({
        check: "dedicated-volume",
        mountPoint,
        message: `mount point requires dedicated volume: ${mountPoint}`,
        detail: { mountPoint, policy },
      });
    }
  }

  // 3. required minimum sizes
  for (const requirement of constraints.requiredSizes) {
    if (requirement.kind === "unspecified") continue;
    const rule = rules.find((r) => r.mountPoint === requirement.mountPoint);
    const committed = rule && rule.kind !== "unspecified" ? rule.size : requirement.size;
    if (compareQuantities(committed, requirement.size) >= 0) continue;
    violations.push({
      check: "minimum-size",
      mountPoint: requirement.mountPoint,
      message: `below minimum required size: ${requirement.mountPoint} requires ${formatQuantity(requirement.size)}, committed ${formatQuantity(committed)}`,
      detail: {
        mountPoint: requirement.mountPoint,
        required: formatQuantity(requirement.size),
        committed: formatQuantity(committed),
        requiredBytes: requirement.size.bytes,
        committedBytes: committed.bytes,
      },
    });
  }

  // 4. swap_is_recommended is carried in `constraints` for planning; not enforced here.

  const verdicts: RuleVerdict[] = rules.map((rule: PartitionRule) => {
    const own = violations.filter((v) => v.mountPoint === rule.mountPoint);
    return Object.freeze({ rule, ok: own.length === 0, violations: Object.freeze(own) });
  });

  const result: ValidatedStorageConfig = Object.freeze({
    valid: violations.length === 0,
    defaultScheme: scheme,
    rules: Object.freeze(verdicts),
    constraints,
    swapRecommended: constraints.swapRecommended,
    violations: Object.freeze(violations),
  });

  if (!result.valid) {
    logger.warn({ violations: violations.map((v) => v.message) }, "Storage configuration violates constraints");
  }
  return result;
}

/** As checkStorage, but a configuration with any violation fails with ConstraintViolation. */
export function validateStorage(
  storage: SectionValues,
  constraintValues: SectionValues,
  options: StorageCheckOptions = {},
): ValidatedStorageConfig {
  const result = checkStorage(storage, constraintValues, options);
  if (!result.valid) throw new ConstraintViolation(result.violations);
  return result;
}
