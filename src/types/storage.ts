import type { Quantity } from "./config.js";
import type { ConstraintIssue } from "../shared/errors.js";

/**
 * A default-layout or required-size entry for one mount point.
 * `min` is a lower bound, `size` a fixed target; a rule never carries both.
 */
export type PartitionRule =
  | { readonly mountPoint: string; readonly kind: "min"; readonly size: Quantity }
  | { readonly mountPoint: string; readonly kind: "size"; readonly size: Quantity }
  | { readonly mountPoint: string; readonly kind: "unspecified" };

export type RootScheme = "PLAIN" | "BTRFS" | "LVM" | "LVM_THINP";

/** How `must_not_be_on_root` treats a mount point with no explicit layout rule. */
export type UnlistedMountPolicy = "on-root" | "ignore";

export interface StorageConstraints {
  /** Absent means every scheme is acceptable. */
  readonly rootDeviceTypes?: readonly string[];
  readonly mustNotBeOnRoot: readonly string[];
  readonly requiredSizes: readonly PartitionRule[];
  readonly swapRecommended: boolean;
}

export interface RuleVerdict {
  readonly rule: PartitionRule;
  readonly ok: boolean;
  readonly violations: readonly ConstraintIssue[];
}

export interface ValidatedStorageConfig {
  readonly valid: boolean;
  readonly defaultScheme?: string;
  readonly rules: readonly RuleVerdict[];
  readonly constraints: StorageConstraints;
  /** Passed through to planning; a false value forbids a synthetic swap volume. */
  readonly swapRecommended: boolean;
  readonly violations: readonly ConstraintIssue[];
}
