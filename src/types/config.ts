/** Byte units accepted in quantity literals such as `6 GiB`. */
export type ByteUnit =
  | "B"
  | "KiB" | "MiB" | "GiB" | "TiB" | "PiB"
  | "kB" | "KB" | "MB" | "GB" | "TB" | "PB";

/** A size literal normalised to its byte count. Comparisons use `bytes`. */
export interface Quantity {
  readonly kind: "quantity";
  readonly value: number;
  readonly unit: ByteUnit;
  readonly bytes: number;
}

/** Raw value of a key: a scalar, a multi-line list, or a parsed size. */
export type ConfigValue = string | readonly string[] | Quantity;

export interface ConfigEntry {
  readonly value: ConfigValue;
  /** 1-based line of the key in its file. */
  readonly line: number;
}

export type ConfigSection = ReadonlyMap<string, ConfigEntry>;

/** One parsed configuration file. The file, its entries and list values are frozen; section maps are read-only by type. */
export interface ConfigFile {
  readonly path: string;
  readonly sections: ReadonlyMap<string, ConfigSection>;
}

export type ChainRole = "defaults" | "base" | "product" | "override";

export interface ChainEntry {
  readonly role: ChainRole;
  readonly productName?: string;
  readonly variantName?: string;
  readonly file: ConfigFile;
}

/**
 * Ordered from most general (built-in defaults) to most specific
 * (active product, then local overrides).
 */
export type ProductChain = readonly ChainEntry[];

/** A merged value plus the file that supplied it. */
export interface MergedEntry {
  readonly value: ConfigValue;
  readonly source: string;
}

export type MergedSection = ReadonlyMap<string, MergedEntry>;

/** Identifies a key merged by appending rather than overwriting. */
export interface AdditiveKey {
  readonly section: string;
  readonly key: string;
}

export function isQuantity(value: ConfigValue): value is Quantity {
  return typeof value === "object" && "kind" in value && value.kind === "quantity";
}

export function isList(value: ConfigValue): value is readonly string[] {
  return typeof value !== "string" && !isQuantity(value);
}
