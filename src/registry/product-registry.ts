// Product Registry: discovers product configuration files and resolves the
// inheritance chain for the active product.
// The chain always starts with the built-in defaults file and ends with any
// local override files; in between sit the base products (most general first)
// and the active product itself.
import { existsSync, readdirSync } from "node:fs";
import { join } from "node:path";
import { logger } from "../logger.js";
import { loadConfigFile, lookupString, type ParseOptions } from "../parser/unit-parser.js";
import {
  BaseProductCycleError,
  MissingRequiredKeyError,
  ProductConfigError,
  ProductConfigErrorCode,
  UnknownProductError,
} from "../shared/errors.js";
import type { ChainEntry, ConfigFile, ProductChain } from "../types/config.js";

export const DEFAULT_MAX_BASE_DEPTH = 10;

export interface ProductRegistryOptions {
  /** Built-in defaults file; always the first chain entry. */
  defaultsPath: string;
  /** Directories scanned for `*.conf` product files. */
  productDirs: readonly string[];
  /** Directories of local override files appended after the active product. */
  overrideDirs?: readonly string[];
  /** Product resolved when none is requested. */
  defaultProduct?: string;
  maxDepth?: number;
  parseOptions?: ParseOptions;
}

/** What a product file declares about itself. */
export interface ProductDescriptor {
  readonly name: string;
  readonly variant?: string;
  readonly baseName?: string;
  readonly baseVariant?: string;
  readonly path: string;
}

interface ProductSource {
  readonly descriptor: ProductDescriptor;
  readonly file: ConfigFile;
}

export function productLabel(name: string, variant?: string): string {
  return variant ? `${name} (${variant})` : name;
}

export class ProductRegistry {
  private readonly options: ProductRegistryOptions;
  private readonly maxDepth: number;

  constructor(options: ProductRegistryOptions) {
    this.options = options;
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_BASE_DEPTH;
  }

  /** All product files found in the product directories. */
  listProducts(): ProductDescriptor[] {
    return this.discover().map((p) => p.descriptor);
  }

  /**
   * Resolve the chain for `productName` (or the designated default product).
   * Files are read afresh on every call.
   */
  resolve(productName?: string, variantName?: string): ProductChain {
    const defaults = loadConfigFile(this.options.defaultsPath, this.options.parseOptions);
    const defaultsName = lookupString(defaults, "Product", "product_name");
    const requested = productName ?? this.options.defaultProduct;

    const chain: ChainEntry[] = [{ role: "defaults", productName: defaultsName, file: defaults }];
    if (requested !== undefined && requested !== defaultsName) {
      chain.push(...this.resolveLineage(requested, variantName, defaultsName));
    }
    chain.push(...this.loadOverrides());

    logger.info(
      { product: requested ?? defaultsName ?? null, chain: chain.map((e) => e.file.path) },
      "Product chain resolved",
    );
    return Object.freeze(chain);
  }

  private resolveLineage(name: string, variant: string | undefined, defaultsName: string | undefined): ChainEntry[] {
    const products = this.discover();
    const lineage: ChainEntry[] = [];
    const visited = new Set<string>();
    const labels: string[] = [];
    let target: { name: string; variant?: string } = { name, variant };
    let requiredBy: string | undefined;

    for (;;) {
      const label = productLabel(target.name, target.variant);
      if (labels.length >= this.maxDepth) {
        throw new BaseProductCycleError([...labels, label], `base product chain exceeds ${this.maxDepth} levels`);
      }
      const found = findProduct(products, target.name, target.variant);
      if (!found) {
        throw new UnknownProductError(target.name, { variant: target.variant, requiredBy });
      }
      if (visited.has(found.descriptor.path)) {
        throw new BaseProductCycleError([...labels, label]);
      }
      visited.add(found.descriptor.path);
      labels.push(label);

      const { descriptor } = found;
      lineage.unshift({
        role: lineage.length === 0 ? "product" : "base",
        productName: descriptor.name,
        variantName: descriptor.variant,
        file: found.file,
      });
      logger.debug({ product: label, path: descriptor.path, base: descriptor.baseName ?? null }, "Product file selected");

      if (descriptor.baseName === undefined || descriptor.baseName === defaultsName) break;
      target = { name: descriptor.baseName, variant: descriptor.baseVariant };
      requiredBy = descriptor.path;
    }
    return lineage;
  }

  private discover(): ProductSource[] {
    const products: ProductSource[] = [];
    const seen = new Map<string, string>();
    for (const dir of this.options.productDirs) {
      for (const path of listConfFiles(dir)) {
        const file = loadConfigFile(path, this.options.parseOptions);
        const descriptor = describeProduct(file);
        const label = productLabel(descriptor.name, descriptor.variant);
        const previous = seen.get(label);
        if (previous !== undefined) {
          throw new ProductConfigError(
            ProductConfigErrorCode.DUPLICATE_PRODUCT,
            `Product "${label}" is declared by both ${previous} and ${path}`,
            { product: label, paths: [previous, path] },
          );
        }
        seen.set(label, path);
        products.push({ descriptor, file });
      }
    }
    logger.debug({ count: products.length, dirs: this.options.productDirs }, "Product files discovered");
    return products;
  }

  private loadOverrides(): ChainEntry[] {
    const overrides: ChainEntry[] = [];
    for (const dir of this.options.overrideDirs ?? []) {
      for (const path of listConfFiles(dir)) {
        overrides.push({ role: "override", file: loadConfigFile(path, this.options.parseOptions) });
      }
    }
    return overrides;
  }
}

function describeProduct(file: ConfigFile): ProductDescriptor {
  const name = lookupString(file, "Product", "product_name");
  if (name === undefined) throw new MissingRequiredKeyError("Product", "product_name", { path: file.path });
  return {
    name,
    variant: lookupString(file, "Product", "variant_name"),
    baseName: lookupString(file, "Base Product", "product_name"),
    baseVariant: lookupString(file, "Base Product", "variant_name"),
    path: file.path,
  };
}

/** Exact name+variant match; a requested variant falls back to the variant-less file. */
function findProduct(products: readonly ProductSource[], name: string, variant?: string): ProductSource | undefined {
  const exact = products.find((p) => p.descriptor.name === name && p.descriptor.variant === variant);
  if (exact || variant === undefined) return exact;
  return products.find((p) => p.descriptor.name === name && p.descriptor.variant === undefined);
}

function listConfFiles(dir: string): string[] {
  if (!existsSync(dir)) {
    logger.debug({ dir }, "Configuration directory not present");
    return [];
  }
  return readdirSync(dir)
    .filter((f) => f.endsWith(".conf"))
    .sort()
    .map((f) => join(dir, f));
}
