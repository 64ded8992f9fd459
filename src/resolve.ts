import { toAdditiveKeys, type EngineSettings } from "./config/loader.js";
import { EffectiveConfiguration, type ChainSummary } from "./facade/effective-config.js";
import { logger } from "./logger.js";
import { mergeChain } from "./merge/merger.js";
import { ProductRegistry } from "./registry/product-registry.js";
import { MissingRequiredKeyError } from "./shared/errors.js";
import { readString } from "./shared/values.js";
import type { ProductChain } from "./types/config.js";
import { checkStorage, validateStorage, type StorageCheckOptions } from "./validate/constraints.js";

export interface ProductRequest {
  productName?: string;
  variantName?: string;
}

export function createRegistry(settings: EngineSettings): ProductRegistry {
  return new ProductRegistry({
    defaultsPath: settings.defaults_path,
    productDirs: settings.product_dirs,
    overrideDirs: settings.override_dirs,
    defaultProduct: settings.default_product ?? undefined,
    maxDepth: settings.max_base_depth,
    parseOptions: { allowDuplicateKeys: settings.allow_duplicate_keys },
  });
}

export function summarizeChain(chain: ProductChain): ChainSummary[] {
  return chain.map((entry) => ({
    role: entry.role,
    productName: entry.productName,
    variantName: entry.variantName,
    path: entry.file.path,
  }));
}

/**
 * Resolve, merge and validate the configuration for one product. Any defect
 * (unreadable file, bad syntax, unknown or cyclic product, missing
 * product_name, storage constraint violation) throws; nothing partial is
 * returned. Pass `strictStorage: false` to get a result that carries storage
 * violations instead of throwing on them.
 */
export function resolveEffectiveConfiguration(
  settings: EngineSettings,
  request: ProductRequest = {},
  opts: { strictStorage?: boolean } = {},
): EffectiveConfiguration {
  const chain = createRegistry(settings).resolve(request.productName, request.variantName);
  const merged = mergeChain(chain, { additiveKeys: toAdditiveKeys(settings.additive_keys) });
  const productName = readString(merged.get("Product", "product_name"), {
    section: "Product",
    key: "product_name",
    source: merged.sourceOf("Product", "product_name"),
  });
  if (productName === undefined) {
    throw new MissingRequiredKeyError("Product", "product_name", { chain: chain.map((e) => e.file.path) });
  }

  const checkOptions: StorageCheckOptions = {
    unlistedMountPolicy: settings.unlisted_mount_policy,
    sourceOf: (section, key) => merged.sourceOf(section, key),
  };
  const check = opts.strictStorage === false ? checkStorage : validateStorage;
  const storage = check(merged.section("Storage"), merged.section("Storage Constraints"), checkOptions);

  const effective = new EffectiveConfiguration(merged, storage, summarizeChain(chain));
  logger.info(
    { product: productName, files: chain.length, storageValid: storage.valid },
    "Effective configuration ready",
  );
  return effective;
}
