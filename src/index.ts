export { parseConfigText, loadConfigFile, lookup, lookupString, type ParseOptions } from "./parser/unit-parser.js";
export { parsePartitionRules, type PartitionSpecMode, type PartitionSpecOptions } from "./parser/partition-spec.js";
export { parseQuantity, formatQuantity, compareQuantities, makeQuantity } from "./parser/quantity.js";
export { ProductRegistry, productLabel, DEFAULT_MAX_BASE_DEPTH, type ProductRegistryOptions, type ProductDescriptor } from "./registry/product-registry.js";
export { mergeChain, EffectiveConfig, DEFAULT_ADDITIVE_KEYS, type MergeOptions } from "./merge/merger.js";
export { checkStorage, validateStorage, readConstraints, type StorageCheckOptions } from "./validate/constraints.js";
export * from "./facade/effective-config.js";
export { resolveEffectiveConfiguration, createRegistry, type ProductRequest } from "./resolve.js";
export { loadSettings, activeProductFromEnv, DEFAULT_SETTINGS, type EngineSettings } from "./config/loader.js";
export * from "./shared/errors.js";
export * from "./types/config.js";
export type * from "./types/storage.js";
