// Engine settings loader. Reads the YAML settings file and deep-merges it
// onto DEFAULT_SETTINGS, so a file only needs the keys it changes.
// Unlike product files, a missing settings file is normal: the bundled data/
// directory is used. A settings file that exists but cannot be used is fatal.
import { existsSync, readFileSync } from "node:fs";
import { dirname, isAbsolute, join, resolve } from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { logger } from "../logger.js";
import { ProductConfigError, ProductConfigErrorCode } from "../shared/errors.js";
import type { AdditiveKey } from "../types/config.js";

/** Bundled sample data: data/defaults.conf and data/product.d/. */
export const DATA_DIR = join(__dirname, "..", "..", "data");

export const DEFAULT_SETTINGS_PATH = "/etc/product-config/settings.yaml";

const SettingsSchema = z.object({
  defaults_path: z.string().min(1),
  product_dirs: z.array(z.string().min(1)),
  override_dirs: z.array(z.string().min(1)),
  default_product: z.string().min(1).nullable(),
  max_base_depth: z.number().int().min(1).max(100),
  additive_keys: z.array(z.string().regex(/^.+\.[^.]+$/, 'expected "Section.key"')),
  unlisted_mount_policy: z.enum(["on-root", "ignore"]),
  allow_duplicate_keys: z.boolean(),
});

export type EngineSettings = z.infer<typeof SettingsSchema>;

export const DEFAULT_SETTINGS: EngineSettings = {
  defaults_path: join(DATA_DIR, "defaults.conf"),
  product_dirs: [join(DATA_DIR, "product.d")],
  override_dirs: ["/etc/product-config/conf.d"],
  default_product: "Fedora",
  max_base_depth: 10,
  additive_keys: ["Payload.updates_repositories", "User Interface.default_help_pages"],
  unlisted_mount_policy: "on-root",
  allow_duplicate_keys: false,
};

export interface SettingsResult {
  settings: EngineSettings;
  settingsPath: string;
  fromFile: boolean;
}

export function loadSettings(explicitPath?: string, env: NodeJS.ProcessEnv = process.env): SettingsResult {
  const settingsPath = explicitPath ?? env.PRODUCT_CONFIG_SETTINGS ?? DEFAULT_SETTINGS_PATH;

  if (!existsSync(settingsPath)) {
    logger.info({ settingsPath }, "No settings file found, using bundled defaults");
    return { settings: { ...DEFAULT_SETTINGS }, settingsPath, fromFile: false };
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(settingsPath, "utf-8"));
  } catch (err) {
    throw new ProductConfigError(
      ProductConfigErrorCode.INVALID_SETTINGS,
      `Cannot read settings ${settingsPath}: ${err instanceof Error ? err.message : String(err)}`,
      { settingsPath },
    );
  }
  const overrides: unknown = parsed ?? {};
  if (!isRecord(overrides)) {
    throw new ProductConfigError(ProductConfigErrorCode.INVALID_SETTINGS, `Settings ${settingsPath} must be a mapping`, { settingsPath });
  }

  const merged = deepMerge({ ...DEFAULT_SETTINGS }, overrides);
  const result = SettingsSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ProductConfigError(
      ProductConfigErrorCode.INVALID_SETTINGS,
      `Invalid settings in ${settingsPath}: ${issues.join("; ")}`,
      { settingsPath, issues },
    );
  }

  // Relative paths in a settings file are relative to that file.
  const base = dirname(settingsPath);
  const rel = (p: string): string => (isAbsolute(p) ? p : resolve(base, p));
  const settings: EngineSettings = {
    ...result.data,
    defaults_path: rel(result.data.defaults_path),
    product_dirs: result.data.product_dirs.map(rel),
    override_dirs: result.data.override_dirs.map(rel),
  };
  logger.info({ settingsPath }, "Settings loaded");
  return { settings, settingsPath, fromFile: true };
}

/** Active product requested through the environment, if any. */
export function activeProductFromEnv(env: NodeJS.ProcessEnv = process.env): { productName?: string; variantName?: string } {
  return {
    productName: env.PRODUCT_NAME || undefined,
    variantName: env.PRODUCT_VARIANT || undefined,
  };
}

/** "User Interface.default_help_pages" → { section: "User Interface", key: "default_help_pages" }. */
export function toAdditiveKeys(entries: readonly string[]): AdditiveKey[] {
  return entries.map((entry) => {
    const dot = entry.lastIndexOf(".");
    return { section: entry.slice(0, dot), key: entry.slice(dot + 1) };
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Deep merge b into a (a provides defaults, b overrides). */
function deepMerge(a: Record<string, unknown>, b: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...a };
  for (const key of Object.keys(b)) {
    const aVal = a[key];
    const bVal = b[key];
    if (isRecord(aVal) && isRecord(bVal)) {
      result[key] = deepMerge(aVal, bVal);
    } else if (bVal !== undefined) {
      result[key] = bVal;
    }
  }
  return result;
}
