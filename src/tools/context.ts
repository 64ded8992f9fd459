import { activeProductFromEnv, loadSettings, type EngineSettings } from "../config/loader.js";
import { logger } from "../logger.js";
import type { ProductRequest } from "../resolve.js";
import { registerInspectionTools } from "./inspect.js";
import { ToolRegistry } from "./registry.js";

/**
 * Shared server context, created once at startup and passed to tool modules.
 */
export interface ServerContext {
  readonly settings: EngineSettings;
  readonly settingsPath: string;
  /** Product selected by PRODUCT_NAME / PRODUCT_VARIANT; used when a call names none. */
  readonly activeProduct: ProductRequest;
  readonly registry: ToolRegistry;
}

export function createServerContext(settingsPath?: string, env: NodeJS.ProcessEnv = process.env): ServerContext {
  const { settings, settingsPath: resolvedPath, fromFile } = loadSettings(settingsPath, env);
  const activeProduct = activeProductFromEnv(env);
  logger.info({ settingsPath: resolvedPath, fromFile, activeProduct: activeProduct.productName ?? null }, "Settings resolved");
  const ctx: ServerContext = { settings, settingsPath: resolvedPath, activeProduct, registry: new ToolRegistry() };
  registerInspectionTools(ctx);
  return ctx;
}
