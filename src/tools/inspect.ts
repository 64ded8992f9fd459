import { z } from "zod";
import type { ServerContext } from "./context.js";
import { registerTool } from "./helpers.js";
import { formatQuantity } from "../parser/quantity.js";
import { createRegistry, resolveEffectiveConfiguration, type ProductRequest } from "../resolve.js";
import { isQuantity } from "../types/config.js";
import type { PartitionRule } from "../types/storage.js";

const productArgs = {
  product: z.string().min(1).optional().describe("Product name; defaults to PRODUCT_NAME, then the configured default product"),
  variant: z.string().min(1).optional().describe("Product variant, e.g. Server"),
};

const ProductArgs = z.object(productArgs);
const ConfigGetArgs = z.object({
  ...productArgs,
  section: z.string().min(1).describe('Section name, e.g. "User Interface"'),
  key: z.string().min(1),
});

function describeRule(rule: PartitionRule): string {
  return rule.kind === "unspecified" ? rule.mountPoint : `${rule.mountPoint} (${rule.kind} ${formatQuantity(rule.size)})`;
}

/** An explicit product argument wins; otherwise the environment's product, then the settings default. */
function requestFor(ctx: ServerContext, product: string | undefined, variant: string | undefined): ProductRequest {
  if (product !== undefined) return { productName: product, variantName: variant };
  return { productName: ctx.activeProduct.productName, variantName: variant ?? ctx.activeProduct.variantName };
}

export function registerInspectionTools(ctx: ServerContext): void {
  registerTool(ctx, { name: "product_list", description: "List the product configuration files and their base products.", inputSchema: z.object({}) }, () => {
    const products = createRegistry(ctx.settings).listProducts();
    return {
      data: {
        default_product: ctx.settings.default_product,
        active_product: ctx.activeProduct.productName ?? null,
        products: products.map((p) => ({ name: p.name, variant: p.variant ?? null, base: p.baseName ?? null, path: p.path })),
      },
      summary: `${products.length} product(s)`,
    };
  });

  registerTool(ctx, { name: "product_resolve", description: "Resolve, merge and validate a product's configuration. Fails on any storage constraint violation.", inputSchema: ProductArgs }, (args) => {
    const { product, variant } = ProductArgs.parse(args);
    const effective = resolveEffectiveConfiguration(ctx.settings, requestFor(ctx, product, variant));
    const storage = effective.storage;
    return {
      data: {
        chain: effective.chain,
        product: effective.product,
        storage: { ...storage, defaultPartitioning: storage.defaultPartitioning.map(describeRule) },
        ui: effective.ui,
        payload: effective.payload,
        license: effective.license,
        network: effective.network,
        bootloader: effective.bootloader,
        swap_recommended: effective.validatedStorage.swapRecommended,
        serialized: effective.serialize(),
      },
      summary: `${effective.product.productName}: ${effective.chain.length} file(s) merged`,
    };
  });

  registerTool(ctx, { name: "storage_check", description: "Report every storage constraint violation for a product without failing.", inputSchema: ProductArgs }, (args) => {
    const { product, variant } = ProductArgs.parse(args);
    const result = resolveEffectiveConfiguration(ctx.settings, requestFor(ctx, product, variant), { strictStorage: false }).validatedStorage;
    return {
      data: {
        valid: result.valid,
        default_scheme: result.defaultScheme ?? null,
        swap_recommended: result.swapRecommended,
        rules: result.rules.map((v) => ({ rule: describeRule(v.rule), ok: v.ok })),
        violations: result.violations,
      },
      summary: result.valid ? "Storage configuration is valid" : `${result.violations.length} violation(s)`,
    };
  });

  registerTool(ctx, { name: "config_get", description: "Read one merged value and the file it came from. Works for keys the engine does not interpret.", inputSchema: ConfigGetArgs }, (args) => {
    const { product, variant, section, key } = ConfigGetArgs.parse(args);
    const effective = resolveEffectiveConfiguration(ctx.settings, requestFor(ctx, product, variant), { strictStorage: false });
    const value = effective.get(section, key);
    return {
      data: {
        section,
        key,
        value: value === undefined ? null : isQuantity(value) ? formatQuantity(value) : value,
        source: effective.sourceOf(section, key) ?? null,
      },
    };
  });
}
