#!/usr/bin/env node

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { z } from "zod";

import { logger } from "./logger.js";
import { createServerContext } from "./tools/context.js";

async function main(): Promise<void> {
  logger.info("Starting product-config inspection server");

  // ── Phase 1: Settings and tool registration ───────────────────
  const ctx = createServerContext();
  logger.info({ toolCount: ctx.registry.size }, "Tools registered");

  // ── Phase 2: Create MCP server ────────────────────────────────
  const server = new McpServer({
    name: "product-config",
    version: "0.1.0",
  });

  // ── Phase 3: Register tools on MCP server ─────────────────────
  for (const [name, tool] of ctx.registry.getAll()) {
    const meta = tool.metadata;
    const inputShape: z.ZodRawShape = meta.inputSchema.shape;

    server.registerTool(
      name,
      {
        title: name,
        description: meta.description,
        inputSchema: inputShape,
        annotations: { readOnlyHint: true, destructiveHint: false, idempotentHint: true, openWorldHint: false },
      },
      async (args: Record<string, unknown>) => {
        const response = await tool.execute(args);
        if (response.status === "error") {
          logger.error({ tool: name, code: response.error_code, error: response.message }, "Tool execution error");
        }
        return {
          content: [{ type: "text" as const, text: JSON.stringify(response, null, 2) }],
          isError: response.status === "error",
        };
      },
    );
  }

  // ── Phase 4: Connect transport ────────────────────────────────
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info({ tools: ctx.registry.size }, "product-config server running on stdio");
}

if (require.main === module) {
  main().catch((err) => {
    logger.fatal({ error: err }, "Fatal startup error");
    process.exit(1);
  });
}
