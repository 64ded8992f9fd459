import pino from "pino";

// stdout belongs to the MCP stdio transport; logs go to stderr.
export const logger = pino(
  {
    name: "product-config",
    level: process.env.LOG_LEVEL ?? (process.env.NODE_ENV === "test" ? "silent" : "info"),
  },
  pino.destination(2),
);
