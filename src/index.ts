#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { logger } from "./logger.js";
import { createServer } from "./server.js";

const server = createServer();
const transport = new StdioServerTransport();

try {
  await server.connect(transport);
  logger.info("wh3-table-export MCP server running on stdio");
} catch (err) {
  logger.error({ err }, "failed to start MCP server");
  process.exitCode = 1;
}
