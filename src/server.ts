import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ProcessRunner } from "./rpfm/process.js";
import { registerConvertTools } from "./tools/convert.js";
import { registerExtractTools } from "./tools/extract.js";

export interface ServerOptions {
  /** Replaces the rpfm_cli subprocess (tests). */
  runner?: ProcessRunner;
}

export function createServer(options: ServerOptions = {}): McpServer {
  const server = new McpServer({
    name: "wh3-table-export",
    version: "0.1.0",
  });

  registerConvertTools(server);
  registerExtractTools(server, options.runner);

  return server;
}
