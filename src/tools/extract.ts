import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { formatError } from "../errors.js";
import { exportTables } from "../pipeline.js";
import { normalizeTableName } from "../rpfm/names.js";
import type { ProcessRunner } from "../rpfm/process.js";
import { formatReport } from "./convert.js";

export function registerExtractTools(server: McpServer, runner?: ProcessRunner): void {
  server.tool(
    "extract_tables",
    "Extract WH3 database tables from data.pack with rpfm_cli and convert them to Lua files. Table names may be bare (`units`) or pack paths (`db/units_tables/data__`).",
    {
      tables: z.array(z.string()).min(1).describe("Tables to extract"),
      rpfm_dir: z.string().describe("RPFM installation directory (contains rpfm_cli)"),
      dest: z.string().describe("Directory that receives the .lua files"),
      pack: z.string().optional().describe("Path to data.pack (default: <game data dir>/data.pack)"),
      schema: z.string().optional().describe("Path to schema_wh3.ron (default: %APPDATA%/rpfm/config/schemas/schema_wh3.ron)"),
      game_data_dir: z.string().optional().describe("Game data directory (default: $WH3_DATA_DIR or the Steam install)"),
      map_columns: z.boolean().default(false),
      add_return: z.boolean().default(false),
      checksum: z.boolean().default(false),
    },
    async ({ tables, rpfm_dir, dest, pack, schema, game_data_dir, map_columns, add_return, checksum }) => {
      try {
        const report = await exportTables(
          {
            tables: tables.map(normalizeTableName),
            rpfmDir: rpfm_dir,
            dest,
            pack,
            schema,
            gameDataDir: game_data_dir,
            mapColumns: map_columns,
            addReturn: add_return,
            checksum,
          },
          runner,
        );
        return {
          content: [{ type: "text" as const, text: formatReport(report) }],
          isError: report.failed > 0,
        };
      } catch (err) {
        return {
          content: [{ type: "text" as const, text: `Extraction failed: ${formatError(err)}` }],
          isError: true,
        };
      }
    },
  );
}
