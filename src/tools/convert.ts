import path from "path";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { convertFiles, resolveSources, type ConversionReport } from "../convert/index.js";
import { toLuaTable } from "../convert/lua.js";
import { parseTsv } from "../convert/tsv.js";
import { formatError } from "../errors.js";

export function formatReport(report: ConversionReport): string {
  if (report.results.length === 0) {
    return "No .tsv files found to convert.";
  }

  const lines = report.results.map((r) =>
    r.ok ? `- ${r.source} -> ${r.output} (${r.rows} rows)` : `- FAILED ${r.source}: ${r.error}`,
  );
  return `Converted ${report.converted} file(s), ${report.failed} failed:\n\n${lines.join("\n")}`;
}

export function registerConvertTools(server: McpServer): void {
  server.tool(
    "convert_tsv",
    "Convert RPFM .tsv table exports into Lua table literal files. Give either a list of files or a directory (searched recursively).",
    {
      files: z.array(z.string()).optional().describe("Paths to .tsv files"),
      directory: z.string().optional().describe("Directory to convert all .tsv files in"),
      dest: z.string().optional().describe("Output directory (default: beside each source file)"),
      replace: z.boolean().default(false).describe("Delete the source .tsv files after converting them"),
      map_columns: z.boolean().default(false).describe("Key row fields by column name instead of position"),
      add_return: z.boolean().default(false).describe("Prefix output with `return` so it can be required"),
      checksum: z.boolean().default(false).describe("Wrap rows with an MD5 checksum of the table contents"),
    },
    async ({ files, directory, dest, replace, map_columns, add_return, checksum }) => {
      try {
        const sources = resolveSources({ files, directory });
        const report = convertFiles(sources, {
          dest,
          root: directory === undefined ? undefined : path.resolve(directory),
          replace,
          mapColumns: map_columns,
          addReturn: add_return,
          checksum,
        });
        return {
          content: [{ type: "text" as const, text: formatReport(report) }],
          isError: report.failed > 0,
        };
      } catch (err) {
        return {
          content: [{ type: "text" as const, text: `Conversion failed: ${formatError(err)}` }],
          isError: true,
        };
      }
    },
  );

  server.tool(
    "preview_lua",
    "Convert inline TSV text (header row first) to a Lua table literal without touching any files.",
    {
      tsv: z.string().describe("Tab-separated text, header row first"),
      map_columns: z.boolean().default(false),
      add_return: z.boolean().default(false),
      checksum: z.boolean().default(false),
    },
    async ({ tsv, map_columns, add_return, checksum }) => {
      try {
        const table = parseTsv(tsv, "<inline>");
        const literal = toLuaTable(table, { mapColumns: map_columns, addReturn: add_return, checksum });
        return {
          content: [{ type: "text" as const, text: literal }],
        };
      } catch (err) {
        return {
          content: [{ type: "text" as const, text: formatError(err) }],
          isError: true,
        };
      }
    },
  );
}
