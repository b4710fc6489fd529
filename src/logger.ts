import pino from "pino";

// stdout belongs to the MCP stdio transport, so everything is logged to stderr.
const isSilentMode = (): boolean =>
  process.env.NODE_ENV === "test" || process.env.WH3_EXPORT_SILENT === "true";

export const logger = pino(
  {
    name: "wh3-table-export",
    level: isSilentMode() ? "silent" : (process.env.LOG_LEVEL ?? "info"),
  },
  pino.destination(2),
);

export default logger;
