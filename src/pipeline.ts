import fs from "fs";
import os from "os";
import path from "path";
import type { ExportEnv, RpfmConfig } from "./config.js";
import { convertFiles, type ConversionReport } from "./convert/index.js";
import type { LuaTableOptions } from "./convert/lua.js";
import { extractTables } from "./rpfm/extract.js";
import { runProcess, type ProcessRunner } from "./rpfm/process.js";

export interface ExportTablesOptions extends RpfmConfig, LuaTableOptions {
  tables: string[];
  /** Directory that receives the `.lua` files. */
  dest: string;
}

/**
 * Extract the tables into a scratch directory, then convert every exported
 * `.tsv` into `<dest>/<table>.lua`. The `.tsv` files do not outlive the call.
 */
export async function exportTables(
  options: ExportTablesOptions,
  runner: ProcessRunner = runProcess,
  env?: ExportEnv,
): Promise<ConversionReport> {
  const scratch = fs.mkdtempSync(path.join(os.tmpdir(), "wh3-export-"));
  try {
    const files = await extractTables({ ...options, dest: scratch }, runner, env);
    return convertFiles(files, {
      dest: path.resolve(options.dest),
      mapColumns: options.mapColumns,
      addReturn: options.addReturn,
      checksum: options.checksum,
    });
  } finally {
    fs.rmSync(scratch, { recursive: true, force: true });
  }
}
