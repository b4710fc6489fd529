/**
 * Export database tables from the game's data.pack with rpfm_cli.
 *
 * rpfm_cli is given one `--file-path db/<table>_tables/data__;<dir>` per table
 * and writes `<dir>/db/<table>_tables/data__.tsv`. Those files are collected
 * and moved to `<dest>/<table>.tsv`.
 */

import fs from "fs";
import os from "os";
import path from "path";
import { readEnv, resolveGameDataDir, resolveSchemaPath, rpfmConfigSchema, type ExportEnv, type RpfmConfig } from "../config.js";
import { InvalidOptionsError, MissingDependencyError } from "../errors.js";
import { logger } from "../logger.js";
import { tableNameFromExportDir, tablePackPath } from "./names.js";
import { runProcess, type ProcessRunner } from "./process.js";

export const RPFM_GAME_KEY = "warhammer_3";

export interface RpfmDependencies {
  cli: string;
  schema: string;
  pack: string;
}

export interface ExtractOptions extends RpfmConfig {
  /** Normalized table names (see normalizeTableName). */
  tables: string[];
  dest: string;
}

// ─── Dependencies ───────────────────────────────────────────────────────────────

export function rpfmCliPath(rpfmDir: string, platform: string = process.platform): string {
  return path.join(rpfmDir, platform === "win32" ? "rpfm_cli.exe" : "rpfm_cli");
}

export function resolveRpfmDependencies(config: RpfmConfig, env: ExportEnv = readEnv()): RpfmDependencies {
  const { rpfmDir, pack, schema, gameDataDir, platform } = rpfmConfigSchema.parse(config);

  const dir = path.resolve(rpfmDir);
  if (!fs.existsSync(dir)) {
    throw new MissingDependencyError("RPFM installation directory", dir);
  }

  const cli = rpfmCliPath(dir, platform);
  if (!fs.existsSync(cli)) {
    throw new MissingDependencyError(`"${path.basename(cli)}"`, cli);
  }

  const schemaPath = resolveSchemaPath(schema, env);
  if (schemaPath === null) {
    throw new MissingDependencyError("RPFM schemas directory (APPDATA is not set)", `%APPDATA%/rpfm/config/schemas`);
  }
  if (!fs.existsSync(schemaPath)) {
    throw new MissingDependencyError("RPFM WH3 schema", schemaPath);
  }

  const packPath = pack ? path.resolve(pack) : path.join(resolveGameDataDir(gameDataDir, env), "data.pack");
  if (!fs.existsSync(packPath)) {
    throw new MissingDependencyError(`"data.pack" inside game data directory`, packPath);
  }

  return { cli, schema: schemaPath, pack: packPath };
}

// ─── Command line ───────────────────────────────────────────────────────────────

export function buildExtractArgs(deps: RpfmDependencies, tables: string[], outDir: string): string[] {
  const args = [
    "--game", RPFM_GAME_KEY,
    "pack", "extract",
    "--pack-path", deps.pack,
    "--tables-as-tsv", deps.schema,
  ];
  for (const table of tables) {
    args.push("--file-path", `${tablePackPath(table)};${outDir}`);
  }
  return args;
}

// ─── Collecting results ─────────────────────────────────────────────────────────

function findTsvFiles(dir: string): string[] {
  const results: string[] = [];
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      results.push(...findTsvFiles(fullPath));
    } else if (entry.name.endsWith(".tsv")) {
      results.push(fullPath);
    }
  }
  return results;
}

function moveFile(from: string, to: string): void {
  try {
    fs.renameSync(from, to);
  } catch (err) {
    // Temp dir and destination can live on different devices.
    if (err instanceof Error && "code" in err && err.code === "EXDEV") {
      fs.copyFileSync(from, to);
      fs.rmSync(from, { force: true });
      return;
    }
    throw err;
  }
}

// ─── Main ───────────────────────────────────────────────────────────────────────

export async function extractTables(
  options: ExtractOptions,
  runner: ProcessRunner = runProcess,
  env: ExportEnv = readEnv(),
): Promise<string[]> {
  if (options.tables.length === 0) {
    throw new InvalidOptionsError("At least one table name is required");
  }

  const deps = resolveRpfmDependencies(options, env);
  const dest = path.resolve(options.dest);
  fs.mkdirSync(dest, { recursive: true });

  const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "wh3-rpfm-"));
  try {
    await runner(deps.cli, buildExtractArgs(deps, options.tables, tmpDir));

    const files: string[] = [];
    for (const exported of findTsvFiles(tmpDir)) {
      const table = tableNameFromExportDir(path.basename(path.dirname(exported)));
      const target = path.join(dest, `${table}.tsv`);
      moveFile(exported, target);
      files.push(target);
    }

    if (files.length === 0) {
      logger.warn({ tables: options.tables }, "rpfm_cli exported no tables");
    }

    logger.info({ tables: options.tables, files: files.length }, "extracted");
    return files.sort();
  } finally {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  }
}
