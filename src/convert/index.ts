import fs from "fs";
import path from "path";
import { z } from "zod";
import { ConversionError, InvalidOptionsError, formatError } from "../errors.js";
import { logger } from "../logger.js";
import { toLuaTable } from "./lua.js";
import { readTsvFile } from "./tsv.js";

export { luaString, luaValue, luaRecord, toLuaTable } from "./lua.js";
export type { LuaTableOptions } from "./lua.js";
export { parseTsv, readTsvFile } from "./tsv.js";
export type { RpfmMeta, TsvTable } from "./tsv.js";

// ─── Types ──────────────────────────────────────────────────────────────────────

export const conversionOptionsSchema = z
  .object({
    mapColumns: z.boolean().default(false),
    addReturn: z.boolean().default(false),
    checksum: z.boolean().default(false),
    dest: z.string().min(1).optional(),
    /** Directory the sources were collected from; its layout is mirrored under `dest`. */
    root: z.string().min(1).optional(),
    replace: z.boolean().default(false),
  })
  .refine((o) => !(o.replace && o.dest), {
    message: "--dest and --replace cannot be used together",
  });

export type ConversionOptions = z.input<typeof conversionOptionsSchema>;

export type ConversionResult =
  | { ok: true; source: string; output: string; rows: number }
  | { ok: false; source: string; error: string };

export interface ConversionReport {
  results: ConversionResult[];
  converted: number;
  failed: number;
}

export interface SourceSelection {
  files?: string[];
  directory?: string;
}

// ─── Source discovery ───────────────────────────────────────────────────────────

export function collectTsvFiles(directory: string): string[] {
  const results: string[] = [];

  function walk(currentDir: string) {
    const entries = fs.readdirSync(currentDir, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = path.join(currentDir, entry.name);
      if (entry.isDirectory()) {
        walk(fullPath);
      } else if (entry.isFile() && entry.name.endsWith(".tsv")) {
        results.push(fullPath);
      }
    }
  }

  walk(directory);
  return results.sort();
}

export function resolveSources(selection: SourceSelection): string[] {
  const hasFiles = selection.files !== undefined && selection.files.length > 0;
  if (hasFiles === (selection.directory !== undefined)) {
    throw new InvalidOptionsError("Provide either files or a directory to convert (exactly one)");
  }

  if (selection.directory !== undefined) {
    const directory = path.resolve(selection.directory);
    if (!fs.existsSync(directory) || !fs.statSync(directory).isDirectory()) {
      throw new InvalidOptionsError(`not found - "${selection.directory}"`);
    }
    return collectTsvFiles(directory);
  }

  return (selection.files ?? []).map((file) => {
    if (!file.endsWith(".tsv")) {
      throw new InvalidOptionsError(`file does not have .tsv extension - "${file}"`);
    }
    const resolved = path.resolve(file);
    if (!fs.existsSync(resolved)) {
      throw new InvalidOptionsError(`not found - "${file}"`);
    }
    return resolved;
  });
}

// ─── Conversion ─────────────────────────────────────────────────────────────────

export function outputPathFor(file: string, dest: string | undefined, root?: string): string {
  let directory = path.dirname(file);
  if (dest !== undefined) {
    directory = root === undefined ? dest : path.join(dest, path.relative(root, directory));
  }
  return path.join(directory, `${path.basename(file, ".tsv")}.lua`);
}

export function convertFile(file: string, options: ConversionOptions = {}): ConversionResult {
  const opts = conversionOptionsSchema.parse(options);

  try {
    const table = readTsvFile(file);
    const output = outputPathFor(file, opts.dest, opts.root);
    const literal = toLuaTable(table, opts);

    try {
      fs.mkdirSync(path.dirname(output), { recursive: true });
      fs.writeFileSync(output, literal, "utf-8");
    } catch (err) {
      throw new ConversionError(`Failed to write "${output}"`, { cause: err });
    }

    logger.debug({ source: file, output, rows: table.rows.length }, "converted");
    return { ok: true, source: file, output, rows: table.rows.length };
  } catch (err) {
    logger.warn({ source: file, err: formatError(err) }, "conversion failed");
    return { ok: false, source: file, error: formatError(err) };
  }
}

/**
 * Convert files one after another. A file that fails is reported and skipped;
 * with `replace`, only sources that converted are removed.
 */
export function convertFiles(files: string[], options: ConversionOptions = {}): ConversionReport {
  const opts = conversionOptionsSchema.parse(options);
  if (opts.dest) {
    fs.mkdirSync(opts.dest, { recursive: true });
  }

  // Two sources must never write the same .lua; the later one is reported instead.
  const claimed = new Map<string, string>();
  const results = files.map((file): ConversionResult => {
    const output = path.resolve(outputPathFor(file, opts.dest, opts.root));
    const owner = claimed.get(output);
    if (owner !== undefined) {
      const error = `output "${output}" is already written from "${owner}"`;
      logger.warn({ source: file, err: error }, "conversion failed");
      return { ok: false, source: file, error };
    }
    claimed.set(output, file);
    return convertFile(file, opts);
  });

  if (opts.replace) {
    for (const result of results) {
      if (result.ok) fs.rmSync(result.source, { force: true });
    }
  }

  const converted = results.filter((r) => r.ok).length;
  return { results, converted, failed: results.length - converted };
}
