import fs from "fs";
import { ConversionError, TsvFormatError } from "../errors.js";

// ─── Types ──────────────────────────────────────────────────────────────────────

/** RPFM writes `#<table>;<version>;<path>` right under the header. */
export interface RpfmMeta {
  table: string;
  version: number;
}

export interface TsvTable {
  filePath: string;
  columns: string[];
  meta: RpfmMeta | null;
  rows: string[][];
}

const RPFM_META_PATTERN = /^#(\w+);(\d+);/;

// ─── Parsing ────────────────────────────────────────────────────────────────────

export function parseRpfmMeta(line: string): RpfmMeta | null {
  const match = RPFM_META_PATTERN.exec(line);
  if (!match) return null;
  return { table: match[1], version: Number(match[2]) };
}

export function parseTsv(text: string, filePath: string): TsvTable {
  const lines = text.split("\n");

  let columns: string[] | null = null;
  let meta: RpfmMeta | null = null;
  const rows: string[][] = [];

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].endsWith("\r") ? lines[i].slice(0, -1) : lines[i];
    if (line === "") continue;

    if (columns === null) {
      columns = line.split("\t");
      continue;
    }

    if (rows.length === 0 && meta === null) {
      meta = parseRpfmMeta(line);
      if (meta) continue;
    }

    const cells = line.split("\t");
    if (cells.length !== columns.length) {
      throw new TsvFormatError(
        filePath,
        `inconsistent column count: expected ${columns.length}, got ${cells.length}`,
        i + 1,
      );
    }
    rows.push(cells);
  }

  if (columns === null) {
    throw new TsvFormatError(filePath, "no columns found (empty file?)");
  }

  return { filePath, columns, meta, rows };
}

export function readTsvFile(filePath: string): TsvTable {
  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new ConversionError(`Failed to read "${filePath}"`, { cause: err });
  }
  return parseTsv(text, filePath);
}
