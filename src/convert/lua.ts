import { createHash } from "crypto";
import type { TsvTable } from "./tsv.js";

export interface LuaTableOptions {
  /** Key cells by column name instead of their 1-based position. */
  mapColumns?: boolean;
  /** Prefix the literal with `return ` so the file can be `require`d. */
  addReturn?: boolean;
  /** Wrap rows as `{ checksum, records }` with an order-independent MD5. */
  checksum?: boolean;
}

interface LuaRecord {
  text: string;
  digest: string;
}

// ─── Values ─────────────────────────────────────────────────────────────────────

const INT_PATTERN = /^-?\d+$/;
const DECIMAL_PATTERN = /^(-?\d+)\.(\d+)$/;
const BOOL_PATTERN = /^(true|false)$/;

/**
 * Long-bracket string. Starts at level 1 (`[=[ ]=]`) and goes up until the
 * closing bracket can only appear at the very end.
 */
export function luaString(value: string): string {
  let level = 1;
  for (;;) {
    const eq = "=".repeat(level);
    const close = `]${eq}]`;
    if ((value + close).indexOf(close) === value.length) {
      // Lua drops a newline that directly follows the opening bracket.
      const body = value.startsWith("\n") || value.startsWith("\r") ? `\n${value}` : value;
      return `[${eq}[${body}${close}`;
    }
    level++;
  }
}

/** `1.50` → `1.5`, `3.000` → `3`. */
export function shortestNumber(value: string): string {
  const match = DECIMAL_PATTERN.exec(value);
  if (match && /^0+$/.test(match[2])) {
    return match[1];
  }
  return String(Number(value));
}

/** The first column is the row key and always stays a string. */
export function luaValue(value: string, position: number): string {
  if (position === 1) return luaString(value);
  if (BOOL_PATTERN.test(value)) return value;
  if (INT_PATTERN.test(value)) return value;
  if (DECIMAL_PATTERN.test(value)) return shortestNumber(value);
  return luaString(value);
}

const QUOTED_ESCAPES: Record<string, string> = {
  "\\": "\\\\",
  '"': '\\"',
  "\n": "\\n",
  "\r": "\\r",
  "\t": "\\t",
};

/** Double-quoted string. Control bytes use 3-digit `\ddd` escapes (no `\u`). */
export function luaQuoted(value: string): string {
  const body = value.replace(/[\\"\x00-\x1f\x7f]/g, (ch) =>
    QUOTED_ESCAPES[ch] ?? `\\${ch.charCodeAt(0).toString().padStart(3, "0")}`,
  );
  return `"${body}"`;
}

export function luaKey(position: number, column: string, mapColumns: boolean): string {
  return mapColumns ? `[${luaQuoted(column)}]` : `[${position}]`;
}

// ─── Records ────────────────────────────────────────────────────────────────────

function md5(text: string): string {
  return createHash("md5").update(text).digest("hex");
}

export function luaRecord(columns: string[], cells: string[], mapColumns: boolean): string {
  const fields = columns.map((column, i) => `${luaKey(i + 1, column, mapColumns)}=${luaValue(cells[i], i + 1)}`);
  return `{${fields.join(",")}}`;
}

/** Digest of the row's cells, independent of column order. */
export function recordDigest(cells: string[]): string {
  const normalized = cells.map((cell) => (DECIMAL_PATTERN.test(cell) ? shortestNumber(cell) : cell));
  return md5(normalized.sort().join(""));
}

function dumpRecords(records: LuaRecord[], delimiter: string): string {
  return records.map((record, i) => `[${i + 1}] = ${record.text}`).join(delimiter);
}

// ─── Tables ─────────────────────────────────────────────────────────────────────

export function toLuaTable(table: TsvTable, options: LuaTableOptions = {}): string {
  const mapColumns = options.mapColumns ?? false;

  const records: LuaRecord[] = table.rows.map((cells) => ({
    text: luaRecord(table.columns, cells, mapColumns),
    digest: options.checksum ? recordDigest(cells) : "",
  }));

  let literal: string;
  if (options.checksum) {
    const checksum = md5(records.map((r) => r.digest).sort().join(""));
    const body = records.length > 0 ? `{\n    ${dumpRecords(records, ",\n    ")}\n  }` : "{}";
    literal = `{\n  ["checksum"]="${checksum}",\n  ["records"]=${body}\n}`;
  } else {
    literal = records.length > 0 ? `{\n  ${dumpRecords(records, ",\n  ")}\n}` : "{}";
  }

  return options.addReturn ? `return ${literal}` : literal;
}
