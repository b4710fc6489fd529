import { createHash } from "crypto";
import { describe, expect, it } from "vitest";
import { luaQuoted, luaRecord, luaString, luaValue, recordDigest, shortestNumber, toLuaTable } from "../src/convert/lua.js";
import type { TsvTable } from "../src/convert/tsv.js";

const md5 = (text: string) => createHash("md5").update(text).digest("hex");

const units: TsvTable = {
  filePath: "units.tsv",
  columns: ["key", "value"],
  meta: { table: "units_tables", version: 3 },
  rows: [
    ["alpha", "1"],
    ["beta", "2.50"],
  ],
};

describe("luaString", () => {
  it("uses level-1 long brackets", () => {
    expect(luaString("hello")).toBe("[=[hello]=]");
    expect(luaString('quote " and \\ backslash')).toBe('[=[quote " and \\ backslash]=]');
  });

  it("raises the level when the value contains the closing bracket", () => {
    expect(luaString("a]=]b")).toBe("[==[a]=]b]==]");
    expect(luaString("a]=]b]==]c")).toBe("[===[a]=]b]==]c]===]");
  });

  it("raises the level when the value would merge with the closing bracket", () => {
    expect(luaString("tail]=")).toBe("[==[tail]=]==]");
  });

  it("keeps a trailing bracket that cannot close early", () => {
    expect(luaString("x]")).toBe("[=[x]]=]");
  });

  it("protects a leading newline", () => {
    expect(luaString("\nline")).toBe("[=[\n\nline]=]");
  });
});

describe("luaQuoted", () => {
  it("escapes quotes, backslashes and common control characters", () => {
    expect(luaQuoted('say "hi"')).toBe('"say \\"hi\\""');
    expect(luaQuoted("a\\b")).toBe('"a\\\\b"');
    expect(luaQuoted("tab\there\nline")).toBe('"tab\\there\\nline"');
  });

  it("uses decimal escapes for other control characters", () => {
    expect(luaQuoted("a\u0001b")).toBe('"a\\001b"');
    expect(luaQuoted("del\u007f")).toBe('"del\\127"');
    expect(luaQuoted("x\u001f9")).toBe('"x\\0319"');
  });

  it("leaves other characters alone", () => {
    expect(luaQuoted("unit_käse")).toBe('"unit_käse"');
  });
});

describe("luaValue", () => {
  it("always quotes the first column", () => {
    expect(luaValue("123", 1)).toBe("[=[123]=]");
    expect(luaValue("true", 1)).toBe("[=[true]=]");
  });

  it("emits booleans and integers bare", () => {
    expect(luaValue("true", 2)).toBe("true");
    expect(luaValue("false", 3)).toBe("false");
    expect(luaValue("-42", 2)).toBe("-42");
  });

  it("shortens decimals", () => {
    expect(luaValue("2.50", 2)).toBe("2.5");
    expect(luaValue("3.000", 2)).toBe("3");
    expect(luaValue("-0.25", 2)).toBe("-0.25");
  });

  it("quotes everything else", () => {
    expect(luaValue("", 2)).toBe("[=[]=]");
    expect(luaValue("True", 2)).toBe("[=[True]=]");
    expect(luaValue("1e5", 2)).toBe("[=[1e5]=]");
    expect(luaValue(".5", 2)).toBe("[=[.5]=]");
    expect(luaValue("FFFFFF", 2)).toBe("[=[FFFFFF]=]");
  });
});

describe("shortestNumber", () => {
  it("drops trailing zeros", () => {
    expect(shortestNumber("1.10")).toBe("1.1");
    expect(shortestNumber("10.0")).toBe("10");
    expect(shortestNumber("-0.0")).toBe("-0");
  });
});

describe("luaRecord", () => {
  it("keys by position by default", () => {
    expect(luaRecord(["key", "value"], ["alpha", "1"], false)).toBe("{[1]=[=[alpha]=],[2]=1}");
  });

  it("keys by column name when mapping", () => {
    expect(luaRecord(["key", "value"], ["alpha", "1"], true)).toBe('{["key"]=[=[alpha]=],["value"]=1}');
  });

  it("escapes column names", () => {
    expect(luaRecord(["k", 'odd"name'], ["a", "b"], true)).toBe('{["k"]=[=[a]=],["odd\\"name"]=[=[b]=]}');
    expect(luaRecord(["k", "ctl\u0002"], ["a", "b"], true)).toBe('{["k"]=[=[a]=],["ctl\\002"]=[=[b]=]}');
  });
});

describe("toLuaTable", () => {
  it("matches the hand-written literal for a 2x2 table", () => {
    const expected = `
      {
        [1] = {[1]=[=[alpha]=],[2]=1},
        [2] = {[1]=[=[beta]=],[2]=2.5}
      }`;
    const normalize = (s: string) => s.replace(/\s+/g, "");

    expect(normalize(toLuaTable(units))).toBe(normalize(expected));
    expect(toLuaTable(units)).toBe("{\n  [1] = {[1]=[=[alpha]=],[2]=1},\n  [2] = {[1]=[=[beta]=],[2]=2.5}\n}");
  });

  it("has one outer entry per row", () => {
    const rows = Array.from({ length: 7 }, (_, i) => [`row${i}`, String(i)]);
    const literal = toLuaTable({ ...units, rows });

    const entries = literal.split("\n").filter((line) => /^ {2}\[\d+\] = /.test(line));
    expect(entries).toHaveLength(7);
    expect(entries[6]).toBe("  [7] = {[1]=[=[row6]=],[2]=6}");
  });

  it("keys fields by column name with mapColumns", () => {
    expect(toLuaTable(units, { mapColumns: true })).toBe(
      '{\n  [1] = {["key"]=[=[alpha]=],["value"]=1},\n  [2] = {["key"]=[=[beta]=],["value"]=2.5}\n}',
    );
  });

  it("prepends exactly one return statement", () => {
    const withReturn = toLuaTable(units, { addReturn: true });
    expect(withReturn.startsWith("return {\n")).toBe(true);
    expect(withReturn.match(/return/g)).toHaveLength(1);
    expect(withReturn.slice("return ".length)).toBe(toLuaTable(units));
    expect(toLuaTable(units)).not.toContain("return");
  });

  it("emits an empty table for a header-only file", () => {
    expect(toLuaTable({ ...units, rows: [] })).toBe("{}");
    expect(toLuaTable({ ...units, rows: [] }, { addReturn: true })).toBe("return {}");
  });

  it("wraps records with a checksum", () => {
    const d1 = md5("1alpha");
    const d2 = md5("2.5beta");
    const checksum = md5([d1, d2].sort().join(""));

    expect(toLuaTable(units, { checksum: true })).toBe(
      `{\n  ["checksum"]="${checksum}",\n  ["records"]={\n    [1] = {[1]=[=[alpha]=],[2]=1},\n    [2] = {[1]=[=[beta]=],[2]=2.5}\n  }\n}`,
    );
  });

  it("gives the same checksum regardless of row order", () => {
    const reversed = { ...units, rows: [...units.rows].reverse() };
    const checksumOf = (literal: string) => /\["checksum"\]="([0-9a-f]{32})"/.exec(literal)?.[1];

    expect(checksumOf(toLuaTable(reversed, { checksum: true }))).toBe(checksumOf(toLuaTable(units, { checksum: true })));
  });
});

describe("recordDigest", () => {
  it("ignores cell order and decimal formatting", () => {
    expect(recordDigest(["beta", "2.50"])).toBe(recordDigest(["2.5", "beta"]));
    expect(recordDigest(["alpha", "1"])).toBe(md5("1alpha"));
  });
});
