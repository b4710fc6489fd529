import { InvalidTableNameError } from "../errors.js";

function removePrefix(value: string, prefix: string): string {
  return value.startsWith(prefix) ? value.slice(prefix.length) : value;
}

function removeSuffix(value: string, suffix: string): string {
  return value.endsWith(suffix) ? value.slice(0, -suffix.length) : value;
}

/**
 * Accept either a bare table name or its pack path:
 * `db/units_tables/data__` → `units`, `land_units_tables` → `land_units`.
 */
export function normalizeTableName(value: string): string {
  let name = removePrefix(value, "db");
  name = removePrefix(name, "/");
  name = removeSuffix(name, "data__");
  name = removeSuffix(name, "/");
  name = removeSuffix(name, "_tables");

  if (!name) {
    throw new InvalidTableNameError(value, name);
  }
  return name;
}

/** Pack path RPFM expects for a table's data file. */
export function tablePackPath(table: string): string {
  return `db/${table}_tables/data__`;
}

/** `.../units_tables/data__.tsv` was exported from the `units` table. */
export function tableNameFromExportDir(dirName: string): string {
  return removeSuffix(dirName, "_tables");
}
