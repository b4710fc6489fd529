#!/usr/bin/env node
/**
 * Extract database tables from WH3's data.pack through rpfm_cli and convert
 * them to Lua table literals.
 *
 * Usage: npm run export:tables -- -t units -t db/land_units_tables -r "C:/tools/rpfm" -d "./lua" --add-return
 */

import { runExportTables } from "../cli/export-tables.js";

process.exitCode = await runExportTables(process.argv.slice(2));
