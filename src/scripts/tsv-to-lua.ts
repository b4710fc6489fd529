#!/usr/bin/env node
/**
 * Convert RPFM .tsv exports to Lua table literals.
 *
 * Usage: npm run convert -- --directory "./exported" --dest "./lua" --map-columns
 */

import { runTsvToLua } from "../cli/tsv-to-lua.js";

process.exitCode = await runTsvToLua(process.argv.slice(2));
