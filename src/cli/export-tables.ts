import { Command, Option } from "commander";
import { z } from "zod";
import { exportTables } from "../pipeline.js";
import type { ProcessRunner } from "../rpfm/process.js";
import { addLuaOptions, assertReportSucceeded, collectTableName, printReport, runProgram } from "./shared.js";

const exportTablesOptionsSchema = z.object({
  table: z.array(z.string()).min(1),
  rpfm: z.string(),
  dest: z.string(),
  pack: z.string().optional(),
  schema: z.string().optional(),
  gameData: z.string().optional(),
  mapColumns: z.boolean(),
  addReturn: z.boolean(),
  md5: z.boolean(),
});

export type ExportTablesCliOptions = z.infer<typeof exportTablesOptionsSchema>;

export function createExportTablesProgram(runner?: ProcessRunner): Command {
  const program = new Command();

  program
    .name("wh3-export-tables")
    .description("Export WH3 database tables as Lua scripts using RPFM CLI")
    .addOption(
      new Option("-t, --table <table_name>", "table to extract (can be added multiple times)")
        .argParser(collectTableName)
        .makeOptionMandatory(),
    )
    .requiredOption("-r, --rpfm <path>", "path to RPFM installation dir")
    .requiredOption("-d, --dest <path>", "destination directory where store results")
    .option("--pack <path>", "path to data.pack (default: <game data dir>/data.pack)")
    .option("--schema <path>", "path to schema_wh3.ron (default: %APPDATA%/rpfm/config/schemas/schema_wh3.ron)")
    .option("--game-data <path>", "game data directory (default: $WH3_DATA_DIR or the Steam install)");

  addLuaOptions(program).action(async (raw: unknown) => {
    const options = exportTablesOptionsSchema.parse(raw);

    console.log("=====================================");
    console.log("-- Tables to extract (normalized): --");
    for (const table of options.table) console.log(`  ${table}`);
    console.log("-------------------------------------");

    const report = await exportTables(
      {
        tables: options.table,
        rpfmDir: options.rpfm,
        dest: options.dest,
        pack: options.pack,
        schema: options.schema,
        gameDataDir: options.gameData,
        mapColumns: options.mapColumns,
        addReturn: options.addReturn,
        checksum: options.md5,
      },
      runner,
    );

    console.log("------------ Converted --------------");
    printReport(report);
    assertReportSucceeded(report);
    console.log("-------------- Done -----------------");
  });

  return program;
}

export function runExportTables(argv: string[], runner?: ProcessRunner): Promise<number> {
  return runProgram(createExportTablesProgram(runner), argv);
}
