import path from "path";
import { Command, Option } from "commander";
import { z } from "zod";
import { convertFiles, resolveSources } from "../convert/index.js";
import { addLuaOptions, assertReportSucceeded, collect, printReport, runProgram } from "./shared.js";

const tsvToLuaOptionsSchema = z.object({
  file: z.array(z.string()).optional(),
  directory: z.string().optional(),
  dest: z.string().optional(),
  replace: z.boolean().default(false),
  mapColumns: z.boolean(),
  addReturn: z.boolean(),
  md5: z.boolean(),
});

export type TsvToLuaOptions = z.infer<typeof tsvToLuaOptionsSchema>;

async function tsvToLuaHandler(options: TsvToLuaOptions): Promise<void> {
  const files = resolveSources({ files: options.file, directory: options.directory });

  console.log("Files to convert:");
  for (const file of files) console.log(`  ${file}`);

  const report = convertFiles(files, {
    dest: options.dest,
    root: options.directory === undefined ? undefined : path.resolve(options.directory),
    replace: options.replace,
    mapColumns: options.mapColumns,
    addReturn: options.addReturn,
    checksum: options.md5,
  });

  printReport(report);
  assertReportSucceeded(report);
  console.log("Converted");
}

export function createTsvToLuaProgram(): Command {
  const program = new Command();

  program
    .name("wh3-tsv-to-lua")
    .description("Convert RPFM .tsv table exports to Lua table literals")
    .addOption(
      new Option("-f, --file <path>", "path to .tsv file from RPFM to convert (can be added multiple times)")
        .argParser(collect)
        .conflicts("directory"),
    )
    .addOption(new Option("-d, --directory <path>", "directory in which to convert all .tsv to .lua (recursively)"))
    .addOption(new Option("--dest <path>", "set different output location (default: same directory)").conflicts("replace"))
    .addOption(new Option("--replace", "replace original files with converted versions"));

  addLuaOptions(program).action(async (raw: unknown) => {
    await tsvToLuaHandler(tsvToLuaOptionsSchema.parse(raw));
  });

  return program;
}

export function runTsvToLua(argv: string[]): Promise<number> {
  return runProgram(createTsvToLuaProgram(), argv);
}
