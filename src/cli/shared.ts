import { CommanderError, InvalidArgumentError, Option, type Command } from "commander";
import { ConversionError, formatError } from "../errors.js";
import { normalizeTableName } from "../rpfm/names.js";
import type { ConversionReport } from "../convert/index.js";

export function collect(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), value];
}

export function collectTableName(value: string, previous: string[] | undefined): string[] {
  try {
    return [...(previous ?? []), normalizeTableName(value)];
  } catch (err) {
    throw new InvalidArgumentError(formatError(err));
  }
}

/** Flags shared by both commands that shape the emitted Lua. */
export function addLuaOptions(program: Command): Command {
  return program
    .addOption(new Option("--map-columns", "make rows as table<Column, Field> (by default they are table<Number, Field>)").default(false))
    .addOption(new Option("--add-return", "add `return` statement to converted files (so you can `require` table file)").default(false))
    .addOption(new Option("--md5", "calculate md5 checksum. WARNING: this will lead to different output table structure").default(false));
}

export function printReport(report: ConversionReport): void {
  for (const result of report.results) {
    if (result.ok) {
      console.log(`  ${result.source} -> ${result.output} (${result.rows} rows)`);
    } else {
      console.log(`  FAILED ${result.source}: ${result.error}`);
    }
  }
  console.log(`Converted ${report.converted} file(s), ${report.failed} failed.`);
}

/** Per-file failures don't stop the batch, but the run as a whole still fails. */
export function assertReportSucceeded(report: ConversionReport): void {
  if (report.failed > 0) {
    throw new ConversionError(`${report.failed} file(s) failed to convert`);
  }
}

/**
 * Parse and run a program, turning every failure into an exit code:
 * commander's own errors keep theirs, everything else prints one line and is 1.
 */
export async function runProgram(program: Command, argv: string[]): Promise<number> {
  program.exitOverride();
  try {
    await program.parseAsync(argv, { from: "user" });
    return 0;
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    console.error(`error: ${formatError(err)}`);
    return 1;
  }
}
