import path from "path";
import { z } from "zod";

/** Default Steam library location of the game's `data` directory. */
export const DEFAULT_STEAM_DATA_DIR = "C:/Program Files (x86)/Steam/steamapps/common/Total War WARHAMMER III/data";

export const SCHEMA_RELATIVE_PATH = "rpfm/config/schemas/schema_wh3.ron";

const envSchema = z.object({
  WH3_DATA_DIR: z.string().min(1).optional(),
  APPDATA: z.string().min(1).optional(),
});

export type ExportEnv = z.infer<typeof envSchema>;

export function readEnv(env: NodeJS.ProcessEnv = process.env): ExportEnv {
  return envSchema.parse({
    WH3_DATA_DIR: env.WH3_DATA_DIR || undefined,
    APPDATA: env.APPDATA || undefined,
  });
}

export const rpfmConfigSchema = z.object({
  rpfmDir: z.string().min(1),
  pack: z.string().min(1).optional(),
  schema: z.string().min(1).optional(),
  gameDataDir: z.string().min(1).optional(),
  platform: z.string().default(process.platform),
});

export type RpfmConfig = z.input<typeof rpfmConfigSchema>;

/**
 * Resolve the game data directory. Checks, in order:
 * - an explicit directory (CLI flag / tool argument)
 * - the WH3_DATA_DIR environment variable
 * - the default Steam install location
 */
export function resolveGameDataDir(explicit: string | undefined, env: ExportEnv = readEnv()): string {
  if (explicit) return path.resolve(explicit);
  if (env.WH3_DATA_DIR) return path.resolve(env.WH3_DATA_DIR);
  return DEFAULT_STEAM_DATA_DIR;
}

/** RPFM keeps its per-game schemas under %APPDATA%. */
export function resolveSchemaPath(explicit: string | undefined, env: ExportEnv = readEnv()): string | null {
  if (explicit) return path.resolve(explicit);
  if (env.APPDATA) return path.join(env.APPDATA, SCHEMA_RELATIVE_PATH);
  return null;
}
