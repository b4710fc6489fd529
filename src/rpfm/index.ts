export { buildExtractArgs, extractTables, resolveRpfmDependencies, rpfmCliPath, RPFM_GAME_KEY } from "./extract.js";
export type { ExtractOptions, RpfmDependencies } from "./extract.js";
export { normalizeTableName, tableNameFromExportDir, tablePackPath } from "./names.js";
export { runProcess } from "./process.js";
export type { ProcessRunner } from "./process.js";
