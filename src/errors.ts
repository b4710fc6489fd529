import { ZodError } from "zod";

export type ExportErrorCode =
  | "INVALID_TABLE_NAME"
  | "MISSING_DEPENDENCY"
  | "EXTRACTION_FAILED"
  | "TSV_FORMAT"
  | "CONVERSION_FAILED"
  | "INVALID_OPTIONS";

export class ExportError extends Error {
  readonly code: ExportErrorCode;

  constructor(code: ExportErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidTableNameError extends ExportError {
  constructor(value: string, normalized: string) {
    super("INVALID_TABLE_NAME", `Failed to normalize table name: "${value}" -> "${normalized}"`);
  }
}

/** A path the tool needs (RPFM dir, rpfm_cli, schema, data.pack) does not exist. */
export class MissingDependencyError extends ExportError {
  readonly path: string;

  constructor(what: string, path: string) {
    super("MISSING_DEPENDENCY", `Failed to get ${what}. Expected to find it here: ${path}`);
    this.path = path;
  }
}

export class ExtractionError extends ExportError {
  readonly exitCode: number | null;

  constructor(message: string, exitCode: number | null = null, options?: { cause?: unknown }) {
    super("EXTRACTION_FAILED", message, options);
    this.exitCode = exitCode;
  }
}

export class TsvFormatError extends ExportError {
  readonly filePath: string;
  readonly line: number | null;

  constructor(filePath: string, message: string, line: number | null = null) {
    super("TSV_FORMAT", line === null ? `${message}: "${filePath}"` : `${message} (line ${line}): "${filePath}"`);
    this.filePath = filePath;
    this.line = line;
  }
}

export class ConversionError extends ExportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONVERSION_FAILED", message, options);
  }
}

export class InvalidOptionsError extends ExportError {
  constructor(message: string) {
    super("INVALID_OPTIONS", message);
  }
}

export function formatError(err: unknown): string {
  if (err instanceof ZodError) return err.issues.map((issue) => issue.message).join("; ");
  if (err instanceof Error) return err.message;
  return String(err);
}
