/**
 * Error taxonomy for the parameter file pipeline.
 *
 * Every error carries the context needed to diagnose it (file, table,
 * version, tool) without re-running at debug level.
 */

export type CatalogErrorKind =
  | "tool_unavailable"
  | "input_file"
  | "extraction"
  | "query"
  | "schema_mismatch"
  | "ambiguous_device_class"
  | "unknown_version";

export interface CatalogErrorContext {
  file?: string;
  table?: string;
  version?: number;
  tool?: string;
  unit?: string;
}

export class CatalogError extends Error {
  constructor(
    public readonly kind: CatalogErrorKind,
    message: string,
    public readonly context: CatalogErrorContext = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ToolUnavailableError extends CatalogError {
  constructor(tool: string) {
    super("tool_unavailable", `\`${tool}\` executable not found. Make sure mdbtools is installed and in PATH`, { tool });
  }
}

export class InputFileError extends CatalogError {
  constructor(file: string, cause?: unknown) {
    super("input_file", `Parameter file not found or unreadable: ${file}`, { file }, { cause });
  }
}

export class ExtractionError extends CatalogError {
  constructor(message: string, context: CatalogErrorContext, cause?: unknown) {
    super("extraction", message, context, { cause });
  }
}

export class QueryError extends CatalogError {
  constructor(message: string, context: CatalogErrorContext, cause?: unknown) {
    super("query", message, context, { cause });
  }
}

export class SchemaMismatchError extends CatalogError {
  constructor(message: string, context: CatalogErrorContext) {
    super("schema_mismatch", message, context);
  }
}

export class AmbiguousDeviceClassError extends CatalogError {
  constructor(unit: string, public readonly candidates: string[], public readonly sensor?: string) {
    super(
      "ambiguous_device_class",
      `Multiple device classes found for unit "${unit}"${sensor ? ` of sensor "${sensor}"` : ""}: ${candidates.join(", ")}`,
      { unit },
    );
  }
}

export class UnknownVersionError extends CatalogError {
  constructor(version: number, public readonly known: number[]) {
    super("unknown_version", `Firmware version: ${version} not found (known: ${known.join(", ") || "none"})`, { version });
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
