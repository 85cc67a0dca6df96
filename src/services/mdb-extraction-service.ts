/**
 * MdbExtractionService — Turns a parameter file (Access database) into
 * SQLite DDL, a table list and one INSERT script per table, via mdbtools.
 *
 * The input is copied into a private working directory first and never
 * touched again; intermediate exports are written next to the copy. Call
 * dispose() (or use extract()'s own cleanup) to remove the directory.
 */
import { copyFileSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { MDB_CONFIG, type MdbConfig } from "../utils/config.js";
import { errorMessage, ExtractionError, InputFileError, ToolUnavailableError } from "../utils/errors.js";
import logger from "../utils/logger.js";
import { type CommandResult, type CommandRunner, ProcessCommandRunner } from "./command-runner.js";

/** Tables starting with this marker are Access internals / temporaries */
export const INTERNAL_TABLE_MARKER = "~";

export interface TableExport {
  name: string;
  sql: string;
}

export interface ExtractionResult {
  schema: string;
  tables: string[];
  exports: TableExport[];
}

export interface MdbExtractionOptions {
  runner?: CommandRunner;
  config?: MdbConfig;
}

/** Parse `mdb-tables -1` output, dropping internal tables */
export function parseTableList(stdout: string): string[] {
  return stdout
    .split(/\r?\n/)
    .map(t => t.trim())
    .filter(t => t && !t.startsWith(INTERNAL_TABLE_MARKER));
}

export class MdbExtractionService {
  private readonly runner: CommandRunner;
  private readonly config: MdbConfig;
  private workDir: string | null = null;
  private readonly databaseFile: string;

  constructor(
    readonly sourceFile: string,
    options: MdbExtractionOptions = {},
  ) {
    this.runner = options.runner ?? new ProcessCommandRunner();
    this.config = options.config ?? MDB_CONFIG;

    // Tool check happens before any file is touched
    for (const tool of [this.config.schemaTool, this.config.tablesTool, this.config.exportTool]) {
      if (!this.runner.which(tool)) throw new ToolUnavailableError(tool);
    }

    let workDir: string;
    try {
      workDir = mkdtempSync(path.join(tmpdir(), "hru-params-"));
    } catch (e) {
      throw new ExtractionError(`Failed to create working directory: ${errorMessage(e)}`, { file: sourceFile }, e);
    }
    this.workDir = workDir;

    // .par copies get an .mdb name
    let fileName = path.basename(sourceFile);
    if (fileName.endsWith(".par")) fileName = `${fileName.slice(0, -".par".length)}.mdb`;
    this.databaseFile = path.join(workDir, fileName);

    try {
      copyFileSync(sourceFile, this.databaseFile);
    } catch (e) {
      this.dispose();
      throw new InputFileError(sourceFile, e);
    }
    logger.debug(`Created temporary file: ${this.databaseFile}`, { module: "mdb" });
  }

  get workingDirectory(): string | null {
    return this.workDir;
  }

  /**
   * Full export: schema, table names, per-table INSERT scripts.
   * Any tool failure aborts; nothing partial is returned.
   */
  extract(): ExtractionResult {
    const workDir = this.requireWorkDir();
    // suffixed so it never collides with the working copy (inputs may have no extension)
    const baseName = path.basename(this.databaseFile).split(".")[0] || "export";
    const tableDir = path.join(workDir, `${baseName}.tables`);
    try {
      mkdirSync(tableDir, { recursive: true });
    } catch (e) {
      throw new ExtractionError(`Failed to create table directory ${tableDir}: ${errorMessage(e)}`, { file: this.sourceFile }, e);
    }
    logger.debug(`Created temporary table directory: ${tableDir}`, { module: "mdb" });

    const schema = this.exportSchema(tableDir);
    const tables = this.listTables();
    const exports = tables.map(name => ({ name, sql: this.exportTable(tableDir, name) }));

    return { schema, tables, exports };
  }

  exportSchema(tableDir: string): string {
    const tool = this.config.schemaTool;
    const result = this.invoke(tool, [this.databaseFile, "sqlite"], "Failed to export schema");
    const schemaFile = path.join(tableDir, "schema.sqlite");
    writeFileSync(schemaFile, result.stdout, "utf8");
    logger.debug(`Exported database schema to ${schemaFile}`, { module: "mdb" });
    return readFileSync(schemaFile, "utf8");
  }

  listTables(): string[] {
    const tool = this.config.tablesTool;
    const result = this.invoke(tool, ["-1", this.databaseFile], "Failed to get database tables");
    const tables = parseTableList(result.stdout);
    for (const table of tables) logger.debug(`Found database table: ${table}`, { module: "mdb" });
    return tables;
  }

  exportTable(tableDir: string, table: string): string {
    const tool = this.config.exportTool;
    const args = ["-D", "%Y-%m-%d %H:%M:%S", "-q", "'", "-H", "-I", "sqlite", this.databaseFile, table];
    const result = this.invoke(tool, args, `Failed to convert table: ${table}`, table);
    const tableFile = path.join(tableDir, `${table}.sql`);
    writeFileSync(tableFile, result.stdout, "utf8");
    logger.debug(`Converted table: ${table}`, { module: "mdb" });
    return readFileSync(tableFile, "utf8");
  }

  /** Remove the working directory. Safe to call more than once. */
  dispose(): void {
    if (!this.workDir) return;
    rmSync(this.workDir, { recursive: true, force: true });
    logger.debug(`Removed temporary directory: ${this.workDir}`, { module: "mdb" });
    this.workDir = null;
  }

  private requireWorkDir(): string {
    if (!this.workDir) throw new ExtractionError("Extraction already disposed", { file: this.sourceFile });
    return this.workDir;
  }

  private invoke(tool: string, args: string[], failure: string, table?: string): CommandResult {
    const context = { file: this.sourceFile, tool, table };
    let result: CommandResult;
    try {
      result = this.runner.run(tool, args, { timeoutMs: this.config.timeoutMs, maxBuffer: this.config.maxBuffer });
    } catch (e) {
      throw new ExtractionError(`${failure}: ${tool} could not be started: ${errorMessage(e)}`, context, e);
    }

    if (result.timedOut) {
      throw new ExtractionError(`${failure}: ${tool} timed out after ${this.config.timeoutMs}ms`, context);
    }
    if (result.stderr.trim()) {
      throw new ExtractionError(`${failure} with error: ${result.stderr.trim()}`, context);
    }
    if (result.exitCode !== 0) {
      const status = result.signal ? `signal ${result.signal}` : `exit code ${result.exitCode}`;
      throw new ExtractionError(`${failure}: ${tool} terminated with ${status}`, context);
    }
    return result;
  }
}
