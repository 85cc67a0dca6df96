/**
 * ParameterStore — In-memory SQLite database holding the extracted tables.
 *
 * Loaded once (schema, then every table's INSERT script), read-only after.
 */
import Database from "better-sqlite3";
import { errorMessage, QueryError } from "../utils/errors.js";
import logger from "../utils/logger.js";
import type { TableExport } from "./mdb-extraction-service.js";

export type StoreRow = Record<string, unknown>;

/** Transaction statements in exported scripts; the store manages its own */
const TRANSACTION_STATEMENT = /^[ \t]*(BEGIN([ \t]+(DEFERRED|IMMEDIATE|EXCLUSIVE))?([ \t]+TRANSACTION)?|COMMIT([ \t]+TRANSACTION)?|END([ \t]+TRANSACTION)?)[ \t]*;[ \t\r]*$/gim;

export function stripTransactionStatements(sql: string): string {
  return sql.replace(TRANSACTION_STATEMENT, "");
}

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export class ParameterStore {
  private db: Database.Database | null;

  constructor() {
    this.db = new Database(":memory:");
  }

  get isOpen(): boolean {
    return this.db !== null;
  }

  /** Apply the exported DDL, committed as one unit */
  applySchema(ddl: string): void {
    this.inTransaction(db => db.exec(stripTransactionStatements(ddl)), "schema");
    logger.debug("Applied database schema", { module: "store" });
  }

  /** Insert every exported table, committed once after the last one */
  loadTables(exports: readonly TableExport[]): void {
    this.inTransaction(db => {
      for (const table of exports) {
        try {
          db.exec(stripTransactionStatements(table.sql));
        } catch (e) {
          throw new QueryError(`Failed to import table: ${table.name}: ${errorMessage(e)}`, { table: table.name }, e);
        }
        logger.debug(`Imported table: ${table.name}`, { module: "store" });
      }
    }, "tables");
  }

  /** SELECT * ordered ascending by the integer "Index" column */
  selectOrderedByIndex(table: string, version?: number): StoreRow[] {
    const db = this.requireDb();
    const sql = `SELECT * FROM ${quoteIdentifier(table)} ORDER BY "Index" ASC`;
    try {
      return db.prepare<[], StoreRow>(sql).all();
    } catch (e) {
      const where = version !== undefined ? ` for version ${version}` : "";
      throw new QueryError(`Query on table "${table}"${where} failed: ${errorMessage(e)}`, { table, version }, e);
    }
  }

  tableNames(): string[] {
    const rows = this.requireDb()
      .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name")
      .all();
    return rows.map(r => r.name);
  }

  /** Commit anything pending and release the connection. Idempotent. */
  close(): void {
    if (!this.db) return;
    if (this.db.inTransaction) this.db.exec("COMMIT");
    this.db.close();
    this.db = null;
  }

  private inTransaction(fn: (db: Database.Database) => void, what: string): void {
    const db = this.requireDb();
    db.exec("BEGIN");
    try {
      fn(db);
      db.exec("COMMIT");
    } catch (e) {
      if (db.inTransaction) db.exec("ROLLBACK");
      if (e instanceof QueryError) throw e;
      throw new QueryError(`Failed to apply ${what}: ${errorMessage(e)}`, {}, e);
    }
  }

  private requireDb(): Database.Database {
    if (!this.db) throw new QueryError("Parameter store is closed", {});
    return this.db;
  }
}
