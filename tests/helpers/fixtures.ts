/**
 * Test fixtures: SQLite scripts shaped like mdbtools output, and an
 * in-process stand-in for the mdbtools binaries.
 */
import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import type { CommandOptions, CommandResult, CommandRunner } from "../../src/services/command-runner.js";

export type SqlValue = string | number | null;
export type SqlRow = Record<string, SqlValue>;

export const PARAMETER_COLUMNS: Array<[string, string]> = [
  ["Index", "INTEGER"], ["Volgorde", "INTEGER"], ["Naam", "TEXT"], ["Naam_fabriek", "TEXT"],
  ["Min", "REAL"], ["Max", "REAL"], ["Default", "REAL"],
  ["Tekst_NL", "TEXT"], ["Omschrijving_NL", "TEXT"], ["Eenheid_NL", "TEXT"],
  ["Tekst_GB", "TEXT"], ["Omschrijving_GB", "TEXT"], ["Eenheid_GB", "TEXT"],
  ["Tekst_D", "TEXT"], ["Omschrijving_D", "TEXT"], ["Eenheid_D", "TEXT"],
  ["Subtabel", "TEXT"], ["Paswoordnivo", "INTEGER"],
];

export const DATALABEL_COLUMNS: Array<[string, string]> = [
  ["Index", "INTEGER"], ["Naam", "TEXT"],
  ["Tekst_NL", "TEXT"], ["Tooltip_NL", "TEXT"], ["Eenheid_NL", "TEXT"],
  ["Tekst_GB", "TEXT"], ["Tooltip_GB", "TEXT"], ["Eenheid_GB", "TEXT"],
  ["Tekst_D", "TEXT"], ["Tooltip_D", "TEXT"], ["Eenheid_D", "TEXT"],
  ["SubTabel", "TEXT"], ["Visible", "INTEGER"],
];

export function createTableDdl(table: string, columns: Array<[string, string]>): string {
  const cols = columns.map(([name, type]) => `\t\`${name}\`\t\t\t${type}`).join(", \n");
  return `CREATE TABLE \`${table}\`\n (\n${cols}\n);\n`;
}

function literal(v: SqlValue): string {
  if (v === null) return "NULL";
  if (typeof v === "number") return String(v);
  return `'${v.replace(/'/g, "''")}'`;
}

/** INSERT script as produced by `mdb-export -I sqlite`, wrapped in a transaction */
export function insertScript(table: string, rows: SqlRow[]): string {
  const lines = rows.map(row => {
    const cols = Object.keys(row).map(c => `\`${c}\``).join(", ");
    const vals = Object.values(row).map(literal).join(", ");
    return `INSERT INTO \`${table}\` (${cols}) VALUES (${vals});`;
  });
  return ["BEGIN TRANSACTION;", ...lines, "COMMIT;", ""].join("\n");
}

export function parameterRow(index: number, label: string, extra: Partial<SqlRow> = {}): SqlRow {
  return {
    Index: index, Volgorde: index * 10, Naam: `param_${index}`, Naam_fabriek: `factory_${index}`,
    Min: 0, Max: 100, Default: 50,
    Tekst_NL: `${label} NL`, Omschrijving_NL: null, Eenheid_NL: "%",
    Tekst_GB: label, Omschrijving_GB: `${label} description`, Eenheid_GB: "%",
    Tekst_D: `${label} D`, Omschrijving_D: null, Eenheid_D: "%",
    Subtabel: null, Paswoordnivo: 1,
    ...extra,
  };
}

export function datalabelRow(index: number, label: string, unit: string | null, extra: Partial<SqlRow> = {}): SqlRow {
  return {
    Index: index, Naam: `label_${index}`,
    Tekst_NL: `${label} NL`, Tooltip_NL: `${label} NL`, Eenheid_NL: unit,
    Tekst_GB: label, Tooltip_GB: label, Eenheid_GB: unit,
    Tekst_D: `${label} D`, Tooltip_D: `${label} D`, Eenheid_D: unit,
    SubTabel: null, Visible: 1,
    ...extra,
  };
}

export interface FakeTable {
  name: string;
  columns: Array<[string, string]>;
  rows: SqlRow[];
}

export interface FakeDatabase {
  tables: FakeTable[];
  /** Listed by mdb-tables but without DDL or export (Access internals) */
  internalTables?: string[];
}

export function schemaScript(db: FakeDatabase): string {
  return db.tables.map(t => createTableDdl(t.name, t.columns)).join("\n");
}

export interface FakeRunnerOptions {
  missingTools?: string[];
  /** tool (or `mdb-export:<table>`) → stderr text */
  stderr?: Record<string, string>;
  timeoutOn?: string;
  exitCode?: Record<string, number>;
}

/** Answers mdb-schema / mdb-tables / mdb-export from a FakeDatabase */
export class FakeMdbRunner implements CommandRunner {
  readonly calls: Array<{ command: string; args: readonly string[]; options: CommandOptions }> = [];

  constructor(
    private readonly db: FakeDatabase,
    private readonly options: FakeRunnerOptions = {},
  ) {}

  which(command: string): string | null {
    return this.options.missingTools?.includes(command) ? null : `/usr/bin/${command}`;
  }

  run(command: string, args: readonly string[], options: CommandOptions): CommandResult {
    this.calls.push({ command, args, options });
    const table = command === "mdb-export" ? args[args.length - 1] : undefined;
    const key = table ? `${command}:${table}` : command;

    if (this.options.timeoutOn === key) {
      return { stdout: "", stderr: "", exitCode: null, signal: "SIGKILL", timedOut: true };
    }
    const stderr = this.options.stderr?.[key] ?? "";
    const exitCode = this.options.exitCode?.[key] ?? 0;

    switch (command) {
      case "mdb-schema":
        return { stdout: schemaScript(this.db), stderr, exitCode, signal: null, timedOut: false };
      case "mdb-tables": {
        const names = [...(this.db.internalTables ?? []), ...this.db.tables.map(t => t.name)];
        return { stdout: `${names.join("\n")}\n`, stderr, exitCode, signal: null, timedOut: false };
      }
      case "mdb-export": {
        const found = this.db.tables.find(t => t.name === table);
        if (!found) return { stdout: "", stderr: `Error: Table ${table} does not exist in this database.\n`, exitCode: 1, signal: null, timedOut: false };
        return { stdout: insertScript(found.name, found.rows), stderr, exitCode, signal: null, timedOut: false };
      }
      default:
        return { stdout: "", stderr: `${command}: not found`, exitCode: 127, signal: null, timedOut: false };
    }
  }

  /** Directory holding the working copy mdbtools was pointed at */
  workingDirectories(): string[] {
    const dirs = new Set<string>();
    for (const call of this.calls) {
      const file = call.args.find(a => a.endsWith(".mdb"));
      if (file) dirs.add(path.dirname(file));
    }
    return [...dirs];
  }
}

/** A throwaway input file; content is opaque to the code under test */
export function writeInputFile(name = "HRU250-300.par"): string {
  const dir = mkdtempSync(path.join(tmpdir(), "hru-test-input-"));
  const file = path.join(dir, name);
  writeFileSync(file, "Standard Jet DB placeholder");
  return file;
}

/** Versions 1, 2 (lowercase parameter table) and 4; version 3 has no tables */
export function sampleDatabase(): FakeDatabase {
  return {
    internalTables: ["~TMPCLP12345"],
    tables: [
      { name: "Parameterlijst_V1", columns: PARAMETER_COLUMNS, rows: [parameterRow(2, "Fan low"), parameterRow(1, "Fan high")] },
      { name: "Datalabel_V1", columns: DATALABEL_COLUMNS, rows: [datalabelRow(1, "Temp", "°C")] },
      { name: "parameterlijst_V2", columns: PARAMETER_COLUMNS, rows: [parameterRow(1, "Fan high"), parameterRow(3, "Bypass")] },
      { name: "Datalabel_V2", columns: DATALABEL_COLUMNS, rows: [datalabelRow(1, "Temp", "°C"), datalabelRow(2, "Airflow", "M3/h")] },
      {
        name: "Parameterlijst_V4",
        columns: PARAMETER_COLUMNS,
        rows: [parameterRow(5, "Filter interval", { Eenheid_GB: "uur" }), parameterRow(4, "Bypass")],
      },
      {
        name: "Datalabel_V4",
        columns: DATALABEL_COLUMNS,
        rows: [
          datalabelRow(3, "Fan setpoint", "rpm"),
          datalabelRow(1, "Temp", "°C"),
          datalabelRow(2, "Airflow", "M3/h"),
          datalabelRow(5, "Operating time", "uur"),
          datalabelRow(4, "Status", "-"),
        ],
      },
      { name: "Bedieningen", columns: [["Index", "INTEGER"], ["Omschrijving", "TEXT"]], rows: [{ Index: 1, Omschrijving: "Remote" }] },
    ],
  };
}
