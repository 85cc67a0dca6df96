/**
 * CatalogLoader — Resolves each version's parameter & datalabel tables and
 * materializes their rows as typed records, ordered by Index.
 *
 * Table resolution:
 *   parameters  Parameterlijst_V<n>, then parameterlijst_V<n>
 *   datalabels  Datalabel_V<n> only
 *
 * When a version has no table of its own and carryOverMissingTables is set,
 * the table resolved for the previous version is queried again, so that
 * version repeats its predecessor's catalog. With the flag off the version
 * gets an empty catalog instead.
 */
import { toDatalabelRecord, toParameterRecord, describeDatalabel } from "../schemas.js";
import type { DatalabelRecord, ParameterRecord, VersionCatalog } from "../types/catalog.js";
import { CATALOG_CONFIG } from "../utils/config.js";
import { QueryError } from "../utils/errors.js";
import logger from "../utils/logger.js";
import type { ParameterStore } from "./parameter-store.js";

export interface CatalogLoaderOptions {
  carryOverMissingTables?: boolean;
}

export const parameterTableCandidates = (version: number): string[] => [
  `Parameterlijst_V${version}`,
  `parameterlijst_V${version}`,
];

export const datalabelTableCandidates = (version: number): string[] => [`Datalabel_V${version}`];

export class CatalogLoader {
  private readonly tables: Set<string>;
  private readonly carryOver: boolean;

  constructor(
    private readonly store: ParameterStore,
    tables: readonly string[],
    options: CatalogLoaderOptions = {},
  ) {
    this.tables = new Set(tables);
    this.carryOver = options.carryOverMissingTables ?? CATALOG_CONFIG.carryOverMissingTables;
  }

  /** Load every version in order; carry-over follows that order */
  loadAll(versions: readonly number[]): Map<number, VersionCatalog> {
    const catalogs = new Map<number, VersionCatalog>();
    let parameterTable: string | null = null;
    let datalabelTable: string | null = null;

    for (const version of versions) {
      parameterTable = this.resolve(version, parameterTableCandidates(version), parameterTable, "parameter");
      datalabelTable = this.resolve(version, datalabelTableCandidates(version), datalabelTable, "datalabel");

      catalogs.set(version, {
        version,
        parameterTable,
        datalabelTable,
        parameters: parameterTable ? this.loadParameters(version, parameterTable) : [],
        datalabels: datalabelTable ? this.loadDatalabels(version, datalabelTable) : [],
      });
    }
    return catalogs;
  }

  loadParameters(version: number, table: string): ParameterRecord[] {
    logger.debug(`Finding parameters for version ${version}`, { module: "catalog", table });
    const rows = this.store.selectOrderedByIndex(table, version);
    const parameters = rows.map(row => {
      const parameter = toParameterRecord(row, { table, version });
      logger.debug(`Found parameter id: ${parameter.index} name: ${parameter.text.nl.label}`, { module: "catalog" });
      return parameter;
    });
    assertUniqueIndices(parameters, table, version);
    return parameters;
  }

  loadDatalabels(version: number, table: string): DatalabelRecord[] {
    logger.debug(`Finding datalabels for version ${version}`, { module: "catalog", table });
    const rows = this.store.selectOrderedByIndex(table, version);
    const datalabels = rows.map(row => {
      const datalabel = toDatalabelRecord(row, { table, version });
      logger.debug(`Found datalabel ${describeDatalabel(datalabel)}`, { module: "catalog" });
      return datalabel;
    });
    assertUniqueIndices(datalabels, table, version);
    return datalabels;
  }

  private resolve(version: number, candidates: string[], previous: string | null, kind: string): string | null {
    const found = candidates.find(name => this.tables.has(name));
    if (found) {
      logger.debug(`Using table: ${found}`, { module: "catalog", version });
      return found;
    }

    if (!this.carryOver) {
      logger.warn(`No ${kind} table for version ${version}, catalog left empty`, { module: "catalog" });
      return null;
    }
    if (previous === null) {
      throw new QueryError(`No ${kind} table for version ${version} (tried ${candidates.join(", ")})`, { version });
    }
    logger.warn(`No ${kind} table for version ${version}, reusing ${previous}`, { module: "catalog" });
    return previous;
  }
}

function assertUniqueIndices(records: readonly { index: number }[], table: string, version: number): void {
  const seen = new Set<number>();
  for (const { index } of records) {
    if (seen.has(index)) {
      throw new QueryError(`Duplicate Index ${index} in table "${table}" for version ${version}`, { table, version });
    }
    seen.add(index);
  }
}
