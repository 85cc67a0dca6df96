/**
 * ParameterCatalog — Full pipeline from parameter file to versioned catalog
 *
 *   extract (mdbtools) → in-memory store → version discovery → catalog load
 *
 * The working directory is gone once open() returns (or throws). The store
 * connection stays open for the catalog's lifetime; close() releases it.
 * Prefer withParameterCatalog() which always closes.
 */
import type { DatalabelRecord, ParameterRecord, SensorDescriptor, VersionCatalog } from "../types/catalog.js";
import { UnknownVersionError } from "../utils/errors.js";
import logger from "../utils/logger.js";
import { CatalogLoader, type CatalogLoaderOptions } from "./catalog-loader.js";
import { MdbExtractionService, type MdbExtractionOptions } from "./mdb-extraction-service.js";
import { ParameterStore } from "./parameter-store.js";
import { buildSensorDescriptors, type SensorDescriptorOptions } from "./sensor-descriptor.js";
import { discoverVersions } from "./version-discovery.js";

export interface ParameterCatalogOptions extends MdbExtractionOptions, CatalogLoaderOptions {
  sensors?: SensorDescriptorOptions;
}

export class ParameterCatalog {
  private constructor(
    readonly sourceFile: string,
    readonly tables: readonly string[],
    private store: ParameterStore | null,
    private readonly catalogs: Map<number, VersionCatalog>,
    private readonly sensorOptions: SensorDescriptorOptions,
  ) {}

  static open(file: string, options: ParameterCatalogOptions = {}): ParameterCatalog {
    const extraction = new MdbExtractionService(file, options);
    let store: ParameterStore | null = null;
    try {
      store = new ParameterStore();
      const { schema, tables, exports } = extraction.extract();
      store.applySchema(schema);
      store.loadTables(exports);

      const versions = discoverVersions(tables);
      const catalogs = new CatalogLoader(store, tables, options).loadAll(versions);
      logger.info(`Loaded ${tables.length} tables, ${versions.length} versions from ${file}`, { module: "catalog" });

      return new ParameterCatalog(file, tables, store, catalogs, options.sensors ?? {});
    } catch (e) {
      store?.close();
      throw e;
    } finally {
      extraction.dispose();
    }
  }

  /** Discovered firmware versions, ascending, 1..max */
  versions(): number[] {
    return [...this.catalogs.keys()];
  }

  latestVersion(): number | null {
    const versions = this.versions();
    return versions.length ? versions[versions.length - 1] : null;
  }

  catalog(version: number): VersionCatalog {
    const catalog = this.catalogs.get(version);
    if (!catalog) throw new UnknownVersionError(version, this.versions());
    return catalog;
  }

  parameters(version: number): readonly ParameterRecord[] {
    return this.catalog(version).parameters;
  }

  datalabels(version: number): readonly DatalabelRecord[] {
    return this.catalog(version).datalabels;
  }

  sensors(version: number, options: SensorDescriptorOptions = this.sensorOptions): SensorDescriptor[] {
    return buildSensorDescriptors(this.datalabels(version), options);
  }

  get isOpen(): boolean {
    return this.store !== null;
  }

  close(): void {
    this.store?.close();
    this.store = null;
  }
}

/** Open a catalog, hand it to fn, always close it */
export function withParameterCatalog<T>(file: string, options: ParameterCatalogOptions, fn: (catalog: ParameterCatalog) => T): T {
  const catalog = ParameterCatalog.open(file, options);
  try {
    return fn(catalog);
  } finally {
    catalog.close();
  }
}
