/**
 * Public API: parameter file → versioned catalog → MQTT sensor discovery
 */
export { CatalogLoader, datalabelTableCandidates, parameterTableCandidates } from "./services/catalog-loader.js";
export type { CatalogLoaderOptions } from "./services/catalog-loader.js";
export {
  isOutputFormat,
  jsonSerializer,
  OUTPUT_FORMATS,
  renderParameters,
  renderSensors,
  serializerFor,
  yamlSerializer,
} from "./services/catalog-output.js";
export type { OutputFormat, Serializer } from "./services/catalog-output.js";
export { ProcessCommandRunner } from "./services/command-runner.js";
export type { CommandOptions, CommandResult, CommandRunner } from "./services/command-runner.js";
export { loadDefaultReference, StaticDeviceClassReference } from "./services/device-class-reference.js";
export type { DeviceClassReference, ReferenceTables } from "./services/device-class-reference.js";
export { MdbExtractionService } from "./services/mdb-extraction-service.js";
export type { ExtractionResult, MdbExtractionOptions, TableExport } from "./services/mdb-extraction-service.js";
export { ParameterCatalog, withParameterCatalog } from "./services/parameter-catalog.js";
export type { ParameterCatalogOptions } from "./services/parameter-catalog.js";
export { ParameterStore } from "./services/parameter-store.js";
export {
  buildSensorDescriptor,
  buildSensorDescriptors,
  inferDeviceClass,
  inferStateClass,
  normalizeUnit,
  valueTemplate,
} from "./services/sensor-descriptor.js";
export type { NormalizedUnit, SensorDescriptorOptions } from "./services/sensor-descriptor.js";
export { discoverVersions } from "./services/version-discovery.js";
export * from "./types/catalog.js";
export * from "./utils/errors.js";
export { CATALOG_CONFIG, MDB_CONFIG, MQTT_CONFIG } from "./utils/config.js";
export type { MdbConfig, MqttConfig } from "./utils/config.js";
