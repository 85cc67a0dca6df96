/**
 * Rendering of descriptor / parameter sequences as YAML or JSON.
 * Key insertion order and non-ASCII text are kept as-is.
 */
import { dump as dumpYaml } from "js-yaml";
import type { ParameterRecord, SensorDescriptor } from "../types/catalog.js";

export type OutputFormat = "yaml" | "json";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["yaml", "json"];

export function isOutputFormat(v: string): v is OutputFormat {
  return OUTPUT_FORMATS.some(f => f === v);
}

export interface Serializer {
  dump(data: unknown): string;
}

export const yamlSerializer: Serializer = {
  dump: data => dumpYaml(data, { sortKeys: false, lineWidth: -1, noRefs: true }),
};

export const jsonSerializer: Serializer = {
  dump: data => `${JSON.stringify(data, null, 2)}\n`,
};

export function serializerFor(format: OutputFormat): Serializer {
  return format === "json" ? jsonSerializer : yamlSerializer;
}

export function renderSensors(sensors: readonly SensorDescriptor[], serializer: Serializer = yamlSerializer): string {
  return serializer.dump(sensors);
}

/** Flat mapping of a parameter, one entry per record field */
export function parameterToMapping(p: ParameterRecord): Record<string, unknown> {
  return {
    index: p.index,
    order: p.order,
    name: p.name,
    factory_name: p.factoryName,
    min: p.min,
    max: p.max,
    default: p.default,
    text: {
      nl: { ...p.text.nl },
      en: { ...p.text.en },
      de: { ...p.text.de },
    },
    subtable: p.subtable,
    password_level: p.passwordLevel,
  };
}

export function renderParameters(parameters: readonly ParameterRecord[], serializer: Serializer = yamlSerializer): string {
  return serializer.dump(parameters.map(parameterToMapping));
}
