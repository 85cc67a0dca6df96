/** Languages present in the parameter file, keyed by column suffix NL / GB / D */
export type Language = "nl" | "en" | "de";

export const LANGUAGES: readonly Language[] = ["nl", "en", "de"];

export function isLanguage(value: string): value is Language {
  return LANGUAGES.some(l => l === value);
}

export interface ParameterText {
  label: string | null;
  description: string | null;
  unit: string | null;
}

export interface DatalabelText {
  label: string | null;
  tooltip: string | null;
  unit: string | null;
}

/** A configurable setting of one firmware version */
export interface ParameterRecord {
  readonly index: number;
  readonly order: number | null;
  readonly name: string | null;
  readonly factoryName: string | null;
  readonly min: number | null;
  readonly max: number | null;
  readonly default: number | null;
  readonly text: Readonly<Record<Language, ParameterText>>;
  readonly subtable: string | null;
  readonly passwordLevel: number | null;
}

/** A telemetry readout of one firmware version */
export interface DatalabelRecord {
  readonly index: number;
  readonly name: string | null;
  readonly text: Readonly<Record<Language, DatalabelText>>;
  readonly subtable: string | null;
  readonly visible: boolean;
}

export interface VersionCatalog {
  version: number;
  parameterTable: string | null;
  datalabelTable: string | null;
  parameters: readonly ParameterRecord[];
  datalabels: readonly DatalabelRecord[];
}

/** MQTT discovery payload for one sensor, in emitted key order */
export interface SensorDescriptor {
  name: string;
  unique_id: string;
  state_topic: string;
  value_template: string;
  unit_of_measurement?: string;
  device_class?: string;
  state_class?: string;
  availability: Array<{ topic: string }>;
  payload_available: string;
  payload_not_available: string;
}
