/**
 * Sensor discovery descriptors — one per datalabel.
 *
 * Pure: (datalabel, MQTT identity, device-class reference) → descriptor.
 * No state is shared between calls.
 */
import type { DatalabelRecord, Language, SensorDescriptor } from "../types/catalog.js";
import { MQTT_CONFIG, type MqttConfig } from "../utils/config.js";
import { AmbiguousDeviceClassError } from "../utils/errors.js";
import { type DeviceClassReference, loadDefaultReference } from "./device-class-reference.js";

export interface NormalizedUnit {
  /** Spelling used for matching (ASCII where the source mixes spellings) */
  canonical: string | null;
  /** Spelling shown to the hub; null when the sensor has no unit */
  display: string | null;
}

/** Source spellings that need fixing; anything else passes through */
const UNIT_SYNONYMS = new Map<string, NormalizedUnit>([
  ["M3/h", { canonical: "m3/h", display: "m³/h" }],
  ["m3/h", { canonical: "m3/h", display: "m³/h" }],
  ["m³/h", { canonical: "m3/h", display: "m³/h" }],
  ["uur", { canonical: "hour", display: "h" }],
  ["hour", { canonical: "hour", display: "h" }],
  ["-", { canonical: null, display: null }],
]);

export function normalizeUnit(raw: string | null | undefined): NormalizedUnit {
  if (raw === null || raw === undefined || raw === "") return { canonical: null, display: null };
  const known = UNIT_SYNONYMS.get(raw);
  if (known) return { ...known };
  return { canonical: raw, display: raw };
}

/**
 * The device class whose unit set contains the unit (display or canonical
 * spelling). Zero matches → null; more than one is an error.
 */
export function inferDeviceClass(unit: NormalizedUnit, reference: DeviceClassReference, sensor?: string): string | null {
  const spellings = [unit.display, unit.canonical].filter((u): u is string => u !== null);
  if (!spellings.length) return null;

  const candidates = reference.deviceClasses.filter(cls => {
    const units = reference.unitsFor(cls);
    return spellings.some(u => units.has(u));
  });

  if (candidates.length > 1) throw new AmbiguousDeviceClassError(spellings[0], candidates, sensor);
  return candidates[0] ?? null;
}

export function inferStateClass(deviceClass: string | null, reference: DeviceClassReference): string | null {
  if (!deviceClass) return null;
  return reference.stateClassesFor(deviceClass)[0] ?? null;
}

/**
 * Key of this readout in the device's status payload: `<label> (<unit>)`.
 *
 * The unit here is the RAW source unit, not the normalized one: the device
 * publishes its status JSON keyed with its own vocabulary ("M3/h", "uur").
 * Normalizing it would point the template at a key that never exists.
 *
 * A readout without a unit is keyed by the bare label, with no parenthesised
 * suffix at all. This departs from the `<label> (<unit>)` form on purpose:
 * older generators emitted `<label> (None)` there, which the firmware never
 * publishes.
 */
export function statusKey(label: string, rawUnit: string | null): string {
  return rawUnit ? `${label} (${rawUnit})` : label;
}

export function valueTemplate(label: string, rawUnit: string | null): string {
  return `{{ value_json[${JSON.stringify(statusKey(label, rawUnit))}] }}`;
}

export interface SensorDescriptorOptions {
  mqtt?: MqttConfig;
  reference?: DeviceClassReference;
  language?: Language;
}

export function buildSensorDescriptor(datalabel: DatalabelRecord, options: SensorDescriptorOptions = {}): SensorDescriptor {
  const mqtt = options.mqtt ?? MQTT_CONFIG;
  const reference = options.reference ?? loadDefaultReference();
  const text = datalabel.text[options.language ?? "en"];

  const name = text.label ?? datalabel.name ?? `Datalabel ${datalabel.index}`;
  const statusLabel = text.tooltip ?? name;
  const rawUnit = text.unit;

  const unit = normalizeUnit(rawUnit);
  const deviceClass = inferDeviceClass(unit, reference, name);
  const stateClass = inferStateClass(deviceClass, reference);

  // Optional keys are omitted, not emitted as null; key order is the payload's
  return {
    name,
    unique_id: `${mqtt.deviceId}${mqtt.uniqueIdSeparator}${name}`,
    state_topic: mqtt.statusTopic,
    value_template: valueTemplate(statusLabel, rawUnit),
    ...(unit.display ? { unit_of_measurement: unit.display } : {}),
    ...(deviceClass ? { device_class: deviceClass } : {}),
    ...(stateClass ? { state_class: stateClass } : {}),
    availability: [{ topic: mqtt.availabilityTopic }],
    payload_available: mqtt.payloadAvailable,
    payload_not_available: mqtt.payloadNotAvailable,
  };
}

export function buildSensorDescriptors(
  datalabels: readonly DatalabelRecord[],
  options: SensorDescriptorOptions = {},
): SensorDescriptor[] {
  return datalabels.map(d => buildSensorDescriptor(d, options));
}
