/**
 * Home-automation hub reference tables: which units each sensor device
 * class accepts, and which state classes it recognizes (in preference
 * order). Only a subset of the hub's device classes is considered.
 */
import { readFileSync } from "node:fs";
import { z } from "zod";

export interface DeviceClassReference {
  /** Device classes considered, in lookup order */
  readonly deviceClasses: readonly string[];
  /** Units registered for a device class */
  unitsFor(deviceClass: string): ReadonlySet<string>;
  /** Recognized state classes for a device class, first is preferred */
  stateClassesFor(deviceClass: string): readonly string[];
}

const ReferenceFile = z.object({
  deviceClasses: z.array(z.string().min(1)),
  units: z.record(z.array(z.string())),
  stateClasses: z.record(z.array(z.string())),
});

export type ReferenceTables = z.infer<typeof ReferenceFile>;

export class StaticDeviceClassReference implements DeviceClassReference {
  readonly deviceClasses: readonly string[];
  private readonly units: Map<string, ReadonlySet<string>>;
  private readonly stateClasses: Map<string, readonly string[]>;

  constructor(tables: ReferenceTables) {
    this.deviceClasses = [...tables.deviceClasses];
    this.units = new Map(Object.entries(tables.units).map(([cls, units]) => [cls, new Set(units)]));
    this.stateClasses = new Map(Object.entries(tables.stateClasses));
  }

  unitsFor(deviceClass: string): ReadonlySet<string> {
    return this.units.get(deviceClass) ?? new Set();
  }

  stateClassesFor(deviceClass: string): readonly string[] {
    return this.stateClasses.get(deviceClass) ?? [];
  }
}

const REFERENCE_FILE = new URL("../data/ha-device-classes.json", import.meta.url);

let defaultReference: DeviceClassReference | null = null;

/** Reference tables shipped with the package, read once */
export function loadDefaultReference(): DeviceClassReference {
  if (!defaultReference) {
    const raw: unknown = JSON.parse(readFileSync(REFERENCE_FILE, "utf8"));
    defaultReference = new StaticDeviceClassReference(ReferenceFile.parse(raw));
  }
  return defaultReference;
}
