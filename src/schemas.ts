/**
 * Zod schemas for parameter file rows & their mapping onto catalog records
 *
 * Each table's columns are listed explicitly: a column the schema does not
 * know, or one it expects but the row lacks, is a schema mismatch rather
 * than a silently dropped or undefined field.
 */
import { z, type ZodError } from "zod";
import type { DatalabelRecord, ParameterRecord } from "./types/catalog.js";
import { type CatalogErrorContext, SchemaMismatchError } from "./utils/errors.js";

// ── Column coercers ───────────────────────────────────────

/** Numeric strings become numbers; SQL NULL stays null */
const numeric = z.preprocess(
  v => (typeof v === "string" && v.trim() !== "" && !Number.isNaN(Number(v)) ? Number(v) : v),
  z.number().nullable(),
);

const text = z.string().nullable();

const index = z.preprocess(v => (typeof v === "string" ? Number(v) : v), z.number().int());

const flag = z
  .preprocess(v => (typeof v === "boolean" ? Number(v) : v), z.number().nullable())
  .transform(v => v !== null && v !== 0);

// ── Row schemas ───────────────────────────────────────────

export const ParameterRow = z.object({
  Index: index,
  Volgorde: numeric,
  Naam: text,
  Naam_fabriek: text,
  Min: numeric,
  Max: numeric,
  Default: numeric,
  Tekst_NL: text, Omschrijving_NL: text, Eenheid_NL: text,
  Tekst_GB: text, Omschrijving_GB: text, Eenheid_GB: text,
  Tekst_D: text, Omschrijving_D: text, Eenheid_D: text,
  Subtabel: text,
  Paswoordnivo: numeric,
}).strict();

export const DatalabelRow = z.object({
  Index: index,
  Naam: text,
  Tekst_NL: text, Tooltip_NL: text, Eenheid_NL: text,
  Tekst_GB: text, Tooltip_GB: text, Eenheid_GB: text,
  Tekst_D: text, Tooltip_D: text, Eenheid_D: text,
  SubTabel: text,
  Visible: flag,
}).strict();

export type ParameterRow = z.infer<typeof ParameterRow>;
export type DatalabelRow = z.infer<typeof DatalabelRow>;

// ── Mapping ───────────────────────────────────────────────

export function describeIssues(err: ZodError): string {
  const missing: string[] = [];
  const extra: string[] = [];
  const invalid: string[] = [];
  for (const issue of err.issues) {
    const column = issue.path.join(".");
    if (issue.code === "unrecognized_keys") extra.push(...issue.keys);
    else if (issue.code === "invalid_type" && issue.received === "undefined") missing.push(column);
    else invalid.push(`${column}: ${issue.message}`);
  }
  const parts: string[] = [];
  if (missing.length) parts.push(`missing column(s) ${missing.join(", ")}`);
  if (extra.length) parts.push(`unexpected column(s) ${extra.join(", ")}`);
  if (invalid.length) parts.push(`invalid value(s) ${invalid.join("; ")}`);
  return parts.join("; ");
}

function mismatch(err: ZodError, context: CatalogErrorContext): SchemaMismatchError {
  const where = [context.table, context.version !== undefined ? `version ${context.version}` : ""].filter(Boolean).join(", ");
  return new SchemaMismatchError(`Schema mismatch in ${where}: ${describeIssues(err)}`, context);
}

export function toParameterRecord(row: unknown, context: CatalogErrorContext = {}): ParameterRecord {
  const parsed = ParameterRow.safeParse(row);
  if (!parsed.success) throw mismatch(parsed.error, context);
  const r = parsed.data;
  return {
    index: r.Index,
    order: r.Volgorde,
    name: r.Naam,
    factoryName: r.Naam_fabriek,
    min: r.Min,
    max: r.Max,
    default: r.Default,
    text: {
      nl: { label: r.Tekst_NL, description: r.Omschrijving_NL, unit: r.Eenheid_NL },
      en: { label: r.Tekst_GB, description: r.Omschrijving_GB, unit: r.Eenheid_GB },
      de: { label: r.Tekst_D, description: r.Omschrijving_D, unit: r.Eenheid_D },
    },
    subtable: r.Subtabel,
    passwordLevel: r.Paswoordnivo,
  };
}

export function toDatalabelRecord(row: unknown, context: CatalogErrorContext = {}): DatalabelRecord {
  const parsed = DatalabelRow.safeParse(row);
  if (!parsed.success) throw mismatch(parsed.error, context);
  const r = parsed.data;
  return {
    index: r.Index,
    name: r.Naam,
    text: {
      nl: { label: r.Tekst_NL, tooltip: r.Tooltip_NL, unit: r.Eenheid_NL },
      en: { label: r.Tekst_GB, tooltip: r.Tooltip_GB, unit: r.Eenheid_GB },
      de: { label: r.Tekst_D, tooltip: r.Tooltip_D, unit: r.Eenheid_D },
    },
    subtable: r.SubTabel,
    visible: r.Visible,
  };
}

/** One-line summary used in debug output */
export function describeDatalabel(d: DatalabelRecord): string {
  return `${d.index} | ${d.name} | ${d.text.en.label} | ${d.text.en.tooltip} | ${d.text.en.unit}`;
}
