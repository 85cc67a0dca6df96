/**
 * Tests for row → record mapping and schema mismatch reporting
 */
import { describe, expect, it } from "vitest";
import { describeDatalabel, toDatalabelRecord, toParameterRecord } from "../src/schemas.js";
import { SchemaMismatchError } from "../src/utils/errors.js";
import { datalabelRow, parameterRow } from "./helpers/fixtures.js";

describe("toParameterRecord", () => {
  it("maps every column onto the record", () => {
    const record = toParameterRecord(parameterRow(7, "Bypass", { Min: -5, Max: 25.5, Default: 0, Subtabel: "tbl" }));
    expect(record).toEqual({
      index: 7,
      order: 70,
      name: "param_7",
      factoryName: "factory_7",
      min: -5,
      max: 25.5,
      default: 0,
      text: {
        nl: { label: "Bypass NL", description: null, unit: "%" },
        en: { label: "Bypass", description: "Bypass description", unit: "%" },
        de: { label: "Bypass D", description: null, unit: "%" },
      },
      subtable: "tbl",
      passwordLevel: 1,
    });
  });

  it("coerces numeric strings", () => {
    const record = toParameterRecord({ ...parameterRow(1, "Fan"), Index: "3", Min: "1.5" });
    expect(record.index).toBe(3);
    expect(record.min).toBe(1.5);
  });

  it("reports a missing column", () => {
    const { Paswoordnivo: _, ...row } = parameterRow(1, "Fan");
    expect(() => toParameterRecord(row, { table: "Parameterlijst_V1", version: 1 })).toThrow(
      "Schema mismatch in Parameterlijst_V1, version 1: missing column(s) Paswoordnivo",
    );
  });

  it("reports an unexpected column", () => {
    const row = { ...parameterRow(1, "Fan"), Extra: "x" };
    expect(() => toParameterRecord(row, { table: "Parameterlijst_V2" })).toThrow(
      "Schema mismatch in Parameterlijst_V2: unexpected column(s) Extra",
    );
  });

  it("raises SchemaMismatchError with its context", () => {
    const parse = () => toParameterRecord({ ...parameterRow(1, "Fan"), Index: "abc" }, { table: "Parameterlijst_V3", version: 3 });
    expect(parse).toThrow(SchemaMismatchError);
    expect(parse).toThrow(expect.objectContaining({ kind: "schema_mismatch", context: { table: "Parameterlijst_V3", version: 3 } }));
  });
});

describe("toDatalabelRecord", () => {
  it("maps columns and the visibility flag", () => {
    const record = toDatalabelRecord(datalabelRow(4, "Airflow", "M3/h", { Visible: 0, SubTabel: "sub" }));
    expect(record).toEqual({
      index: 4,
      name: "label_4",
      text: {
        nl: { label: "Airflow NL", tooltip: "Airflow NL", unit: "M3/h" },
        en: { label: "Airflow", tooltip: "Airflow", unit: "M3/h" },
        de: { label: "Airflow D", tooltip: "Airflow D", unit: "M3/h" },
      },
      subtable: "sub",
      visible: false,
    });
  });

  it("treats any non-zero Visible as visible", () => {
    expect(toDatalabelRecord(datalabelRow(1, "Temp", "°C", { Visible: 1 })).visible).toBe(true);
    expect(toDatalabelRecord(datalabelRow(1, "Temp", "°C", { Visible: -1 })).visible).toBe(true);
    expect(toDatalabelRecord(datalabelRow(1, "Temp", "°C", { Visible: null })).visible).toBe(false);
  });

  it("reports parameter columns in a datalabel table", () => {
    expect(() => toDatalabelRecord(parameterRow(1, "Fan"), { table: "Datalabel_V1" })).toThrow(SchemaMismatchError);
  });

  it("summarizes a datalabel on one line", () => {
    expect(describeDatalabel(toDatalabelRecord(datalabelRow(2, "Temp", "°C")))).toBe("2 | label_2 | Temp | Temp | °C");
  });
});
