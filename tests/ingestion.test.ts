import * as fs from "fs";
import * as path from "path";
import { afterAll, beforeAll, describe, expect, it } from "@jest/globals";
import { DEFAULT_CONFIG, loadPipelineConfig } from "@/lib/config";
import { KeyError, RecordError, SchemaError } from "@/lib/errors";
import { findHeaderRow, mapRawRecords, parseHourValue, readExtractGrid } from "@/lib/ingestion/excel";
import { discoverExtracts, ingestExtract, ingestExtracts } from "@/lib/ingestion/pipeline";
import { silentLogger } from "@/lib/logging";
import { HEADER, hourCells, makeTempDir, removeDir, writeWorkbook } from "./helpers";

const grid: unknown[][] = [
  ["Demanda Comercial por Comercializador"],
  ["Periodo: 2021"],
  [],
  HEADER,
  ["2021-01-01", " c1 ", "m2", ...hourCells({ 0: 10, 2: 12 })],
  ["bad-date", "C1", "M2", ...hourCells({ 0: 1 })],
  ["2021-01-02", "C1", "M2", ...hourCells({ 0: "abc" })],
  [null, null, null],
];

describe("findHeaderRow", () => {
  it("skips banner rows", () => {
    const layout = findHeaderRow(grid, 10);
    expect(layout.rowIndex).toBe(3);
    expect(layout.dateCol).toBe(0);
    expect(layout.providerCol).toBe(1);
    expect(layout.marketCol).toBe(2);
    expect(layout.hourCols).toHaveLength(24);
    expect(layout.hourCols[0]).toEqual({ hour: 0, col: 3 });
    expect(layout.hourCols[23]).toEqual({ hour: 23, col: 26 });
  });

  it("fails when the header is beyond the lookahead", () => {
    expect(() => findHeaderRow(grid, 3)).toThrow(SchemaError);
  });

  it("requires a market column", () => {
    const noMarket = [["Fecha", "Codigo Comercializador", "0", "1"]];
    expect(() => findHeaderRow(noMarket, 10, "x.xlsx")).toThrow(
      "x.xlsx: Header at row 1 has no market column"
    );
  });

  it("accepts accented and english headers", () => {
    const layout = findHeaderRow([["date", "Código Comercializador", "market", "hour_0", "hour_5"]], 10);
    expect(layout.providerCol).toBe(1);
    expect(layout.hourCols).toEqual([
      { hour: 0, col: 3 },
      { hour: 5, col: 4 },
    ]);
  });
});

describe("mapRawRecords", () => {
  const layout = findHeaderRow(grid, 10);
  const { records, skipped } = mapRawRecords(grid, layout, "demo.xlsx");

  it("normalizes identifiers and keeps absent hours as null", () => {
    expect(records).toHaveLength(1);
    const [record] = records;
    expect(record.provider).toBe("C1");
    expect(record.market).toBe("M2");
    expect(record.date).toEqual({ year: 2021, month: 1, day: 1 });
    expect(record.hours).toHaveLength(24);
    expect(record.hours.slice(0, 4)).toEqual([10, null, 12, null]);
    expect(record.sourceRow).toBe(5);
  });

  it("skips bad rows with an audit entry", () => {
    expect(skipped.map((s) => [s.row, s.kind, s.reason])).toEqual([
      [6, "record_skipped", 'row 6: unparseable date "bad-date"'],
      [7, "record_skipped", 'row 7: hour 0 has non-numeric value "abc"'],
    ]);
    expect(skipped.every((s) => s.file === "demo.xlsx")).toBe(true);
  });
});

describe("parseHourValue", () => {
  it("reads numbers and numeric text", () => {
    expect(parseHourValue(4.5, 1, 0)).toBe(4.5);
    expect(parseHourValue("12,5", 1, 0)).toBe(12.5);
    expect(parseHourValue(" 7 ", 1, 0)).toBe(7);
  });

  it("treats blanks as absent, not zero", () => {
    expect(parseHourValue(null, 1, 0)).toBeNull();
    expect(parseHourValue("  ", 1, 0)).toBeNull();
  });

  it("rejects other text", () => {
    expect(() => parseHourValue("n/a", 3, 4)).toThrow(RecordError);
  });
});

describe("extract files", () => {
  let dir: string;

  beforeAll(async () => {
    dir = makeTempDir();
    await writeWorkbook(path.join(dir, "serial.xlsx"), [
      ["Reporte"],
      HEADER,
      [44197, "C1", "M2", ...hourCells({ 0: 10, 2: 12 })],
      [44197, "C1", "M2", ...hourCells({ 2: 3 })],
    ]);
    await writeWorkbook(path.join(dir, "clash.xlsx"), [HEADER, ["2021-01-01", "C|1", "M2", ...hourCells({ 0: 1 })]]);
    await writeWorkbook(path.join(dir, "banner-only.xlsx"), [["hello"], ["world"]]);
    await writeWorkbook(path.join(dir, "multi-word.xlsx"), [
      HEADER,
      ["2021-01-01", "CASC", "No Regulado", ...hourCells({ 1: 4 })],
    ]);
    await fs.promises.writeFile(
      path.join(dir, "semicolon.csv"),
      "Fecha;Codigo Comercializador;Mercado;0;1\n2021-01-01;C1;M2;5;6\n"
    );
    await fs.promises.writeFile(path.join(dir, "notes.txt"), "ignored");
  });

  afterAll(() => removeDir(dir));

  it("reads xlsx grids including banner rows", async () => {
    const cells = await readExtractGrid(path.join(dir, "serial.xlsx"));
    expect(cells[0][0]).toBe("Reporte");
    expect(cells[2][0]).toBe(44197);
  });

  it("ingests one extract into a sparse wide matrix, summing duplicates", async () => {
    const result = await ingestExtract(path.join(dir, "serial.xlsx"), DEFAULT_CONFIG, silentLogger);
    expect(result.matrix).toEqual({
      timestamps: ["2021-01-01 00:00:00", "2021-01-01 02:00:00"],
      columns: ["C1|M2"],
      values: [[10], [15]],
    });
    expect(result.conflicts).toEqual([
      { timestamp: "2021-01-01 02:00:00", key: "C1|M2", previous: 12, incoming: 3, resolved: 15 },
    ]);
    expect(result.observations).toHaveLength(2);
    expect(result.skipped.map((s) => s.kind)).toEqual(["conflict_resolved"]);
  });

  it("honours last-write-wins", async () => {
    const config = loadPipelineConfig({}, { conflictPolicy: "last-write-wins" });
    const result = await ingestExtract(path.join(dir, "serial.xlsx"), config, silentLogger);
    expect(result.matrix.values).toEqual([[10], [3]]);
  });

  it("reads semicolon CSV extracts", async () => {
    const result = await ingestExtract(path.join(dir, "semicolon.csv"), DEFAULT_CONFIG, silentLogger);
    expect(result.matrix.timestamps).toEqual(["2021-01-01 00:00:00", "2021-01-01 01:00:00"]);
    expect(result.matrix.values).toEqual([[5], [6]]);
  });

  it("keeps market names that contain spaces", async () => {
    const result = await ingestExtract(path.join(dir, "multi-word.xlsx"), DEFAULT_CONFIG, silentLogger);
    expect(result.matrix).toEqual({
      timestamps: ["2021-01-01 01:00:00"],
      columns: ["CASC|NO REGULADO"],
      values: [[4]],
    });
  });

  it("fails a file whose identifiers contain the key separator", async () => {
    await expect(ingestExtract(path.join(dir, "clash.xlsx"), DEFAULT_CONFIG, silentLogger)).rejects.toThrow(KeyError);
  });

  it("skips failing files and continues with the rest", async () => {
    const files = await discoverExtracts(dir);
    expect(files.map((f) => path.basename(f))).toEqual([
      "banner-only.xlsx",
      "clash.xlsx",
      "multi-word.xlsx",
      "semicolon.csv",
      "serial.xlsx",
    ]);

    const summary = await ingestExtracts(files, DEFAULT_CONFIG, silentLogger);
    expect(summary.extracts.map((e) => e.file)).toEqual(["multi-word.xlsx", "semicolon.csv", "serial.xlsx"]);
    expect(summary.skippedFiles.map((s) => s.file)).toEqual(["banner-only.xlsx", "clash.xlsx"]);
    expect(summary.observations).toHaveLength(5);
    expect(summary.audit.map((a) => a.kind)).toEqual(["file_skipped", "file_skipped", "conflict_resolved"]);
  });
});

describe("discoverExtracts", () => {
  let dir: string;

  beforeAll(async () => {
    dir = makeTempDir();
    await fs.promises.writeFile(path.join(dir, "Demanda_Comercial_Por_Comercializador_SEME2_2021.xlsx"), "");
    await fs.promises.writeFile(path.join(dir, "Demanda_Comercial_Por_Comercializador_SEME1_2021.xlsx"), "");
    await fs.promises.writeFile(path.join(dir, "other.xlsx"), "");
  });

  afterAll(() => removeDir(dir));

  it("prefers operator-named extracts in name order", async () => {
    const files = await discoverExtracts(dir);
    expect(files.map((f) => path.basename(f))).toEqual([
      "Demanda_Comercial_Por_Comercializador_SEME1_2021.xlsx",
      "Demanda_Comercial_Por_Comercializador_SEME2_2021.xlsx",
    ]);
  });
});
