import { describe, expect, it } from "@jest/globals";
import { DEFAULT_CONFIG, loadPipelineConfig } from "@/lib/config";
import { IntegrityError } from "@/lib/errors";
import { pivotObservations, unpivotRecords } from "@/lib/ingestion/reshape";
import { mergeYears } from "@/lib/timeline/merge";
import { reconstructYear, reindexToTimeline, shortGapFill, splitByYear } from "@/lib/timeline/reconstruct";
import type { CellValue, WideMatrix } from "@/lib/types/matrix";

const column = (values: CellValue[]): WideMatrix => ({
  timestamps: values.map((_, i) => `2021-01-01 ${String(i).padStart(2, "0")}:00:00`),
  columns: ["A"],
  values: values.map((v) => [v]),
});

const columnValues = (m: WideMatrix, c = 0) => m.values.map((row) => row[c]);

describe("shortGapFill", () => {
  it("fills runs of up to two hours and leaves longer runs", () => {
    const { matrix, filled } = shortGapFill(column([1, null, null, 4, null, null, null, 8]), 2);
    expect(columnValues(matrix)).toEqual([1, 1, 1, 4, null, null, null, 8]);
    expect(filled).toEqual({ A: 2 });
  });

  it("never fills before the first observation", () => {
    const { matrix } = shortGapFill(column([null, 2, null]), 2);
    expect(columnValues(matrix)).toEqual([null, 2, 2]);
  });

  it("is disabled by a zero bound", () => {
    const { matrix, filled } = shortGapFill(column([1, null, 3]), 0);
    expect(columnValues(matrix)).toEqual([1, null, 3]);
    expect(filled).toEqual({ A: 0 });
  });

  it("fills columns independently", () => {
    const source: WideMatrix = {
      timestamps: ["t0", "t1", "t2", "t3", "t4"],
      columns: ["A", "B"],
      values: [
        [1, 5],
        [null, null],
        [null, null],
        [null, 6],
        [2, null],
      ],
    };
    const { matrix } = shortGapFill(source, 2);
    expect(columnValues(matrix, 0)).toEqual([1, null, null, null, 2]);
    expect(columnValues(matrix, 1)).toEqual([5, 5, 5, 6, 6]);
  });

  it("does not mutate its input", () => {
    const source = column([1, null, 3]);
    shortGapFill(source, 2);
    expect(columnValues(source)).toEqual([1, null, 3]);
  });
});

describe("reconstructYear", () => {
  it("rebuilds a full year and fills a one-hour gap", () => {
    const observations = unpivotRecords(
      [
        {
          date: { year: 2021, month: 1, day: 1 },
          provider: "C1",
          market: "M2",
          hours: Array.from({ length: 24 }, (_, h) => (h === 0 ? 10 : h === 2 ? 12 : null)),
          sourceRow: 2,
        },
      ],
      " "
    );
    const { matrix } = pivotObservations(observations, "sum");
    const result = reconstructYear(matrix, 2021, DEFAULT_CONFIG);

    expect(result.matrix.timestamps).toHaveLength(8760);
    expect(result.matrix.columns).toEqual(["C1 M2"]);
    expect(columnValues(result.matrix).slice(0, 4)).toEqual([10, 10, 12, null]);
    expect(columnValues(result.matrix).slice(3).every((v) => v === null)).toBe(true);
    expect(result.filled).toEqual({ "C1 M2": 1 });
    expect(result.observedRows).toBe(2);
  });

  it("produces 8784 rows in a leap year", () => {
    const matrix: WideMatrix = { timestamps: ["2020-02-29 05:00:00"], columns: ["A"], values: [[1]] };
    expect(reconstructYear(matrix, 2020, DEFAULT_CONFIG).matrix.timestamps).toHaveLength(8784);
  });

  it("uses the configured bound", () => {
    const matrix = column([1, null, null, null, 5]);
    const config = loadPipelineConfig({}, { gapFillMaxHours: 3 });
    expect(columnValues(reconstructYear(matrix, 2021, config).matrix).slice(0, 5)).toEqual([1, 1, 1, 1, 5]);
    expect(columnValues(reconstructYear(matrix, 2021, DEFAULT_CONFIG).matrix).slice(0, 5)).toEqual([
      1,
      null,
      null,
      null,
      5,
    ]);
  });

  it("refuses rows outside the target year", () => {
    const matrix: WideMatrix = { timestamps: ["2022-01-01 00:00:00"], columns: ["A"], values: [[1]] };
    expect(() => reconstructYear(matrix, 2021, DEFAULT_CONFIG)).toThrow(IntegrityError);
  });
});

describe("reindexToTimeline", () => {
  it("inserts fully missing rows", () => {
    const source: WideMatrix = { timestamps: ["h1"], columns: ["A", "B"], values: [[1, 2]] };
    expect(reindexToTimeline(source, ["h0", "h1", "h2"]).values).toEqual([
      [null, null],
      [1, 2],
      [null, null],
    ]);
  });
});

describe("splitByYear", () => {
  it("keeps only the columns observed in each year", () => {
    const sparse: WideMatrix = {
      timestamps: ["2020-12-31 23:00:00", "2021-01-01 00:00:00"],
      columns: ["A", "B"],
      values: [
        [1, null],
        [2, 3],
      ],
    };
    const parts = splitByYear(sparse);
    expect([...parts.keys()]).toEqual([2020, 2021]);
    expect(parts.get(2020)).toEqual({ timestamps: ["2020-12-31 23:00:00"], columns: ["A"], values: [[1]] });
    expect(parts.get(2021)?.columns).toEqual(["A", "B"]);
  });
});

describe("mergeYears", () => {
  const y2020 = reconstructYear(
    { timestamps: ["2020-12-31 22:00:00"], columns: ["A"], values: [[5]] },
    2020,
    DEFAULT_CONFIG
  ).matrix;
  const y2021 = reconstructYear(
    { timestamps: ["2021-01-01 02:00:00"], columns: ["A", "B"], values: [[7, 1]] },
    2021,
    DEFAULT_CONFIG
  ).matrix;

  it("concatenates years in order with the union of columns", () => {
    const merged = mergeYears([y2021, y2020]);
    expect(merged.timestamps).toHaveLength(8784 + 8760);
    expect(merged.columns).toEqual(["A", "B"]);
    expect(merged.timestamps[8784]).toBe("2021-01-01 00:00:00");
    expect(merged.values.slice(0, 8784).every((row) => row[1] === null)).toBe(true);
  });

  it("never carries a value across the year boundary", () => {
    const merged = mergeYears([y2020, y2021]);
    const a = columnValues(merged, 0);
    expect(a.slice(8782, 8787)).toEqual([5, 5, null, null, 7]);
  });

  it("rejects overlapping years", () => {
    expect(() => mergeYears([y2020, y2020])).toThrow(IntegrityError);
  });
});
