import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import * as XLSX from "xlsx";

export const HEADER = ["Fecha", "Codigo Comercializador", "Mercado", ...Array.from({ length: 24 }, (_, h) => h)];

/** 24 hour cells with the given readings, everything else blank. */
export function hourCells(values: Record<number, number | string>): Array<number | string | null> {
  return Array.from({ length: 24 }, (_, h) => values[h] ?? null);
}

export async function writeWorkbook(filePath: string, rows: unknown[][]): Promise<void> {
  const sheet = XLSX.utils.aoa_to_sheet(rows);
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, sheet, "Hoja1");
  const buffer: Buffer = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  await fs.promises.writeFile(filePath, buffer);
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "hourly-matrix-"));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}
