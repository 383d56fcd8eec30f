import path from "path";

export const DATA_ROOT = process.env.DATA_ROOT || path.join(process.cwd(), "data");

// Extracts are dropped here; every stage writes under OUT_DIR
export const RAW_DIR = path.join(DATA_ROOT, "raw");
export const OUT_DIR = path.join(DATA_ROOT, "out");

export const MATRIX_PREFIX = "sold_power_wide";

export function yearMatrixFile(outDir: string, year: number) {
  return path.join(outDir, `${MATRIX_PREFIX}_${year}.csv`);
}

export function combinedMatrixFile(outDir: string, firstYear: number, lastYear: number) {
  return path.join(outDir, `${MATRIX_PREFIX}_${firstYear}_${lastYear}.csv`);
}

export function normalizedMatrixFile(outDir: string, combinedPath: string) {
  const base = path.basename(combinedPath, path.extname(combinedPath));
  return path.join(outDir, `${base}_normalized.csv`);
}

export function paramsFile(outDir: string) {
  return path.join(outDir, `${MATRIX_PREFIX}_normalization_params.csv`);
}

export function auditFile(outDir: string) {
  return path.join(outDir, "audit", "transform-audit.json");
}
