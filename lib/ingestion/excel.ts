import * as fs from 'fs';
import * as path from 'path';
import * as XLSX from 'xlsx';
import { parseCalendarDate } from '../calendar/service';
import { parseCsvGrid } from '../csv';
import { RecordError, SchemaError } from '../errors';
import type { AuditEntry, CellValue, RawRecord } from '../types/matrix';

export type CellGrid = unknown[][];

export interface HeaderLayout {
  rowIndex: number;                               // 0-based index in the grid
  dateCol: number;
  providerCol: number;
  marketCol: number;
  hourCols: Array<{ hour: number; col: number }>;
}

export const HOURS_PER_DAY = 24;

const DATE_ALIASES = ['fecha', 'date'];
const PROVIDER_ALIASES = ['codigo_comercializador', 'provider', 'provider_id'];
const MARKET_ALIASES = ['mercado', 'market', 'market_segment'];

// Normalize header cells: strip accents, lowercase, collapse separators
const norm = (s: unknown) =>
  String(s ?? '')
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .trim()
    .toLowerCase()
    .replace(/[.\s_-]+/g, '_');

function hourOf(header: string): number | null {
  const m = header.match(/^(?:hour_?|h)?(\d{1,2})$/);
  if (!m) return null;
  const hour = Number(m[1]);
  return hour < HOURS_PER_DAY ? hour : null;
}

/**
 * Loads the first sheet of an .xlsx/.xls workbook, or a .csv file, as a raw
 * cell grid. Banner rows above the header are kept; `findHeaderRow` skips them.
 */
export async function readExtractGrid(filePath: string): Promise<CellGrid> {
  const name = path.basename(filePath);
  const ext = path.extname(filePath).toLowerCase();
  const buffer = await fs.promises.readFile(filePath);

  if (ext === '.csv') {
    return parseCsvGrid(buffer.toString('utf-8'));
  }
  if (ext !== '.xlsx' && ext !== '.xls') {
    throw new SchemaError(`Unsupported file type "${ext}"`, name);
  }

  const workbook = XLSX.read(buffer, { type: 'buffer' });
  const firstSheetName = workbook.SheetNames[0];
  const sheet = firstSheetName ? workbook.Sheets[firstSheetName] : undefined;
  if (!sheet) {
    throw new SchemaError('Workbook has no sheets', name);
  }
  return XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, defval: null, raw: true, blankrows: true });
}

/**
 * Locates the header row within the first `lookahead` rows. A header must name
 * the date and provider columns; the market column and at least one hour
 * column are then required.
 */
export function findHeaderRow(grid: CellGrid, lookahead: number, file = ''): HeaderLayout {
  const limit = Math.min(lookahead, grid.length);

  for (let i = 0; i < limit; i++) {
    const cells = (grid[i] ?? []).map(norm);
    const dateCol = cells.findIndex((c) => DATE_ALIASES.includes(c));
    const providerCol = cells.findIndex((c) => PROVIDER_ALIASES.includes(c));
    if (dateCol === -1 || providerCol === -1) continue;

    const marketCol = cells.findIndex((c) => MARKET_ALIASES.includes(c));
    if (marketCol === -1) {
      throw new SchemaError(`Header at row ${i + 1} has no market column`, file);
    }

    const hourCols: HeaderLayout['hourCols'] = [];
    cells.forEach((c, col) => {
      const hour = hourOf(c);
      if (hour !== null && !hourCols.some((h) => h.hour === hour)) {
        hourCols.push({ hour, col });
      }
    });
    if (hourCols.length === 0) {
      throw new SchemaError(`Header at row ${i + 1} has no hour columns 0..23`, file);
    }

    return { rowIndex: i, dateCol, providerCol, marketCol, hourCols: hourCols.sort((a, b) => a.hour - b.hour) };
  }

  throw new SchemaError(`Header row not found in the first ${lookahead} rows (need date and provider columns)`, file);
}

/** Blank cells are absent readings; anything else must be numeric. */
export function parseHourValue(cell: unknown, row: number, hour: number): CellValue {
  if (cell === null || cell === undefined) return null;
  if (typeof cell === 'number') {
    if (Number.isFinite(cell)) return cell;
    throw new RecordError(`hour ${hour} is not a finite number`, row);
  }
  const text = String(cell).trim();
  if (text === '') return null;
  const n = Number(text.replace(',', '.'));
  if (!Number.isFinite(n)) {
    throw new RecordError(`hour ${hour} has non-numeric value "${text}"`, row);
  }
  return n;
}

const cellText = (cell: unknown) => String(cell ?? '').trim().toUpperCase();

export function parseRawRecord(cells: unknown[], layout: HeaderLayout, row: number): RawRecord {
  const date = parseCalendarDate(cells[layout.dateCol]);
  if (!date) {
    throw new RecordError(`unparseable date "${String(cells[layout.dateCol] ?? '')}"`, row);
  }

  const provider = cellText(cells[layout.providerCol]);
  const market = cellText(cells[layout.marketCol]);
  if (!provider || !market) {
    throw new RecordError('missing provider or market', row);
  }

  const hours: CellValue[] = new Array<CellValue>(HOURS_PER_DAY).fill(null);
  for (const { hour, col } of layout.hourCols) {
    hours[hour] = parseHourValue(cells[col], row, hour);
  }

  return { date, provider, market, hours, sourceRow: row };
}

const isBlank = (cell: unknown) => cell === null || cell === undefined || String(cell).trim() === '';

/**
 * Reads every data row below the header. Rows that fail with RecordError are
 * skipped and returned as audit entries; fully blank rows are ignored.
 */
export function mapRawRecords(
  grid: CellGrid,
  layout: HeaderLayout,
  file = ''
): { records: RawRecord[]; skipped: AuditEntry[] } {
  const records: RawRecord[] = [];
  const skipped: AuditEntry[] = [];

  for (let i = layout.rowIndex + 1; i < grid.length; i++) {
    const cells = grid[i] ?? [];
    const row = i + 1;
    if ([layout.dateCol, layout.providerCol, layout.marketCol].every((c) => isBlank(cells[c]))) {
      continue;
    }

    try {
      records.push(parseRawRecord(cells, layout, row));
    } catch (err) {
      if (!(err instanceof RecordError)) throw err;
      skipped.push({
        file,
        row,
        kind: 'record_skipped',
        reason: err.message,
      });
    }
  }

  return { records, skipped };
}
