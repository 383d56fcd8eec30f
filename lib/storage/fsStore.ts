import * as fs from 'fs';
import * as path from 'path';
import type { AuditEntry } from '../types/matrix';

/** Write to a temp file then rename, so readers never see a partial artifact. */
export async function atomicWrite(filePath: string, content: string): Promise<string> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.tmp`;
  await fs.promises.writeFile(tempPath, content, 'utf-8');
  await fs.promises.rename(tempPath, filePath);
  return filePath;
}

// fs errors are not always `instanceof Error` across realms (e.g. under Jest)
export const isMissingFile = (error: unknown) =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';

function isAuditEntry(value: unknown): value is AuditEntry {
  if (typeof value !== 'object' || value === null) return false;
  return 'file' in value && 'row' in value && 'kind' in value && 'reason' in value;
}

/**
 * Load audit entries. A missing file means no entries yet; a corrupt one is
 * an error rather than being silently replaced.
 */
export async function loadAudit(filePath: string): Promise<AuditEntry[]> {
  let content: string;
  try {
    content = await fs.promises.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) return [];
    throw error;
  }
  const parsed: unknown = JSON.parse(content);
  if (!Array.isArray(parsed) || !parsed.every(isAuditEntry)) {
    throw new Error(`Audit file ${filePath} is not a list of audit entries`);
  }
  return parsed;
}

/** Replaces the audit file with this run's entries; a rerun yields the same bytes. */
export async function writeAudit(filePath: string, entries: AuditEntry[]): Promise<string> {
  return atomicWrite(filePath, `${JSON.stringify(entries, null, 2)}\n`);
}
