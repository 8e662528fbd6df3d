import { writeFile } from 'node:fs/promises';
import { formatColorSwatch } from './color.js';
import type { ManifestRow } from './types.js';

export const MANIFEST_HEADERS = ['TeamNumber', 'TeamName', 'TeamShortName', 'ImageFileName', 'TeamColor'] as const;

const LINE_END = '\r\n';

/**
 * Escape a value for CSV (wrap in quotes if contains comma, quote, or line break)
 */
function escapeForCsv(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function rowValues(row: ManifestRow): string[] {
  return [row.teamNumber, row.teamName, row.teamShortName, row.imageFileName, row.teamColor];
}

export function manifestToCsv(rows: ManifestRow[]): string {
  const csvLines: string[] = [MANIFEST_HEADERS.join(',')];
  for (const row of rows) {
    csvLines.push(rowValues(row).map(escapeForCsv).join(','));
  }
  return csvLines.map((line) => line + LINE_END).join('');
}

export function formatManifestRow(row: ManifestRow, options: { color?: boolean } = {}): string {
  const values = rowValues(row);
  if (options.color) {
    values[4] = formatColorSwatch(row.teamColor);
  }
  return values.join(', ');
}

export async function saveManifest(path: string, rows: ManifestRow[]): Promise<void> {
  await writeFile(path, manifestToCsv(rows), 'utf8');
}
