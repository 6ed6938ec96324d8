import * as fs from 'fs/promises';
import * as fss from 'fs';
import * as path from 'path';
import archiver from 'archiver';
import { log } from './logger';
import { resolveWantTo } from './query';
import type { ResultTable, SearchQuery } from './types';
import { formatYmd } from './utils';

const csvCell = (value: string): string =>
  /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;

export function toCsv(table: Pick<ResultTable, 'columns' | 'rows'>): string {
  const lines = [table.columns.map(csvCell).join(',')];
  for (const row of table.rows) {
    lines.push(table.columns.map((c) => csvCell(row[c] ?? '')).join(','));
  }
  return lines.join('\n') + '\n';
}

export function buildOutputFileName(query: SearchQuery, linkCount: number, date: Date = new Date()): string {
  const status = query.findPast ? 'unavailable' : 'available';
  return `houseprice_${formatYmd(date)}_${query.area}_${resolveWantTo(query.wantTo)}_${status}_${linkCount}.csv`;
}

export async function saveCsv(table: ResultTable, outDir: string, fileName: string): Promise<string> {
  await fs.mkdir(outDir, { recursive: true });
  const file = path.join(outDir, fileName);
  await fs.writeFile(file, toCsv(table), 'utf8');
  log(`*** File saved: ${file}. ***`);
  return file;
}

export async function zipFile(filePath: string, outDir: string, zipName: string): Promise<string> {
  const zipPath = path.join(outDir, zipName);
  const output = fss.createWriteStream(zipPath);
  const closed = new Promise<void>((resolve, reject) => {
    output.on('close', () => resolve());
    output.on('error', reject);
  });
  const archiveObj = archiver('zip', { zlib: { level: 9 } });
  archiveObj.pipe(output);
  archiveObj.file(filePath, { name: path.basename(filePath) });
  await archiveObj.finalize();
  await closed;
  return zipPath;
}
