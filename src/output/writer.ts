import ExcelJS from 'exceljs';
import { promises as fs } from 'fs';
import * as path from 'path';
import type { JsonValue, OutputFormat, OutputTarget, ScrapedRecord } from '../types';
import logger from '../utils/logger';
import { fileTimestamp } from '../utils/time';

type CellValue = string | number | boolean | null;

const FORMATS: { format: OutputFormat; label: string }[] = [
  { format: 'xlsx', label: 'Excel' },
  { format: 'csv', label: 'CSV' },
  { format: 'json', label: 'JSON' },
];

const UTF8_BOM = '\ufeff';


/** Union of record keys in first-seen order. */
export function collectColumns(records: readonly ScrapedRecord[]): string[] {
  const seen = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) seen.add(key);
  }
  return Array.from(seen);
}

function toCell(value: JsonValue | undefined): CellValue {
  if (value === undefined) return null;
  if (value === null || typeof value !== 'object') return value;
  return JSON.stringify(value);
}

export function csvEscape(v: CellValue) {
  if (v == null) return '';
  const s = String(v);
  if (/[",\r\n]/.test(s)) return '"' + s.replace(/"/g, '""') + '"';
  return s;
}

export function toCsv(records: readonly ScrapedRecord[], columns: string[]): string {
  const lines = [columns.map(csvEscape).join(',')].concat(
    records.map(row => columns.map(k => csvEscape(toCell(row[k]))).join(','))
  );
  return UTF8_BOM + lines.join('\n') + '\n';
}


export class OutputWriter {
  private readonly log = logger.child({ name: 'output' });
  private readonly stem: string;

  constructor(private readonly target: OutputTarget) {
    this.stem = `${target.base}_${fileTimestamp(target.timestamp)}`;
  }

  path(format: OutputFormat) {
    return path.join(this.target.directory, `${this.stem}.${format}`);
  }

  /** Writes every format it can; one failing format does not stop the others. */
  async saveAll(records: readonly ScrapedRecord[]): Promise<string[]> {
    if (!records.length) {
      this.log.info('No data to save');
      return [];
    }

    const columns = collectColumns(records);
    const written: string[] = [];

    for (const { format, label } of FORMATS) {
      const file = this.path(format);
      try {
        await fs.mkdir(this.target.directory, { recursive: true });
        await this.write(format, file, records, columns);
        written.push(file);
        this.log.info(`Saved ${label}`, { file });
      } catch (error) {
        this.log.error(`${label} save failed`, { file, error });
      }
    }
    return written;
  }

  private async write(format: OutputFormat, file: string, records: readonly ScrapedRecord[], columns: string[]) {
    if (format === 'xlsx') {
      const workbook = new ExcelJS.Workbook();
      const sheet = workbook.addWorksheet('Sheet1');
      sheet.columns = columns.map(key => ({ header: key, key }));
      for (const record of records) {
        sheet.addRow(columns.map(key => toCell(record[key])));
      }
      await workbook.xlsx.writeFile(file);
      return;
    }

    if (format === 'csv') {
      await fs.writeFile(file, toCsv(records, columns), 'utf8');
      return;
    }

    await fs.writeFile(file, JSON.stringify(records, null, 2), 'utf8');
  }
}
