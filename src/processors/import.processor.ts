import Papa from 'papaparse';
import ExcelJS from 'exceljs';
import { fail, succeed } from '../types/coding.types.js';
import type { JsonValue, Outcome } from '../types/coding.types.js';
import { ImportRecordListSchema, toObservation } from '../types/schemas.js';
import type { ImportFormat, Observation, ReliabilityFailure } from '../types/reliability.types.js';

export const REQUIRED_COLUMNS = ['content_id', 'coder_id'] as const;

export interface ImportedObservations {
  observations: Observation[];
  variables: string[];
  warnings: string[];
}

type RawRow = Record<string, string | undefined>;

// CSV text or JSON text; Excel workbooks arrive as bytes
export type ImportSource = string | ArrayBuffer;

const invalid = (message: string): { ok: false; error: ReliabilityFailure } =>
  fail<ReliabilityFailure>({ kind: 'invalid_import', message });

// "3" -> 3, "3.50" stays a string, "" is missing
function parseCell(raw: string | undefined): JsonValue | undefined {
  const trimmed = (raw ?? '').trim();
  if (trimmed === '') return undefined;
  const num = Number(trimmed);
  return !Number.isNaN(num) && String(num) === trimmed ? num : trimmed;
}

// Shared by CSV and Excel: header names and one raw row per record
function observationsFromRows(
  fields: string[],
  rows: RawRow[],
  warnings: string[]
): Outcome<ImportedObservations, ReliabilityFailure> {
  const missing = REQUIRED_COLUMNS.filter(column => !fields.includes(column));
  if (missing.length > 0) {
    return invalid(`Missing required columns: ${missing.join(', ')}`);
  }

  const variables = fields.filter(field => field !== '' && !REQUIRED_COLUMNS.some(column => column === field));
  if (variables.length === 0) {
    return invalid('No variable columns found');
  }

  const observations: Observation[] = [];

  rows.forEach((row, index) => {
    const contentId = (row.content_id ?? '').trim();
    const coderId = (row.coder_id ?? '').trim();
    if (!contentId || !coderId) {
      warnings.push(`Row ${index + 1}: missing content_id or coder_id, skipped`);
      return;
    }

    const values: Observation['values'] = {};
    for (const variable of variables) {
      const value = parseCell(row[variable]);
      if (value !== undefined) {
        values[variable] = value;
      }
    }
    observations.push({ contentId, coderId, values });
  });

  if (observations.length === 0) {
    return invalid('No usable rows found');
  }

  return succeed({ observations, variables, warnings });
}

/**
 * Tabular import: one row per (content_id, coder_id), one column per variable
 */
export function parseObservationsCsv(text: string): Outcome<ImportedObservations, ReliabilityFailure> {
  const parsed = Papa.parse<RawRow>(text, {
    header: true,
    skipEmptyLines: true,
    transformHeader: header => header.trim(),
  });

  const warnings = parsed.errors.map(error => `Row ${error.row ?? '?'}: ${error.message}`);
  return observationsFromRows(parsed.meta.fields ?? [], parsed.data, warnings);
}

/**
 * Excel import: the first worksheet, laid out like the CSV file.
 * Cells are read as their displayed text, so numbers follow the CSV rules.
 */
export async function parseObservationsXlsx(data: ArrayBuffer): Promise<Outcome<ImportedObservations, ReliabilityFailure>> {
  const workbook = new ExcelJS.Workbook();
  try {
    await workbook.xlsx.load(data);
  } catch (error) {
    return invalid(`Could not read Excel workbook: ${error instanceof Error ? error.message : String(error)}`);
  }

  const sheet = workbook.worksheets[0];
  if (!sheet) {
    return invalid('Excel workbook has no worksheets');
  }

  const columns = new Map<number, string>();
  sheet.getRow(1).eachCell((cell, column) => {
    columns.set(column, cell.text.trim());
  });

  const rows: RawRow[] = [];
  sheet.eachRow((row, rowNumber) => {
    if (rowNumber === 1) return;
    const record: RawRow = {};
    for (const [column, name] of columns) {
      record[name] = row.getCell(column).text;
    }
    rows.push(record);
  });

  return observationsFromRows([...columns.values()], rows, []);
}

/**
 * JSON import: [{ content_id, coder_id, variables: { name: value } }]
 */
export function parseObservationsJson(text: string): Outcome<ImportedObservations, ReliabilityFailure> {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    return invalid(`Invalid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  const records = ImportRecordListSchema.safeParse(data);
  if (!records.success) {
    const issues = records.error.errors.map(e => `${e.path.join('.') || '(root)'}: ${e.message}`);
    return invalid(`Invalid import records: ${issues.slice(0, 5).join('; ')}`);
  }

  const variables: string[] = [];
  for (const record of records.data) {
    for (const name of Object.keys(record.variables)) {
      if (!variables.includes(name)) variables.push(name);
    }
  }
  if (variables.length === 0) {
    return invalid('No variable columns found');
  }

  return succeed({ observations: records.data.map(toObservation), variables, warnings: [] });
}

export async function parseObservations(
  source: ImportSource,
  format: ImportFormat
): Promise<Outcome<ImportedObservations, ReliabilityFailure>> {
  if (format === 'xlsx') {
    return typeof source === 'string' ? invalid('Excel import needs the workbook bytes, not text') : parseObservationsXlsx(source);
  }

  const text = typeof source === 'string' ? source : new TextDecoder().decode(source);
  return format === 'csv' ? parseObservationsCsv(text) : parseObservationsJson(text);
}
