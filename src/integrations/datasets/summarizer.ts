/**
 * Dataset summarizer. Produces the small view of a dataset that the
 * planner and the code generator see: shape, column names, inferred types,
 * missing counts and a few samples. Never the full data.
 */

import { extname } from 'node:path';
import type { ColumnSummary, ColumnType, DatasetSummary } from '../orchestration/types.js';

const SAMPLE_VALUES = 3;
const MISSING_MARKERS = new Set(['', 'na', 'n/a', 'nan', 'null', 'none', '-']);
const BOOLEAN_VALUES = new Set(['true', 'false', 'yes', 'no']);
const NUMBER_PATTERN = /^[-+]?(\d+(\.\d*)?|\.\d+)([eE][-+]?\d+)?$/;
const DATE_PATTERN = /^(\d{4}-\d{2}-\d{2}([ T]\d{2}:\d{2}(:\d{2})?)?|\d{1,2}\/\d{1,2}\/\d{2,4})$/;

export function summarizeDataset(bytes: Uint8Array, fileName: string): DatasetSummary {
  const text = new TextDecoder('utf-8').decode(bytes).replace(/^\uFEFF/, '');
  const ext = extname(fileName).toLowerCase();

  if (ext === '.json') {
    const summary = summarizeJson(text, fileName);
    if (summary) return summary;
  }
  if (ext === '.csv' || ext === '.tsv') {
    return summarizeDelimited(text, fileName, ext === '.tsv' ? '\t' : ',');
  }
  return summarizeText(text, fileName);
}

// =============================================================================
// DELIMITED
// =============================================================================

function summarizeDelimited(text: string, fileName: string, delimiter: string): DatasetSummary {
  const records = parseDelimited(text, delimiter).filter((row) => !(row.length === 1 && row[0] === ''));
  const [header, ...rows] = records;
  if (!header) {
    return { fileName, format: 'delimited', rowCount: 0, columns: [] };
  }

  const names = header.map((name, i) => name.trim() || `column_${i + 1}`);
  const columns = names.map((name, i) => summarizeColumn(name, rows.map((row) => row[i] ?? '')));
  return { fileName, format: 'delimited', rowCount: rows.length, columns };
}

/**
 * RFC 4180 style: quoted fields may hold delimiters, newlines and doubled quotes.
 */
export function parseDelimited(text: string, delimiter: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let quoted = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quoted) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          quoted = false;
        }
      } else {
        field += ch;
      }
      continue;
    }

    if (ch === '"' && field === '') {
      quoted = true;
    } else if (ch === delimiter) {
      row.push(field);
      field = '';
    } else if (ch === '\n' || ch === '\r') {
      if (ch === '\r' && text[i + 1] === '\n') i++;
      row.push(field);
      rows.push(row);
      row = [];
      field = '';
    } else {
      field += ch;
    }
  }

  if (field !== '' || row.length > 0) {
    row.push(field);
    rows.push(row);
  }
  return rows;
}

// =============================================================================
// JSON
// =============================================================================

function summarizeJson(text: string, fileName: string): DatasetSummary | null {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return null;
  }

  const records: unknown[] = Array.isArray(value) ? value : [value];
  const objects = records.filter(isRecord);
  if (objects.length === 0) {
    return { fileName, format: 'json', rowCount: records.length, columns: [] };
  }

  const names: string[] = [];
  for (const obj of objects) {
    for (const key of Object.keys(obj)) {
      if (!names.includes(key)) names.push(key);
    }
  }

  const columns = names.map((name) => summarizeColumn(name, objects.map((obj) => stringifyCell(obj[name]))));
  return { fileName, format: 'json', rowCount: records.length, columns };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringifyCell(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

// =============================================================================
// TEXT
// =============================================================================

function summarizeText(text: string, fileName: string): DatasetSummary {
  const lines = text.split(/\r?\n/).filter((line) => line.trim() !== '');
  return {
    fileName,
    format: 'text',
    rowCount: lines.length,
    columns: [summarizeColumn('line', lines)],
  };
}

// =============================================================================
// COLUMNS
// =============================================================================

function summarizeColumn(name: string, values: string[]): ColumnSummary {
  const present = values.map((v) => v.trim()).filter((v) => !MISSING_MARKERS.has(v.toLowerCase()));
  return {
    name,
    type: inferType(present),
    missing: values.length - present.length,
    samples: [...new Set(present)].slice(0, SAMPLE_VALUES),
  };
}

export function inferType(values: readonly string[]): ColumnType {
  if (values.length === 0) return 'empty';
  if (values.every((v) => NUMBER_PATTERN.test(v))) return 'number';
  if (values.every((v) => BOOLEAN_VALUES.has(v.toLowerCase()))) return 'boolean';
  if (values.every((v) => DATE_PATTERN.test(v) && !Number.isNaN(Date.parse(v)))) return 'date';
  return 'string';
}
