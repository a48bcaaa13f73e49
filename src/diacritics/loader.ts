/**
 * @module diacritics/loader
 *
 * 读取 `_diacritics.csv`，按文件顺序产出 DiacriticRecord。
 *
 * 表格要求表头行，列名见 {@link DIACRITIC_COLUMNS}；`tyipa-aliases` 列可缺省。
 * 可选的 UTF-8 BOM 会被忽略，空行会被跳过，其余内容原样保留。
 */

import { existsSync, readFileSync } from 'node:fs';
import { parse } from 'csv-parse/sync';
import { DiagnosticBuilder, DiagnosticCode, LoadError } from '../diagnostics/diagnostics.js';
import type { DiacriticRecord } from '../types.js';
import { createLogger } from '../utils/logger.js';

export const DIACRITIC_COLUMNS = {
  group: 'group',
  ipaName: 'ipa-name',
  ipaDescription: 'ipa-desc',
  unicodeName: 'unicode-name',
  unicodeHex: 'unicode-hex',
  generatedName: 'tyipa-name',
  aliasNames: 'tyipa-aliases',
} as const satisfies Record<keyof DiacriticRecord, string>;

type RequiredField = Exclude<keyof DiacriticRecord, 'aliasNames'>;

const REQUIRED_FIELDS: readonly RequiredField[] = [
  'group',
  'ipaName',
  'ipaDescription',
  'unicodeName',
  'unicodeHex',
  'generatedName',
];

const HEX_PATTERN = /^[0-9A-Fa-f]{1,6}$/;

interface ParsedRow {
  readonly fields: readonly string[];
  readonly line: number;
}

const logger = createLogger('diacritics.loader');

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function toParsedRow(value: unknown): ParsedRow | null {
  if (typeof value !== 'object' || value === null) return null;
  if (!('record' in value) || !('info' in value)) return null;
  const { record, info } = value;
  if (!isStringArray(record)) return null;
  if (typeof info !== 'object' || info === null || !('lines' in info)) return null;
  return typeof info.lines === 'number' ? { fields: record, line: info.lines } : null;
}

function parseRows(content: Buffer | string, source: string): ParsedRow[] {
  let output: unknown;
  try {
    output = parse(content, {
      bom: true,
      info: true,
      skip_empty_lines: true,
      relax_column_count: true,
    });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return DiagnosticBuilder.error(DiagnosticCode.D003_MalformedTable)
      .withMessage(`Malformed diacritic table: ${reason}`)
      .at(source)
      .throw(LoadError);
  }

  if (!Array.isArray(output)) {
    return DiagnosticBuilder.error(DiagnosticCode.D003_MalformedTable)
      .withMessage('Malformed diacritic table: parser returned no rows')
      .at(source)
      .throw(LoadError);
  }

  const rows: ParsedRow[] = [];
  for (const item of output) {
    const row = toParsedRow(item);
    if (!row) {
      return DiagnosticBuilder.error(DiagnosticCode.D003_MalformedTable)
        .withMessage('Malformed diacritic table: unexpected row shape')
        .at(source)
        .throw(LoadError);
    }
    rows.push(row);
  }
  return rows;
}

/** `unicode-hex` 必须是单个 Unicode 标量值（排除代理区）。 */
export function isUnicodeScalarHex(hex: string): boolean {
  if (!HEX_PATTERN.test(hex)) return false;
  const value = Number.parseInt(hex, 16);
  return value <= 0x10ffff && (value < 0xd800 || value > 0xdfff);
}

/**
 * 解析表格内容。`source` 仅用于诊断信息中的位置。
 */
export function parseDiacriticTable(content: Buffer | string, source: string): DiacriticRecord[] {
  const [header, ...body] = parseRows(content, source);
  if (!header) {
    return DiagnosticBuilder.error(DiagnosticCode.D003_MalformedTable)
      .withMessage('Diacritic table has no header row')
      .at(source)
      .throw(LoadError);
  }

  const columnIndex = new Map<string, number>();
  header.fields.forEach((name, index) => {
    if (!columnIndex.has(name)) columnIndex.set(name, index);
  });

  const requiredIndex = new Map<RequiredField, number>();
  for (const field of REQUIRED_FIELDS) {
    const column = DIACRITIC_COLUMNS[field];
    const index = columnIndex.get(column);
    if (index === undefined) {
      return DiagnosticBuilder.error(DiagnosticCode.D004_MissingColumn)
        .withMessage(`Diacritic table is missing required column '${column}'`)
        .at(source, header.line)
        .throw(LoadError);
    }
    requiredIndex.set(field, index);
  }
  const aliasIndex = columnIndex.get(DIACRITIC_COLUMNS.aliasNames);

  const seen = new Map<string, number>();
  const records: DiacriticRecord[] = [];

  for (const row of body) {
    const value = (field: RequiredField): string => {
      const index = requiredIndex.get(field) ?? -1;
      const cell = row.fields[index];
      if (cell === undefined) {
        return DiagnosticBuilder.error(DiagnosticCode.D005_MissingField)
          .withMessage(`Row is missing required field '${DIACRITIC_COLUMNS[field]}'`)
          .at(source, row.line)
          .throw(LoadError);
      }
      return cell;
    };

    const record: DiacriticRecord = {
      group: value('group'),
      ipaName: value('ipaName'),
      ipaDescription: value('ipaDescription'),
      unicodeName: value('unicodeName'),
      unicodeHex: value('unicodeHex'),
      generatedName: value('generatedName'),
      aliasNames: aliasIndex === undefined ? '' : (row.fields[aliasIndex] ?? ''),
    };

    if (!isUnicodeScalarHex(record.unicodeHex)) {
      return DiagnosticBuilder.error(DiagnosticCode.D007_InvalidCodePoint)
        .withMessage(`'${record.unicodeHex}' is not a valid Unicode code point for '${record.generatedName}'`)
        .at(source, row.line)
        .throw(LoadError);
    }

    const previous = seen.get(record.generatedName);
    if (previous !== undefined) {
      return DiagnosticBuilder.error(DiagnosticCode.D006_DuplicateName)
        .withMessage(`Duplicate diacritic name '${record.generatedName}' (first defined on line ${previous})`)
        .at(source, row.line)
        .throw(LoadError);
    }
    seen.set(record.generatedName, row.line);

    records.push(record);
  }

  return records;
}

export function loadDiacriticTable(file: string): DiacriticRecord[] {
  if (!existsSync(file)) {
    return DiagnosticBuilder.error(DiagnosticCode.D001_TableNotFound)
      .withMessage(`Diacritic table not found: ${file}`)
      .at(file)
      .throw(LoadError);
  }

  let content: Buffer;
  try {
    content = readFileSync(file);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return DiagnosticBuilder.error(DiagnosticCode.D002_TableUnreadable)
      .withMessage(`Cannot read diacritic table: ${reason}`)
      .at(file)
      .throw(LoadError);
  }

  logger.debug('Reading diacritics', { file });
  const records = parseDiacriticTable(content, file);
  logger.info('Diacritic definitions loaded', { file, count: records.length });
  return records;
}
