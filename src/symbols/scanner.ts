/**
 * @module symbols/scanner
 *
 * 从 `sym.typ` 中按行形态提取符号定义。只识别三种行：
 *
 * ```typst
 * #let schwa = symbol(        // 定义开始，更新当前符号名
 *   "ə",                      // 主字符 → schwa
 *   ("rhotic", "ɚ"),          // 变体   → schwa.rhotic
 * )
 * ```
 *
 * 不追踪括号配对，格式变化会导致漏识别。
 */

import { existsSync, readFileSync } from 'node:fs';
import { DiagnosticBuilder, DiagnosticCode, ScanError } from '../diagnostics/diagnostics.js';
import type { SymbolEntry } from '../types.js';
import { createLogger } from '../utils/logger.js';

export const DEFINITION_START_PATTERN =
  /^[\t ]*#let[\t ]+([a-zA-Z\-]+)[\t ]*=[\t ]*symbol\([\t ]*(?:\/\/.*)*$/u;

export const PRIMARY_PATTERN = /^[\t ]*"(\S)"[\t ]*,[\t ]*(?:\/\/.*)*$/u;

export const SECONDARY_PATTERN =
  /^[\t ]*\([\t ]*"([a-zA-Z\-.]+)"[\t ]*,[\t ]*"(\S)"\)[\t ]*,[\t ]*(?:\/\/.*)*/u;

const logger = createLogger('symbols.scanner');

/**
 * 按出现顺序返回全部关联（含重复名称）。
 *
 * 在第一个定义开始行之前出现的主字符/变体行会被跳过。
 */
export function scanSymbols(text: string): SymbolEntry[] {
  const entries: SymbolEntry[] = [];
  let current: string | undefined;

  for (const line of text.split(/\r\n|\r|\n/)) {
    const start = DEFINITION_START_PATTERN.exec(line);
    if (start) {
      current = start[1];
      continue;
    }

    const primary = PRIMARY_PATTERN.exec(line);
    if (primary) {
      const character = primary[1];
      if (current !== undefined && character !== undefined) {
        entries.push({ name: current, character });
      }
      continue;
    }

    const secondary = SECONDARY_PATTERN.exec(line);
    if (secondary) {
      const [, suffix, character] = secondary;
      if (current !== undefined && suffix !== undefined && character !== undefined) {
        entries.push({ name: `${current}.${suffix}`, character });
      }
    }
  }

  return entries;
}

export function scanSymbolFile(file: string): SymbolEntry[] {
  if (!existsSync(file)) {
    return DiagnosticBuilder.error(DiagnosticCode.S001_SourceNotFound)
      .withMessage(`Symbol source not found: ${file}`)
      .at(file)
      .throw(ScanError);
  }

  let text: string;
  try {
    text = readFileSync(file, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return DiagnosticBuilder.error(DiagnosticCode.S002_SourceUnreadable)
      .withMessage(`Cannot read symbol source: ${reason}`)
      .at(file)
      .throw(ScanError);
  }

  logger.debug('Scanning symbol definitions', { file });
  const entries = scanSymbols(text);
  logger.info('Symbol associations found', { file, count: entries.length });
  return entries;
}
