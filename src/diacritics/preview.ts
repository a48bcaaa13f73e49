/**
 * @module diacritics/preview
 *
 * 生成函数的 TypeScript 对照实现：与 synthesizer 输出的 Typst 代码语义一致，
 * 供 `preview` 命令与测试使用，无需安装 Typst。
 *
 * Typst 的 `str.split("")` 会在两端各产生一个空串，因此 `pieces` 的长度是
 * 字素簇数 + 2。
 */

import type { DiacriticRecord } from '../types.js';
import { aliasesOf, isTiedSegmentation } from './synthesizer.js';

/** 生成函数的断言失败（对应 Typst 中 `assert` 的报错）。 */
export class DiacriticAssertionError extends Error {
  constructor(
    message: string,
    readonly functionName: string
  ) {
    super(message);
    this.name = 'DiacriticAssertionError';
  }
}

const segmenter = new Intl.Segmenter(undefined, { granularity: 'grapheme' });

export function graphemeClusters(text: string): string[] {
  return Array.from(segmenter.segment(text), part => part.segment);
}

export function codePointOf(hex: string): string {
  return String.fromCodePoint(Number.parseInt(hex, 16));
}

/** 值在 Typst 中的类型名，用于断言消息。 */
export function typstTypeName(value: unknown): string {
  if (value === null || value === undefined) return 'none';
  if (typeof value === 'string') return 'str';
  if (typeof value === 'boolean') return 'bool';
  if (typeof value === 'number') return Number.isInteger(value) ? 'int' : 'float';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'object') return 'dictionary';
  return 'content';
}

function applyTied(record: DiacriticRecord, base: unknown): string {
  const name = record.generatedName;
  if (typeof base !== 'string') {
    throw new DiacriticAssertionError(
      `${name}() expects argument of type \`str\`, \`${typstTypeName(base)}\` given`,
      name
    );
  }
  const pieces = ['', ...graphemeClusters(base), ''];
  const [, first, second] = pieces;
  if (pieces.length !== 4 || first === undefined || second === undefined) {
    throw new DiacriticAssertionError(
      `${name}() expects argument of length 2, ${pieces.length - 2} given`,
      name
    );
  }
  return first + codePointOf(record.unicodeHex) + second;
}

function applyEach(record: DiacriticRecord, base: unknown): string {
  const mark = codePointOf(record.unicodeHex);
  return graphemeClusters(String(base))
    .map(cluster => cluster + mark)
    .join('');
}

/**
 * 计算生成函数 `record.generatedName` 对 `base` 的返回值。
 *
 * @throws DiacriticAssertionError tied 形态下参数不是字符串或不是两个字素簇
 */
export function applyDiacritic(record: DiacriticRecord, base: unknown): string {
  return isTiedSegmentation(record) ? applyTied(record, base) : applyEach(record, base);
}

/** 按函数名或别名查找定义。 */
export function findDiacritic(
  records: readonly DiacriticRecord[],
  name: string
): DiacriticRecord | undefined {
  return (
    records.find(record => record.generatedName === name) ??
    records.find(record => aliasesOf(record).includes(name))
  );
}
