/**
 * @module diacritics/synthesizer
 *
 * 把一条 DiacriticRecord 渲染成 Typst 函数定义及其别名绑定。
 *
 * 两种代码形态：
 * - tied 形态（`segmentation` 组且名称以 `tied-` 开头）：要求正好两个字素簇，
 *   把连接符放在两者之间；
 * - 默认形态：在输入的每个字素簇后追加变音符号。
 */

import type { DiacriticRecord } from '../types.js';
import { capitalize } from '../emit/text.js';

export const SEGMENTATION_GROUP = 'segmentation';
export const TIED_PREFIX = 'tied-';

export function isTiedSegmentation(record: DiacriticRecord): boolean {
  return record.group === SEGMENTATION_GROUP && record.generatedName.startsWith(TIED_PREFIX);
}

/** 别名列表；连续空格不会产生空别名。 */
export function aliasesOf(record: DiacriticRecord): string[] {
  return record.aliasNames.split(' ').filter(alias => alias.length > 0);
}

/** Typst 字符串里的码位转义，例如 `\u{0301}`。 */
export function unicodeEscape(hex: string): string {
  return `\\u{${hex}}`;
}

/** 手册签名中的参数类型；生成函数的参数文档统一写 `str | symbol`。 */
export function parameterType(record: DiacriticRecord): string {
  return isTiedSegmentation(record) ? 'str' : 'str | symbol';
}

function renderDocComment(record: DiacriticRecord): string[] {
  const aliases = record.aliasNames || '(none)';
  return [
    `/// Apply the '${record.ipaDescription}' diacritic to \`base\`.`,
    '/// ',
    '/// Adds the following diacritic to `base`:',
    `/// / IPA name: ${record.ipaName}`,
    `/// / IPA description: ${record.ipaDescription}`,
    `/// / Unicode name: ${record.unicodeName}`,
    `/// / Unicode hex: \`0x${record.unicodeHex}\``,
    `/// / TyIPA name: ${record.generatedName}`,
    `/// / TyIPA alias(es): ${aliases}`,
    '/// ',
    '/// -> str',
  ];
}

function renderTiedBody(record: DiacriticRecord): string[] {
  const name = record.generatedName;
  return [
    '  assert(',
    '    type(base) == str,',
    `    message: "${name}() expects argument of type \`str\`, \`" + str(type(base)) + "\` given"`,
    '  )',
    '  let parts = base.split("")',
    '  assert(',
    '    parts.len() == 4,',
    `    message: "${name}() expects argument of length 2, " + str(parts.len() - 2) + " given"`,
    '  )',
    `  parts.at(1) + "${unicodeEscape(record.unicodeHex)}" + parts.at(2)`,
  ];
}

function renderDefaultBody(record: DiacriticRecord): string[] {
  return [
    '  let modified = ()',
    '  for chr in str(base) {',
    `    modified.push(chr + "${unicodeEscape(record.unicodeHex)}")`,
    '  }',
    '  modified.join("")',
  ];
}

/**
 * 单个函数定义，以空行结尾。
 */
export function renderDiacriticFunction(record: DiacriticRecord): string {
  const lines = [
    ...renderDocComment(record),
    `#let ${record.generatedName}(`,
    '  /// The character(s) to which the diacritic should be added.',
    '  /// -> str | symbol',
    '  base',
    ') = {',
    ...(isTiedSegmentation(record) ? renderTiedBody(record) : renderDefaultBody(record)),
    '}',
  ];
  return lines.join('\n') + '\n\n';
}

/**
 * 别名直接绑定到原函数，不经过包装。
 */
export function renderAlias(original: string, alias: string): string {
  return [`/// Alias for \`${original}\`.`, `#let ${alias} = ${original}`].join('\n') + '\n\n';
}

export function renderDiacriticDefinition(record: DiacriticRecord): string {
  const aliases = aliasesOf(record).map(alias => renderAlias(record.generatedName, alias));
  return renderDiacriticFunction(record) + aliases.join('');
}

export function renderCodeSectionHead(group: string): string {
  return `/*** ${capitalize(group)} diacritics***/\n\n`;
}
