/**
 * @module diacritics/doc-emitter
 *
 * 手册中的变音符号展示卡片（`#display-diac(...)` 调用）。
 */

import type { DiacriticRecord } from '../types.js';
import { titleCase } from '../emit/text.js';
import { aliasesOf, isTiedSegmentation, parameterType } from './synthesizer.js';

export const PLACEHOLDER = 'ipa.sym.placeholder';
export const TIED_NOTE = 'Expects an argument of length exactly 2.';

/** 展示卡片中的调用签名，如 `acute(base: str | symbol)`。 */
export function signatureOf(name: string, record: DiacriticRecord): string {
  return `${name}(base: ${parameterType(record)})`;
}

function renderSample(record: DiacriticRecord): string {
  const argument = isTiedSegmentation(record) ? `${PLACEHOLDER} + ${PLACEHOLDER}` : PLACEHOLDER;
  return `ipa.diac.${record.generatedName}(${argument})`;
}

export function renderDisplayCard(record: DiacriticRecord): string {
  const lines = [
    '#display-diac(',
    `  ${renderSample(record)},`,
    `  "${signatureOf(record.generatedName, record)}",`,
    `  "${record.ipaName}",`,
    `  "${record.ipaDescription}",`,
    `  escape: "\\\\u{${record.unicodeHex}}",`,
  ];

  const aliases = aliasesOf(record);
  if (aliases.length > 0) {
    const signatures = aliases.map(alias => `"${signatureOf(alias, record)}"`);
    lines.push(`  aliases: (${signatures.join(', ')},),`);
  }
  if (isTiedSegmentation(record)) {
    lines.push(`  note: "${TIED_NOTE}",`);
  }
  lines.push(')');

  return lines.join('\n') + '\n';
}

export function renderManualSectionHead(group: string): string {
  return `\n== ${titleCase(group)}\n\n`;
}
