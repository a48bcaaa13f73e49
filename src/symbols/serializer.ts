/**
 * @module symbols/serializer
 *
 * 把扫描到的符号关联写成 Typst 字典字面量。
 */

import { renderGeneratedHeader } from '../emit/header.js';
import type { SymbolEntry } from '../types.js';

export const SYM_DICT_COMMAND = 'tyipa-gen sym-dict';
export const DEFAULT_BINDING = 'sym-dict';

export interface SymbolDictRenderOptions {
  readonly generatedAt: Date;
  /** 文件头中提示的输入路径，如 `./src/sym.typ` */
  readonly sourceLabel: string;
  readonly binding?: string;
}

/**
 * 同名条目保留首次出现的位置，取最后一次出现的字符。
 */
export function buildSymbolDictionary(entries: readonly SymbolEntry[]): Map<string, string> {
  const dict = new Map<string, string>();
  for (const entry of entries) {
    dict.set(entry.name, entry.character);
  }
  return dict;
}

export function renderSymbolDictionary(
  dict: ReadonlyMap<string, string>,
  options: SymbolDictRenderOptions
): string {
  const header = renderGeneratedHeader({
    title: 'Internal dictionary of known symbols.',
    notice: [
      'This file was generated automatically by a script.',
      `Re-run the package's \`${SYM_DICT_COMMAND}\` command`,
      `if you have updated the definitions in ${options.sourceLabel}.`,
    ],
    generatedAt: options.generatedAt,
    countLabel: 'Symbol definitions included',
    count: dict.size,
  });

  const binding = options.binding ?? DEFAULT_BINDING;
  // `()` would be an empty array in Typst
  if (dict.size === 0) {
    return `${header}#let ${binding} = (:)\n`;
  }

  const lines = [`#let ${binding} = (`];
  for (const [name, character] of dict) {
    lines.push(`  "${name}": "${character}",`);
  }
  lines.push(')');
  return header + lines.join('\n') + '\n';
}
