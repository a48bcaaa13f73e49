/**
 * 生成器的固定文件布局，全部相对于包根目录。
 */
import { join, posix, relative, sep } from 'node:path';
import type { GenerationPaths } from '../types.js';

export const DIACRITIC_TABLE = join('src', '_diacritics.csv');
export const DIACRITIC_MODULE = join('src', '_diacritics.typ');
export const DIACRITIC_MANUAL = join('manual', '_list-diacritics.typ');
export const SYMBOL_SOURCE = join('src', 'sym.typ');
export const SYMBOL_DICTIONARY = join('src', '_sym-dict.typ');
export const LIBRARY_ENTRY = join('src', 'lib.typ');
export const DISPLAY_LAYOUTS = join('manual', '_display-layouts.typ');

export function resolveGenerationPaths(root: string): GenerationPaths {
  return {
    diacriticTable: join(root, DIACRITIC_TABLE),
    diacriticModule: join(root, DIACRITIC_MODULE),
    diacriticManual: join(root, DIACRITIC_MANUAL),
    symbolSource: join(root, SYMBOL_SOURCE),
    symbolDictionary: join(root, SYMBOL_DICTIONARY),
    libraryEntry: join(root, LIBRARY_ENTRY),
    displayLayouts: join(root, DISPLAY_LAYOUTS),
  };
}

/**
 * `from` 到 `to` 的 Typst 风格相对路径：始终使用 `/`，同级路径带 `./` 前缀。
 *
 * `from` 是一个目录。
 */
export function typstRelativePath(from: string, to: string): string {
  const rel = relative(from, to).split(sep).join(posix.sep);
  return rel.startsWith('../') ? rel : `./${rel}`;
}
