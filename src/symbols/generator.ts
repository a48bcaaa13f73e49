import { typstRelativePath } from '../config/paths.js';
import { emitFile } from '../emit/writer.js';
import type { GenerationMode, GenerationReport, GeneratorContext } from '../types.js';
import { createLogger } from '../utils/logger.js';
import { scanSymbolFile } from './scanner.js';
import { buildSymbolDictionary, renderSymbolDictionary } from './serializer.js';

const logger = createLogger('symbols.generator');

/**
 * 符号字典生成管道：扫描 `sym.typ` → 渲染字典 → 写出 `_sym-dict.typ`。
 */
export function generateSymbolDictionary(
  ctx: GeneratorContext,
  mode: GenerationMode = 'write'
): GenerationReport {
  const { paths } = ctx;
  const dict = buildSymbolDictionary(scanSymbolFile(paths.symbolSource));
  const text = renderSymbolDictionary(dict, {
    generatedAt: ctx.now,
    sourceLabel: typstRelativePath(ctx.root, paths.symbolSource),
  });

  const output = emitFile(paths.symbolDictionary, text, mode);
  logger.debug('Symbol dictionary processed', { file: output.file, state: output.state });

  return { inputs: [paths.symbolSource], outputs: [output], count: dict.size };
}
