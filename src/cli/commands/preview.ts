import { applyDiacritic, findDiacritic } from '../../diacritics/preview.js';
import { loadDiacriticTable } from '../../diacritics/loader.js';
import { DiagnosticBuilder, DiagnosticCode } from '../../diagnostics/diagnostics.js';
import { createGeneratorContext } from '../context.js';

export interface PreviewOptions {
  root?: string;
}

/**
 * 打印生成函数 `name`（或其别名）作用于 `text` 的结果。
 */
export function previewCommand(name: string, text: string, options: PreviewOptions = {}): string {
  const ctx = createGeneratorContext(options.root);
  const records = loadDiacriticTable(ctx.paths.diacriticTable);
  const record = findDiacritic(records, name);
  if (!record) {
    return DiagnosticBuilder.error(DiagnosticCode.G002_UnknownDiacritic)
      .withMessage(`Unknown diacritic function '${name}'`)
      .at(ctx.paths.diacriticTable)
      .throw();
  }

  const result = applyDiacritic(record, text);
  console.log(result);
  return result;
}
