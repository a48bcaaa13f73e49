/**
 * @module tyipa-gen
 *
 * TyIPA 包的构建期代码生成器。
 *
 * **两条管道**：
 * ```
 * _diacritics.csv → loadDiacriticTable → renderDiacriticModule / renderDiacriticManual → .typ
 * sym.typ         → scanSymbols → buildSymbolDictionary → renderSymbolDictionary → .typ
 * ```
 *
 * @example
 * ```typescript
 * import { parseDiacriticTable, renderDiacriticDefinition } from 'tyipa-gen';
 *
 * const [acute] = parseDiacriticTable(csv, 'inline.csv');
 * console.log(renderDiacriticDefinition(acute));
 * ```
 */

// 变音符号
export { loadDiacriticTable, parseDiacriticTable, DIACRITIC_COLUMNS } from './diacritics/loader.js';
export {
  isTiedSegmentation,
  aliasesOf,
  renderDiacriticFunction,
  renderDiacriticDefinition,
  renderAlias,
  renderCodeSectionHead,
} from './diacritics/synthesizer.js';
export { renderDisplayCard, renderManualSectionHead } from './diacritics/doc-emitter.js';
export {
  renderDiacriticModule,
  renderDiacriticManual,
  renderInSections,
  generateDiacritics,
} from './diacritics/generator.js';
export {
  applyDiacritic,
  findDiacritic,
  graphemeClusters,
  DiacriticAssertionError,
} from './diacritics/preview.js';

// 符号字典
export { scanSymbols, scanSymbolFile } from './symbols/scanner.js';
export { buildSymbolDictionary, renderSymbolDictionary } from './symbols/serializer.js';
export { generateSymbolDictionary } from './symbols/generator.js';

// 配置与诊断
export { resolveGenerationPaths } from './config/paths.js';
export { ConfigService } from './config/config-service.js';
export {
  DiagnosticCode,
  DiagnosticError,
  LoadError,
  ScanError,
  formatDiagnostic,
  type Diagnostic,
} from './diagnostics/index.js';

export type {
  DiacriticRecord,
  SymbolEntry,
  GenerationPaths,
  GeneratorContext,
  GenerationReport,
  OutputStatus,
} from './types.js';
