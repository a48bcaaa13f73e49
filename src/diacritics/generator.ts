/**
 * @module diacritics/generator
 *
 * 变音符号生成管道：加载表格 → 渲染函数模块与手册列表 → 写出。
 *
 * 分节标题按“连续段”插入：记录的 group 与上一条不同时即插入新标题，
 * 不做排序，因此交错出现的分组会产生重复标题。
 */

import { dirname } from 'node:path';
import { renderGeneratedHeader } from '../emit/header.js';
import { emitFile } from '../emit/writer.js';
import { typstRelativePath } from '../config/paths.js';
import type {
  DiacriticRecord,
  GenerationMode,
  GenerationReport,
  GeneratorContext,
} from '../types.js';
import { createLogger } from '../utils/logger.js';
import { renderDisplayCard, renderManualSectionHead } from './doc-emitter.js';
import { loadDiacriticTable } from './loader.js';
import { renderCodeSectionHead, renderDiacriticDefinition } from './synthesizer.js';

export const DIACRITICS_COMMAND = 'tyipa-gen diacritics';

export interface DiacriticRenderOptions {
  readonly generatedAt: Date;
  /** 文件头中提示的输入路径，如 `./src/_diacritics.csv` */
  readonly sourceLabel: string;
}

export interface ManualRenderOptions extends DiacriticRenderOptions {
  /** 相对手册文件的包入口路径 */
  readonly libraryImport: string;
  /** 相对手册文件的布局模块路径 */
  readonly layoutsImport: string;
}

const logger = createLogger('diacritics.generator');

/**
 * 依次渲染记录，group 变化处插入分节标题。
 */
export function renderInSections(
  records: readonly DiacriticRecord[],
  renderHead: (group: string) => string,
  renderBody: (record: DiacriticRecord) => string
): string {
  let out = '';
  let currentGroup: string | undefined;
  for (const record of records) {
    if (record.group !== currentGroup) {
      currentGroup = record.group;
      out += renderHead(record.group);
    }
    out += renderBody(record);
  }
  return out;
}

function regenerationNotice(sourceLabel: string): string[] {
  return [
    "This file was auto-generated. Re-run the package's",
    `\`${DIACRITICS_COMMAND}\` command if you have`,
    `updated the definitions in \`${sourceLabel}\`.`,
  ];
}

export function renderDiacriticModule(
  records: readonly DiacriticRecord[],
  options: DiacriticRenderOptions
): string {
  const header = renderGeneratedHeader({
    title: 'Accenting functions for the diacritics of the IPA.',
    notice: regenerationNotice(options.sourceLabel),
    generatedAt: options.generatedAt,
    countLabel: 'Definitions included',
    count: records.length,
  });
  return header + renderInSections(records, renderCodeSectionHead, renderDiacriticDefinition);
}

export function renderDiacriticManual(
  records: readonly DiacriticRecord[],
  options: ManualRenderOptions
): string {
  const header = renderGeneratedHeader({
    title: 'Display listing of tyipa diacritic functions.',
    notice: regenerationNotice(options.sourceLabel),
    generatedAt: options.generatedAt,
    countLabel: 'Definitions included',
    count: records.length,
  });
  const imports =
    `#import "${options.libraryImport}" as ipa\n` +
    `#import "${options.layoutsImport}": display-diac\n` +
    '\n';
  return header + imports + renderInSections(records, renderManualSectionHead, renderDisplayCard);
}

export function generateDiacritics(ctx: GeneratorContext, mode: GenerationMode = 'write'): GenerationReport {
  const { paths } = ctx;
  const records = loadDiacriticTable(paths.diacriticTable);
  const sourceLabel = typstRelativePath(ctx.root, paths.diacriticTable);
  const manualDir = dirname(paths.diacriticManual);

  const moduleText = renderDiacriticModule(records, { generatedAt: ctx.now, sourceLabel });
  const manualText = renderDiacriticManual(records, {
    generatedAt: ctx.now,
    sourceLabel,
    libraryImport: typstRelativePath(manualDir, paths.libraryEntry),
    layoutsImport: typstRelativePath(manualDir, paths.displayLayouts),
  });

  const outputs = [
    emitFile(paths.diacriticModule, moduleText, mode),
    emitFile(paths.diacriticManual, manualText, mode),
  ];
  for (const output of outputs) {
    logger.debug('Diacritic output processed', { file: output.file, state: output.state });
  }

  return { inputs: [paths.diacriticTable], outputs, count: records.length };
}
