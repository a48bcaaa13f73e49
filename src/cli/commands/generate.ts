import { relative } from 'node:path';
import { generateDiacritics } from '../../diacritics/generator.js';
import { DiagnosticBuilder, DiagnosticCode } from '../../diagnostics/diagnostics.js';
import { generateSymbolDictionary } from '../../symbols/generator.js';
import type { GenerationMode, GenerationReport, GeneratorContext, OutputStatus } from '../../types.js';
import { createGeneratorContext } from '../context.js';
import { detail, info, success, warn } from '../utils/logger.js';

export type GeneratorTarget = 'diacritics' | 'sym-dict';

export const ALL_TARGETS: readonly GeneratorTarget[] = ['diacritics', 'sym-dict'];

export interface GenerateOptions {
  root?: string;
  check?: boolean;
  /** 测试中注入固定时间 */
  now?: Date;
}

const TARGET_LABELS: Record<GeneratorTarget, string> = {
  diacritics: 'diacritic definitions',
  'sym-dict': 'symbol definitions',
};

function runTarget(target: GeneratorTarget, ctx: GeneratorContext, mode: GenerationMode): GenerationReport {
  switch (target) {
    case 'diacritics':
      return generateDiacritics(ctx, mode);
    case 'sym-dict':
      return generateSymbolDictionary(ctx, mode);
  }
}

function reportOutput(ctx: GeneratorContext, output: OutputStatus): void {
  const file = relative(ctx.root, output.file);
  switch (output.state) {
    case 'written':
      success(`Wrote ${file}`);
      break;
    case 'up-to-date':
      success(`${file} is up to date`);
      break;
    case 'stale':
      warn(`${file} is out of date`);
      break;
    case 'missing':
      warn(`${file} has not been generated`);
      break;
  }
}

/**
 * 依次运行各生成器；check 模式下只比对不写入，存在过期文件时报错。
 */
export function generateCommand(targets: readonly GeneratorTarget[], options: GenerateOptions = {}): void {
  const ctx = createGeneratorContext(options.root, options.now);
  const mode: GenerationMode = options.check ? 'check' : 'write';
  const stale: string[] = [];

  for (const target of targets) {
    const report = runTarget(target, ctx, mode);
    for (const input of report.inputs) {
      info(`Read ${relative(ctx.root, input)}`);
    }
    detail(`${report.count} ${TARGET_LABELS[target]} found`);
    for (const output of report.outputs) {
      reportOutput(ctx, output);
      if (output.state === 'stale' || output.state === 'missing') {
        stale.push(relative(ctx.root, output.file));
      }
    }
  }

  if (stale.length > 0) {
    DiagnosticBuilder.error(DiagnosticCode.G001_StaleOutput)
      .withMessage(`Generated files are out of date: ${stale.join(', ')}`)
      .at(ctx.root)
      .throw();
  }
}
