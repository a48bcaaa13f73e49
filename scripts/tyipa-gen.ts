#!/usr/bin/env node
import { cac } from 'cac';
import { ALL_TARGETS, generateCommand, type GenerateOptions } from '../src/cli/commands/generate.js';
import { previewCommand } from '../src/cli/commands/preview.js';
import { handleError } from '../src/cli/utils/error-handler.js';

function wrapAction<Args extends unknown[]>(fn: (...args: Args) => Promise<void> | void) {
  return async (...args: Args): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      handleError(error);
    }
  };
}

function toGenerateOptions(options: Record<string, unknown>): GenerateOptions {
  const result: GenerateOptions = {};
  if (typeof options.root === 'string') {
    result.root = options.root;
  }
  if (options.check === true) {
    result.check = true;
  }
  return result;
}

async function main(): Promise<void> {
  const cli = cac('tyipa-gen');

  cli.option('--root <dir>', '包根目录（默认 TYIPA_GEN_ROOT 或当前目录）');

  cli
    .command('[target]', '生成全部文件（等同于 all）')
    .option('--check', '只检查生成文件是否最新，不写入', { default: false })
    .action(
      wrapAction((target: string | undefined, options: Record<string, unknown>) => {
        if (target !== undefined && target !== 'all') {
          throw new Error(`Unknown command: ${target}`);
        }
        generateCommand(ALL_TARGETS, toGenerateOptions(options));
      })
    );

  cli
    .command('diacritics', '由 src/_diacritics.csv 生成变音符号函数与手册列表')
    .option('--check', '只检查生成文件是否最新，不写入', { default: false })
    .action(
      wrapAction((options: Record<string, unknown>) => {
        generateCommand(['diacritics'], toGenerateOptions(options));
      })
    );

  cli
    .command('sym-dict', '由 src/sym.typ 生成符号字典')
    .option('--check', '只检查生成文件是否最新，不写入', { default: false })
    .action(
      wrapAction((options: Record<string, unknown>) => {
        generateCommand(['sym-dict'], toGenerateOptions(options));
      })
    );

  cli
    .command('preview <name> <text>', '预览变音符号函数作用于 text 的结果')
    .action(
      wrapAction((name: string, text: string, options: Record<string, unknown>) => {
        const root = typeof options.root === 'string' ? options.root : undefined;
        previewCommand(name, text, { root });
      })
    );

  cli.help();
  cli.parse(process.argv, { run: false });
  await cli.runMatchedCommand();
}

main().catch(handleError);
