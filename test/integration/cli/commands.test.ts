import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import path from 'node:path';
import { ALL_TARGETS, generateCommand } from '../../../src/cli/commands/generate.js';
import { previewCommand } from '../../../src/cli/commands/preview.js';
import { DiagnosticCode, DiagnosticError } from '../../../src/diagnostics/diagnostics.js';
import { FIXED_NOW, copyFixturePackage } from '../../helpers/test-factories.js';

const ANSI = /\u001B\[\d+m/g;

describe('CLI 命令', { concurrency: false }, () => {
  let fixture: { root: string; cleanup: () => void };
  let originalLog: typeof console.log;
  let originalWarn: typeof console.warn;
  let logs: string[];
  let warnings: string[];

  beforeEach(() => {
    fixture = copyFixturePackage();
    logs = [];
    warnings = [];
    originalLog = console.log;
    originalWarn = console.warn;
    console.log = (message?: unknown) => {
      logs.push(String(message ?? '').replace(ANSI, ''));
    };
    console.warn = (message?: unknown) => {
      warnings.push(String(message ?? '').replace(ANSI, ''));
    };
  });

  afterEach(() => {
    console.log = originalLog;
    console.warn = originalWarn;
    fixture.cleanup();
  });

  it('generate 写出三个生成文件并报告', () => {
    generateCommand(ALL_TARGETS, { root: fixture.root, now: FIXED_NOW });

    for (const file of ['src/_diacritics.typ', 'manual/_list-diacritics.typ', 'src/_sym-dict.typ']) {
      assert.ok(fs.existsSync(path.join(fixture.root, file)), `${file} 应存在`);
    }
    assert.deepEqual(logs, [
      `ℹ Read ${path.join('src', '_diacritics.csv')}`,
      '  6 diacritic definitions found',
      `✓ Wrote ${path.join('src', '_diacritics.typ')}`,
      `✓ Wrote ${path.join('manual', '_list-diacritics.typ')}`,
      `ℹ Read ${path.join('src', 'sym.typ')}`,
      '  3 symbol definitions found',
      `✓ Wrote ${path.join('src', '_sym-dict.typ')}`,
    ]);
  });

  it('--check 在生成后通过，输入变化后报 G001', () => {
    generateCommand(ALL_TARGETS, { root: fixture.root, now: FIXED_NOW });
    // 时间戳不同也视为最新
    generateCommand(['sym-dict'], { root: fixture.root, check: true, now: new Date(2030, 0, 1) });
    assert.equal(warnings.length, 0);

    fs.appendFileSync(path.join(fixture.root, 'src', 'sym.typ'), '#let ash = symbol(\n  "æ",\n)\n');
    assert.throws(
      () => generateCommand(['sym-dict'], { root: fixture.root, check: true, now: FIXED_NOW }),
      (error: unknown) => {
        assert.ok(error instanceof DiagnosticError);
        assert.equal(error.code, DiagnosticCode.G001_StaleOutput);
        assert.equal(error.message, `Generated files are out of date: ${path.join('src', '_sym-dict.typ')}`);
        return true;
      }
    );
    assert.deepEqual(warnings, [`⚠ ${path.join('src', '_sym-dict.typ')} is out of date`]);
  });

  it('--check 不写入缺失的文件', () => {
    assert.throws(
      () => generateCommand(['diacritics'], { root: fixture.root, check: true }),
      (error: unknown) => error instanceof DiagnosticError && error.code === DiagnosticCode.G001_StaleOutput
    );
    assert.equal(fs.existsSync(path.join(fixture.root, 'src', '_diacritics.typ')), false);
    assert.equal(warnings.length, 2);
  });

  it('preview 按别名查找并打印结果', () => {
    assert.equal(previewCommand('tie', 'ts', { root: fixture.root }), 't\u0361s');
    assert.equal(previewCommand('voiceless', 'n', { root: fixture.root }), 'n\u0325');
    assert.deepEqual(logs, ['t\u0361s', 'n\u0325']);
  });

  it('preview 对未知名称报 G002', () => {
    assert.throws(
      () => previewCommand('nope', 'a', { root: fixture.root }),
      (error: unknown) => error instanceof DiagnosticError && error.code === DiagnosticCode.G002_UnknownDiacritic
    );
  });
});
