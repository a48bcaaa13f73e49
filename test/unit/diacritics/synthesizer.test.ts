import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  aliasesOf,
  isTiedSegmentation,
  renderAlias,
  renderCodeSectionHead,
  renderDiacriticDefinition,
  renderDiacriticFunction,
} from '../../../src/diacritics/synthesizer.js';
import { TestFactories } from '../../helpers/test-factories.js';

function letBindings(source: string): string[] {
  return source.split('\n').filter(line => line.startsWith('#let '));
}

describe('isTiedSegmentation', () => {
  it('仅 segmentation 组且名称以 tied- 开头时为真', () => {
    assert.equal(isTiedSegmentation(TestFactories.createTiedRecord()), true);
    assert.equal(isTiedSegmentation(TestFactories.createTiedRecord({ generatedName: 'syllabic' })), false);
    assert.equal(isTiedSegmentation(TestFactories.createTiedRecord({ group: 'tone' })), false);
    assert.equal(isTiedSegmentation(TestFactories.createTiedRecord({ group: 'Segmentation' })), false);
  });
});

describe('renderDiacriticFunction', () => {
  it('默认形态逐字素簇追加变音符号', () => {
    const source = renderDiacriticFunction(TestFactories.createRecord());
    assert.equal(
      source,
      [
        "/// Apply the 'voiceless' diacritic to `base`.",
        '/// ',
        '/// Adds the following diacritic to `base`:',
        '/// / IPA name: Voiceless',
        '/// / IPA description: voiceless',
        '/// / Unicode name: COMBINING RING BELOW',
        '/// / Unicode hex: `0x0325`',
        '/// / TyIPA name: voiceless',
        '/// / TyIPA alias(es): devoiced',
        '/// ',
        '/// -> str',
        '#let voiceless(',
        '  /// The character(s) to which the diacritic should be added.',
        '  /// -> str | symbol',
        '  base',
        ') = {',
        '  let modified = ()',
        '  for chr in str(base) {',
        '    modified.push(chr + "\\u{0325}")',
        '  }',
        '  modified.join("")',
        '}',
        '',
        '',
      ].join('\n')
    );
  });

  it('tied 形态包含类型与长度两个断言', () => {
    const source = renderDiacriticFunction(TestFactories.createTiedRecord());
    const lines = source.split('\n');
    assert.ok(lines.includes('    type(base) == str,'));
    assert.ok(
      lines.includes(
        '    message: "tied-above() expects argument of type `str`, `" + str(type(base)) + "` given"'
      )
    );
    assert.ok(lines.includes('  let parts = base.split("")'));
    assert.ok(lines.includes('    parts.len() == 4,'));
    assert.ok(
      lines.includes(
        '    message: "tied-above() expects argument of length 2, " + str(parts.len() - 2) + " given"'
      )
    );
    assert.ok(lines.includes('  parts.at(1) + "\\u{0361}" + parts.at(2)'));
    assert.ok(lines.includes('  /// -> str | symbol'));
    assert.equal(lines.includes('  /// -> str'), false);
    assert.equal(lines.includes('  let modified = ()'), false);
  });

  it('无别名时标注 (none)', () => {
    const source = renderDiacriticFunction(TestFactories.createRecord({ aliasNames: '' }));
    assert.ok(source.split('\n').includes('/// / TyIPA alias(es): (none)'));
  });
});

describe('aliases', () => {
  it('renderAlias 直接绑定原函数', () => {
    assert.equal(renderAlias('voiceless', 'devoiced'), '/// Alias for `voiceless`.\n#let devoiced = voiceless\n\n');
  });

  it('每个别名产生一个绑定', () => {
    const record = TestFactories.createRecord({ aliasNames: 'devoiced unvoiced' });
    assert.deepEqual(aliasesOf(record), ['devoiced', 'unvoiced']);
    assert.deepEqual(letBindings(renderDiacriticDefinition(record)), [
      '#let voiceless(',
      '#let devoiced = voiceless',
      '#let unvoiced = voiceless',
    ]);
  });

  it('连续空格不产生空别名', () => {
    assert.deepEqual(aliasesOf(TestFactories.createRecord({ aliasNames: 'a  b ' })), ['a', 'b']);
    assert.deepEqual(aliasesOf(TestFactories.createRecord({ aliasNames: '' })), []);
  });
});

describe('renderCodeSectionHead', () => {
  it('渲染首字母大写的分节注释', () => {
    assert.equal(renderCodeSectionHead('phonation'), '/*** Phonation diacritics***/\n\n');
    assert.equal(renderCodeSectionHead('TONE'), '/*** Tone diacritics***/\n\n');
  });
});
