import * as test from 'node:test';
import * as assert from 'node:assert';
import { parseSkillToken, runsToSource, symbolTone, transformInline } from '../inline.js';

const { describe, it } = test;

describe('transformInline', () => {

  it('should recognize skill checks', () => {
    assert.deepStrictEqual(transformInline('【目星】で調べる'), [
      { kind: 'skill', source: '【目星】', name: '目星' },
      { kind: 'text', source: 'で調べる' }
    ]);
  });

  it('should read a skill modifier', () => {
    assert.deepStrictEqual(transformInline('【図書館-20】'), [
      { kind: 'skill', source: '【図書館-20】', name: '図書館', modifier: -20 }
    ]);
  });

  it('should recognize items', () => {
    assert.deepStrictEqual(transformInline('『古びた日記』'), [
      { kind: 'item', source: '『古びた日記』', name: '古びた日記' }
    ]);
  });

  it('should recognize dice with and without a modifier', () => {
    assert.deepStrictEqual(transformInline('1d6'), [
      { kind: 'dice', source: '1d6', count: 1, sides: 6 }
    ]);
    assert.deepStrictEqual(transformInline('ダメージ2D6+3'), [
      { kind: 'text', source: 'ダメージ' },
      { kind: 'dice', source: '2D6+3', count: 2, sides: 6, modifier: 3 }
    ]);
  });

  it('should read 1d6+1d4 as two dice', () => {
    assert.deepStrictEqual(transformInline('1d6+1d4'), [
      { kind: 'dice', source: '1d6', count: 1, sides: 6 },
      { kind: 'text', source: '+' },
      { kind: 'dice', source: '1d4', count: 1, sides: 4 }
    ]);
  });

  it('should leave zero-count and one-sided dice as text', () => {
    assert.deepStrictEqual(transformInline('0d6'), [{ kind: 'text', source: '0d6' }]);
    assert.deepStrictEqual(transformInline('1d1'), [{ kind: 'text', source: '1d1' }]);
  });

  it('should not start a dice expression inside a number', () => {
    assert.deepStrictEqual(transformInline('x21d6'), [
      { kind: 'text', source: 'x' },
      { kind: 'dice', source: '21d6', count: 21, sides: 6 }
    ]);
  });

  it('should recognize sanity loss', () => {
    assert.deepStrictEqual(transformInline('SANc1/1d6'), [
      { kind: 'san', source: 'SANc1/1d6', success: '1', failure: '1d6' }
    ]);
    assert.deepStrictEqual(transformInline('SAN0/1d3+1'), [
      { kind: 'san', source: 'SAN0/1d3+1', success: '0', failure: '1d3+1' }
    ]);
  });

  it('should recognize dialogue quotes', () => {
    assert.deepStrictEqual(transformInline('彼は「待て」と言った'), [
      { kind: 'text', source: '彼は' },
      { kind: 'dialogue', source: '「待て」', text: '待て' },
      { kind: 'text', source: 'と言った' }
    ]);
  });

  it('should let dialogue span lines', () => {
    assert.deepStrictEqual(transformInline('「一行目\n二行目」'), [
      { kind: 'dialogue', source: '「一行目\n二行目」', text: '一行目\n二行目' }
    ]);
  });

  it('should give symbols a tone', () => {
    assert.deepStrictEqual(transformInline('〈成功〉《ファンブル》[HO1]［メモ］'), [
      { kind: 'symbol', source: '〈成功〉', text: '成功', tone: 'success' },
      { kind: 'symbol', source: '《ファンブル》', text: 'ファンブル', tone: 'failure' },
      { kind: 'symbol', source: '[HO1]', text: 'HO1', tone: 'handout' },
      { kind: 'symbol', source: '［メモ］', text: 'メモ', tone: 'plain' }
    ]);
  });

  it('should leave empty brackets as text', () => {
    assert.deepStrictEqual(transformInline('【】[]'), [{ kind: 'text', source: '【】[]' }]);
  });

  it('should keep characters outside the basic plane whole', () => {
    assert.deepStrictEqual(transformInline('𠮷1d6'), [
      { kind: 'text', source: '𠮷' },
      { kind: 'dice', source: '1d6', count: 1, sides: 6 }
    ]);
  });

  it('should reproduce the input from the run sources', () => {
    const samples = [
      '探索者は【目星】に成功すると『手帳』を見つける。SANc0/1d3、ダメージ1d6+1。',
      '「ここはどこだ？」〈失敗〉なら [資料2] を渡す',
      '【未完の括弧 1d 2d0 SAN/ 「閉じない',
      ''
    ];
    for (const sample of samples) {
      assert.strictEqual(runsToSource(transformInline(sample)), sample);
    }
  });
});

describe('inline helpers', () => {

  it('should split skill modifiers', () => {
    assert.deepStrictEqual(parseSkillToken('目星 +10'), { name: '目星', modifier: 10 });
    assert.deepStrictEqual(parseSkillToken('聞き耳'), { name: '聞き耳' });
    assert.deepStrictEqual(parseSkillToken('-20'), { name: '-20' });
  });

  it('should map result words to tones', () => {
    assert.strictEqual(symbolTone('決定的成功'), 'success');
    assert.strictEqual(symbolTone('致命的失敗'), 'failure');
    assert.strictEqual(symbolTone('ハンドアウト1'), 'handout');
    assert.strictEqual(symbolTone('場所'), 'plain');
  });
});
