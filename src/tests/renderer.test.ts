import * as test from 'node:test';
import * as assert from 'node:assert';
import { DEFAULT_CONFIG, deriveConfig } from '../config.js';
import { parseScenario } from '../parser.js';
import { escapeHtml, renderBlock, renderHtml, renderRun, renderToc, renderValidationReport } from '../renderer.js';
import { buildToc } from '../toc.js';
import { ValidationReport } from '../validation.js';
import type { Block } from '../types.js';

const { describe, it } = test;

function renderText(content: string): string {
  return parseScenario(content).blocks.map(renderBlock).join('\n');
}

describe('escapeHtml', () => {

  it('should escape markup characters and quotes', () => {
    assert.strictEqual(escapeHtml(`<a href="x">'&'</a>`), '&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;');
  });
});

describe('renderRun', () => {

  it('should wrap notation in classed spans', () => {
    assert.strictEqual(renderRun({ kind: 'dice', source: '1d6', count: 1, sides: 6 }), '<span class="coc-dice">1d6</span>');
    assert.strictEqual(renderRun({ kind: 'skill', source: '【目星】', name: '目星' }), '<span class="coc-skill">【目星】</span>');
    assert.strictEqual(renderRun({ kind: 'item', source: '『鍵』', name: '鍵' }), '<span class="coc-item">『鍵』</span>');
    assert.strictEqual(
      renderRun({ kind: 'san', source: 'SANc0/1', success: '0', failure: '1' }),
      '<span class="coc-san">SANc0/1</span>'
    );
  });

  it('should pick the symbol class from its tone', () => {
    assert.strictEqual(
      renderRun({ kind: 'symbol', source: '〈成功〉', text: '成功', tone: 'success' }),
      '<span class="coc-symbol coc-result-success">〈成功〉</span>'
    );
    assert.strictEqual(
      renderRun({ kind: 'symbol', source: '[HO1]', text: 'HO1', tone: 'handout' }),
      '<span class="coc-symbol coc-handout">[HO1]</span>'
    );
  });

  it('should escape text and keep line breaks', () => {
    assert.strictEqual(renderRun({ kind: 'text', source: 'a<b\nc' }), 'a&lt;b<br>c');
    assert.strictEqual(
      renderRun({ kind: 'dialogue', source: '「上\n下」', text: '上\n下' }),
      '<span class="dialogue">「上<br>下」</span>'
    );
  });
});

describe('renderBlock', () => {

  it('should render a heading with its anchor and children', () => {
    assert.strictEqual(renderText('# 導入\n本文'), '<h1 id="導入">導入</h1>\n<p>本文</p>');
  });

  it('should cap heading tags at h6', () => {
    const block: Block = { type: 'heading', level: 8, title: '深い', anchor: 'deep', line: 1, children: [] };
    assert.strictEqual(renderBlock(block), '<h6 id="deep">深い</h6>');
  });

  it('should mark dialogue paragraphs', () => {
    assert.strictEqual(
      renderText('「待て」'),
      '<p class="dialogue-paragraph"><span class="dialogue">「待て」</span></p>'
    );
  });

  it('should render a table with a header and inline notation in cells', () => {
    assert.strictEqual(renderText('| 技能 | 結果 |\n|---|---|\n| 【目星】 | 1d6 |'), [
      '<table class="scenario-table">',
      '<thead>',
      '<tr><th>技能</th><th>結果</th></tr>',
      '</thead>',
      '<tbody>',
      '<tr><td><span class="coc-skill">【目星】</span></td><td><span class="coc-dice">1d6</span></td></tr>',
      '</tbody>',
      '</table>'
    ].join('\n'));
  });

  it('should omit thead from a header-less table', () => {
    assert.strictEqual(renderText('| a | b |\n| c | d |'), [
      '<table class="scenario-table">',
      '<tbody>',
      '<tr><td>a</td><td>b</td></tr>',
      '<tr><td>c</td><td>d</td></tr>',
      '</tbody>',
      '</table>'
    ].join('\n'));
  });

  it('should render definition and bullet lists', () => {
    assert.strictEqual(renderText('◆場所：図書館\n◆メモ\n\n・鍵'), [
      '<dl class="scenario-definitions">',
      '<dt>場所</dt>',
      '<dd>図書館</dd>',
      '<dt>メモ</dt>',
      '</dl>',
      '<ul class="scenario-bullets">',
      '<li>鍵</li>',
      '</ul>'
    ].join('\n'));
  });

  it('should render an NPC block', () => {
    const html = renderText('老人 (STR 8 POW 15) 図書館の管理人\n技能：【図書館】80%\n攻撃: 杖 1d3');
    assert.strictEqual(html, [
      '<div class="npc-status-block">',
      '<div class="npc-name">老人</div>',
      '<div class="npc-note">図書館の管理人</div>',
      '<div class="npc-stats coc-npc-status"><span class="npc-stat">STR 8</span> <span class="npc-stat">POW 15</span></div>',
      '<div class="npc-skills"><strong>技能:</strong> <span class="coc-skill">【図書館】</span>80%</div>',
      '<div class="npc-attacks"><strong>攻撃:</strong> 杖 <span class="coc-dice">1d3</span></div>',
      '</div>'
    ].join('\n'));
  });

  it('should render dividers', () => {
    assert.strictEqual(renderText('***'), '<hr class="section-divider">');
  });
});

describe('renderToc', () => {

  it('should nest entries and link their anchors', () => {
    const toc = buildToc(parseScenario('# A\n## B'));
    assert.strictEqual(renderToc(toc, '目次'), [
      '<nav class="table-of-contents">',
      '<h2 class="toc-title">目次</h2>',
      '<ul class="toc-list">',
      '<li class="toc-level-1"><a href="#a">A</a>',
      '<ul class="toc-list">',
      '<li class="toc-level-2"><a href="#b">B</a></li>',
      '</ul>',
      '</li>',
      '</ul>',
      '</nav>'
    ].join('\n'));
  });
});

describe('renderValidationReport', () => {

  it('should summarise every level and group the results', () => {
    const report = new ValidationReport([
      { level: 'warning', message: '未知の技能名です: 目だま', suggestion: '【目星】でしょうか？', lineNumber: 3, proposedFix: '【目星】' },
      { level: 'info', message: '<注意>' }
    ]);
    assert.strictEqual(renderValidationReport(report), [
      '<div class="validation-report">',
      '<h2 class="validation-title">記法チェック結果</h2>',
      '<div class="validation-summary critical">重大エラー: 0件</div>',
      '<div class="validation-summary warning">警告: 1件</div>',
      '<div class="validation-summary info">情報: 1件</div>',
      '<div class="validation-summary suggestion">提案: 0件</div>',
      '<div class="validation-group warning">',
      '<h3>警告</h3>',
      '<div class="validation-item warning">',
      '<div class="validation-message">3行目: 未知の技能名です: 目だま</div>',
      '<div class="validation-suggestion">【目星】でしょうか？</div>',
      '<div class="validation-fix">修正案: 【目星】</div>',
      '</div>',
      '</div>',
      '<div class="validation-group info">',
      '<h3>情報</h3>',
      '<div class="validation-item info">',
      '<div class="validation-message">&lt;注意&gt;</div>',
      '</div>',
      '</div>',
      '</div>'
    ].join('\n'));
  });
});

describe('renderHtml', () => {

  it('should lay out a complete page', () => {
    const document = parseScenario('# A');
    const html = renderHtml(document, buildToc(document), null, DEFAULT_CONFIG, 'body { margin: 0; }\n');
    assert.strictEqual(html, [
      '<!DOCTYPE html>',
      '<html lang="ja">',
      '<head>',
      '<meta charset="UTF-8">',
      '<meta name="viewport" content="width=device-width, initial-scale=1.0">',
      '<title>TRPGシナリオ</title>',
      '<style>',
      'body { margin: 0; }',
      '</style>',
      '</head>',
      '<body>',
      '<div class="container">',
      '<nav class="table-of-contents">',
      '<h2 class="toc-title">目次</h2>',
      '<ul class="toc-list">',
      '<li class="toc-level-1"><a href="#a">A</a></li>',
      '</ul>',
      '</nav>',
      '<h1 id="a">A</h1>',
      '</div>',
      '</body>',
      '</html>',
      ''
    ].join('\n'));
  });

  it('should leave out the TOC when disabled or empty', () => {
    const config = deriveConfig(DEFAULT_CONFIG, { includeToc: false, htmlTitle: 'R&D' });
    const document = parseScenario('# A');
    const html = renderHtml(document, buildToc(document), null, config, '');
    assert.strictEqual(html.includes('table-of-contents'), false);
    assert.ok(html.includes('<title>R&amp;D</title>'));

    const plain = renderHtml(parseScenario('本文'), [], null, DEFAULT_CONFIG, '');
    assert.strictEqual(plain.includes('table-of-contents'), false);
  });

  it('should end with the validation report when one is given', () => {
    const html = renderHtml(parseScenario('本文'), [], new ValidationReport([]), DEFAULT_CONFIG, '');
    const body = html.slice(html.indexOf('<div class="container">'), html.indexOf('</body>'));
    assert.ok(body.includes('<p>本文</p>\n<div class="validation-report">'));
  });
});
