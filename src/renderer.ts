import { RenderError } from './errors.js';
import { transformInline } from './inline.js';
import { VALIDATION_LEVELS } from './validation.js';
import type { ConverterConfig } from './config.js';
import type { Block, InlineRun, NpcStatusBlock, ScenarioDocument, TableBlock, TocEntry } from './types.js';
import type { ValidationLevel, ValidationReport, ValidationResult } from './validation.js';

/**
 * Labels shown for each severity in the validation block
 */
const LEVEL_LABELS: Record<ValidationLevel, string> = {
  critical: '重大エラー',
  warning: '警告',
  info: '情報',
  suggestion: '提案'
};

const VALIDATION_TITLE = '記法チェック結果';

/**
 * Escape text for element content and attribute values
 */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

// Escaped, with line breaks kept
function escapeText(text: string): string {
  return escapeHtml(text).replace(/\n/g, '<br>');
}

function unreachable(value: never, what: string): never {
  throw new RenderError(`Unknown ${what}: ${JSON.stringify(value)}`);
}

function symbolClass(run: Extract<InlineRun, { kind: 'symbol' }>): string {
  switch (run.tone) {
    case 'success': return 'coc-symbol coc-result-success';
    case 'failure': return 'coc-symbol coc-result-failure';
    case 'handout': return 'coc-symbol coc-handout';
    case 'plain': return 'coc-symbol';
    default: return unreachable(run.tone, 'symbol tone');
  }
}

function span(className: string, source: string): string {
  return `<span class="${className}">${escapeText(source)}</span>`;
}

export function renderRun(run: InlineRun): string {
  switch (run.kind) {
    case 'text': return escapeText(run.source);
    case 'skill': return span('coc-skill', run.source);
    case 'item': return span('coc-item', run.source);
    case 'dice': return span('coc-dice', run.source);
    case 'san': return span('coc-san', run.source);
    case 'dialogue': return span('dialogue', run.source);
    case 'symbol': return span(symbolClass(run), run.source);
    default: return unreachable(run, 'inline run');
  }
}

export function renderRuns(runs: InlineRun[]): string {
  return runs.map(renderRun).join('');
}

// Cells and list items carry inline notation too
function renderInline(text: string): string {
  return renderRuns(transformInline(text));
}

function renderTable(table: TableBlock): string {
  const parts = ['<table class="scenario-table">'];
  if (table.header.length > 0) {
    parts.push('<thead>');
    parts.push(`<tr>${table.header.map(cell => `<th>${renderInline(cell)}</th>`).join('')}</tr>`);
    parts.push('</thead>');
  }
  if (table.rows.length > 0) {
    parts.push('<tbody>');
    for (const row of table.rows) {
      parts.push(`<tr>${row.map(cell => `<td>${renderInline(cell)}</td>`).join('')}</tr>`);
    }
    parts.push('</tbody>');
  }
  parts.push('</table>');
  return parts.join('\n');
}

function renderNpc(npc: NpcStatusBlock): string {
  const parts = ['<div class="npc-status-block">'];
  parts.push(`<div class="npc-name">${escapeHtml(npc.name)}</div>`);
  if (npc.note) {
    parts.push(`<div class="npc-note">${renderInline(npc.note)}</div>`);
  }
  const stats = npc.stats
    .map(stat => `<span class="npc-stat">${escapeHtml(stat.attribute)} ${stat.value}</span>`)
    .join(' ');
  parts.push(`<div class="npc-stats coc-npc-status">${stats}</div>`);
  if (npc.skills.length > 0) {
    parts.push(`<div class="npc-skills"><strong>技能:</strong> ${npc.skills.map(renderInline).join('、')}</div>`);
  }
  if (npc.equipment.length > 0) {
    parts.push(`<div class="npc-equipment"><strong>装備:</strong> ${npc.equipment.map(renderInline).join('、')}</div>`);
  }
  for (const attack of npc.attacks) {
    parts.push(`<div class="npc-attacks"><strong>攻撃:</strong> ${renderInline(attack)}</div>`);
  }
  for (const line of npc.other) {
    parts.push(`<div class="npc-other">${renderInline(line)}</div>`);
  }
  parts.push('</div>');
  return parts.join('\n');
}

export function renderBlock(block: Block): string {
  switch (block.type) {
    case 'heading': {
      // HTML stops at h6; deeper headings keep their nesting in the TOC
      const tag = `h${Math.min(block.level, 6)}`;
      const heading = `<${tag} id="${escapeHtml(block.anchor)}">${escapeHtml(block.title)}</${tag}>`;
      return [heading, ...block.children.map(renderBlock)].join('\n');
    }
    case 'paragraph':
      return `<p>${renderRuns(block.runs)}</p>`;
    case 'dialogue':
      return `<p class="dialogue-paragraph">${renderRuns(block.runs)}</p>`;
    case 'table':
      return renderTable(block);
    case 'definitions': {
      const items = block.items.map(item => item.description
        ? `<dt>${renderInline(item.term)}</dt>\n<dd>${renderInline(item.description)}</dd>`
        : `<dt>${renderInline(item.term)}</dt>`);
      return ['<dl class="scenario-definitions">', ...items, '</dl>'].join('\n');
    }
    case 'bullets': {
      const items = block.items.map(item => `<li>${renderInline(item)}</li>`);
      return ['<ul class="scenario-bullets">', ...items, '</ul>'].join('\n');
    }
    case 'npc':
      return renderNpc(block);
    case 'divider':
      return '<hr class="section-divider">';
    default:
      return unreachable(block, 'block');
  }
}

function renderTocList(entries: TocEntry[]): string {
  const items = entries.map(entry => {
    const link = `<a href="#${escapeHtml(entry.anchor)}">${escapeHtml(entry.title)}</a>`;
    const nested = entry.children.length > 0 ? `\n${renderTocList(entry.children)}\n` : '';
    return `<li class="toc-level-${entry.level}">${link}${nested}</li>`;
  });
  return ['<ul class="toc-list">', ...items, '</ul>'].join('\n');
}

export function renderToc(toc: TocEntry[], title: string): string {
  return [
    '<nav class="table-of-contents">',
    `<h2 class="toc-title">${escapeHtml(title)}</h2>`,
    renderTocList(toc),
    '</nav>'
  ].join('\n');
}

function renderValidationItem(result: ValidationResult): string {
  const where = result.lineNumber !== undefined ? `${result.lineNumber}行目: ` : '';
  const parts = [`<div class="validation-item ${result.level}">`];
  parts.push(`<div class="validation-message">${escapeHtml(where + result.message)}</div>`);
  if (result.suggestion) {
    parts.push(`<div class="validation-suggestion">${escapeHtml(result.suggestion)}</div>`);
  }
  if (result.proposedFix) {
    parts.push(`<div class="validation-fix">修正案: ${escapeHtml(result.proposedFix)}</div>`);
  }
  parts.push('</div>');
  return parts.join('\n');
}

/**
 * Summary counts first, then one group per level that has results
 */
export function renderValidationReport(report: ValidationReport): string {
  const parts = ['<div class="validation-report">', `<h2 class="validation-title">${VALIDATION_TITLE}</h2>`];
  for (const level of VALIDATION_LEVELS) {
    parts.push(`<div class="validation-summary ${level}">${LEVEL_LABELS[level]}: ${report.summary[level]}件</div>`);
  }
  for (const level of VALIDATION_LEVELS) {
    const results = report.byLevel(level);
    if (results.length === 0) continue;
    parts.push(`<div class="validation-group ${level}">`);
    parts.push(`<h3>${LEVEL_LABELS[level]}</h3>`);
    parts.push(...results.map(renderValidationItem));
    parts.push('</div>');
  }
  parts.push('</div>');
  return parts.join('\n');
}

/**
 * Render a whole HTML page: TOC, body blocks, then the validation report.
 * Output depends only on the arguments.
 */
export function renderHtml(
  document: ScenarioDocument,
  toc: TocEntry[],
  report: ValidationReport | null,
  config: ConverterConfig,
  stylesheet: string
): string {
  const body: string[] = [];
  if (config.includeToc && toc.length > 0) {
    body.push(renderToc(toc, config.tocTitle));
  }
  body.push(...document.blocks.map(renderBlock));
  if (report) {
    body.push(renderValidationReport(report));
  }

  return [
    '<!DOCTYPE html>',
    '<html lang="ja">',
    '<head>',
    '<meta charset="UTF-8">',
    '<meta name="viewport" content="width=device-width, initial-scale=1.0">',
    `<title>${escapeHtml(config.htmlTitle)}</title>`,
    '<style>',
    stylesheet.trimEnd(),
    '</style>',
    '</head>',
    '<body>',
    '<div class="container">',
    ...body,
    '</div>',
    '</body>',
    '</html>',
    ''
  ].join('\n');
}
