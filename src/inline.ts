import type { InlineRun, SymbolTone } from './types.js';

/**
 * Dice expression body: count, sides, optional signed modifier.
 * A modifier directly followed by another die ("1d6+1d4") is left alone so
 * the second term is read as its own expression.
 */
export const DICE_SOURCE = String.raw`(?<!\d)(\d+)[dD](\d+)(?:([+-]\d+)(?![\d]|[dD]\d))?`;

const DICE_TERM = String.raw`\d+(?:[dD]\d+)?(?:[+-]\d+)?`;

/**
 * SAN loss body: "SANc1/1d6", "SAN0/1d3", "SANc1d3/1d10+1"
 */
export const SAN_SOURCE = String.raw`SAN[cC]?(${DICE_TERM})\/(${DICE_TERM})`;

export const SKILL_SOURCE = String.raw`【([^【】\n]+)】`;

interface InlinePattern {
  regex: RegExp;
  /** Build a run from a match, or null to reject it */
  build: (match: RegExpExecArray) => InlineRun | null;
}

const SUCCESS_WORDS = ['成功', '決定的成功', 'クリティカル', 'スペシャル'];
const FAILURE_WORDS = ['失敗', '致命的失敗', 'ファンブル'];
const HANDOUT_PATTERN = /^(?:ハンドアウト|資料|HO)/;

// Non-empty bracket notation without a dedicated mechanic
const SYMBOL_SOURCE = String.raw`〈[^〈〉\n]+〉|《[^《》\n]+》|〔[^〔〕\n]+〕|［[^［］\n]+］|\[[^[\]\n]+\]`;

/**
 * Split "name-20" / "name+10" into a name and a modifier
 */
export function parseSkillToken(inner: string): { name: string; modifier?: number } {
  const match = inner.match(/^(.*?)\s*([+-]\d+)$/);
  if (match && match[1].trim()) {
    return { name: match[1].trim(), modifier: parseInt(match[2], 10) };
  }
  return { name: inner.trim() };
}

export function symbolTone(text: string): SymbolTone {
  const inner = text.trim();
  if (SUCCESS_WORDS.includes(inner)) return 'success';
  if (FAILURE_WORDS.includes(inner)) return 'failure';
  if (HANDOUT_PATTERN.test(inner)) return 'handout';
  return 'plain';
}

/**
 * Inline patterns in priority order. At each position the longest match
 * wins; equal lengths go to the earlier pattern.
 */
const INLINE_PATTERNS: InlinePattern[] = [
  {
    regex: new RegExp(SKILL_SOURCE, 'y'),
    build: match => ({ kind: 'skill', source: match[0], ...parseSkillToken(match[1]) })
  },
  {
    regex: /『([^『』\n]+)』/y,
    build: match => ({ kind: 'item', source: match[0], name: match[1] })
  },
  {
    regex: new RegExp(DICE_SOURCE, 'y'),
    build: match => {
      const count = parseInt(match[1], 10);
      const sides = parseInt(match[2], 10);
      if (count < 1 || sides < 2) return null;
      return match[3] === undefined
        ? { kind: 'dice', source: match[0], count, sides }
        : { kind: 'dice', source: match[0], count, sides, modifier: parseInt(match[3], 10) };
    }
  },
  {
    regex: new RegExp(SAN_SOURCE, 'y'),
    build: match => ({ kind: 'san', source: match[0], success: match[1], failure: match[2] })
  },
  {
    regex: /「([^」]+)」/y,
    build: match => ({ kind: 'dialogue', source: match[0], text: match[1] })
  },
  {
    regex: new RegExp(SYMBOL_SOURCE, 'y'),
    build: match => {
      const text = match[0].slice(1, -1);
      return { kind: 'symbol', source: match[0], text, tone: symbolTone(text) };
    }
  }
];

function longestMatchAt(text: string, position: number): InlineRun | null {
  let best: InlineRun | null = null;
  for (const { regex, build } of INLINE_PATTERNS) {
    regex.lastIndex = position;
    const match = regex.exec(text);
    if (!match || match[0].length === 0) continue;
    if (best && match[0].length <= best.source.length) continue;
    const run = build(match);
    if (run) {
      best = run;
    }
  }
  return best;
}

/**
 * Tokenize paragraph text into inline runs, left to right.
 * Characters not covered by any notation are merged into text runs.
 */
export function transformInline(text: string): InlineRun[] {
  const runs: InlineRun[] = [];
  let plain = '';
  let position = 0;

  while (position < text.length) {
    const run = longestMatchAt(text, position);
    if (run) {
      if (plain) {
        runs.push({ kind: 'text', source: plain });
        plain = '';
      }
      runs.push(run);
      position += run.source.length;
      continue;
    }
    const codePoint = text.codePointAt(position) ?? 0;
    const width = codePoint > 0xffff ? 2 : 1;
    plain += text.slice(position, position + width);
    position += width;
  }

  if (plain) {
    runs.push({ kind: 'text', source: plain });
  }
  return runs;
}

/**
 * Join the verbatim spans of a run list
 */
export function runsToSource(runs: InlineRun[]): string {
  return runs.map(run => run.source).join('');
}
