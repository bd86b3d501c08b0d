import { classifyLine, classifyLines, parseNpcStatusLine, NPC_STAT_PATTERN } from './classifier.js';
import { DICE_SOURCE, SAN_SOURCE, SKILL_SOURCE, parseSkillToken } from './inline.js';
import { splitLines } from './parser.js';
import { DEFAULT_SYSTEM, findSimilarSkill, isKnownSystem, standardSkills } from './skills.js';
import { ValidationEngine } from './validation.js';
import type { ConverterConfig } from './config.js';
import type { ValidationResult, ValidationUnit, Validator } from './validation.js';

const STANDARD_DICE_SIDES = [2, 3, 4, 6, 8, 10, 12, 20, 100];
const MAX_DICE_COUNT = 100;
const MAX_DICE_MODIFIER = 50;
const LARGE_DOCUMENT_CHARS = 500_000;

/** Attributes an NPC stat list is expected to carry */
export const EXPECTED_NPC_ATTRIBUTES: readonly string[] = ['STR', 'CON', 'POW', 'DEX', 'SIZ', 'INT', 'HP'];

// 【STR×5】, 【POW】, 【SANチェック】
const CHARACTERISTIC_ROLL_PATTERN = /^(?:STR|CON|POW|DEX|APP|SIZ|INT|EDU|SAN)(?:チェック)?(?:\s*[×xX*＊]\s*\d+)?$/;
// 【目星or聞き耳】, 【目星／聞き耳】
const ALTERNATIVE_SEPARATOR = /\s*(?:or|OR|／|\/)\s*/;
// Entries like "DB+1d4" that are dice-valued rather than stats
const DICE_VALUED_ENTRY = /\b[A-Za-z]+\s*[:：=＝]?\s*[+-]?\d*[dD]\d+(?:[+-]\d+)?/g;
const STAT_SEPARATORS = /[\s,、，・/／]+/g;

const FULLWIDTH_DICE_PATTERN = /([0-9０-９]+)([dDｄＤ])([0-9０-９]+)/g;
const FULLWIDTH_CHAR = /[０-９ｄＤ]/;
const SQUARE_BRACKET_PATTERN = /\[([^[\]\n]+)\]/g;

const BRACKET_PAIRS: ReadonlyArray<readonly [string, string]> = [
  ['【', '】'],
  ['『', '』'],
  ['「', '」']
];

/**
 * Known skill names for a config: the system's list plus custom skills
 */
export function skillDictionary(config: ConverterConfig): Set<string> {
  return new Set([...standardSkills(config.trpgSystem), ...config.customSkills]);
}

export class HeadingValidator implements Validator {
  readonly name = 'HeadingValidator';
  readonly unit: ValidationUnit = 'line';

  constructor(private readonly config: ConverterConfig) {}

  validate(text: string, lineNumber?: number): ValidationResult[] {
    const line = classifyLine(text);
    if (line.kind !== 'heading') return [];

    const results: ValidationResult[] = [];
    if (!line.title) {
      results.push({
        level: 'critical',
        message: '見出しが空です',
        suggestion: '見出しテキストを追加してください',
        lineNumber,
        code: 'HEADING_EMPTY'
      });
    } else if ([...line.title].length > this.config.headingMaxLength) {
      results.push({
        level: 'warning',
        message: `見出しが長すぎます（${this.config.headingMaxLength}文字以内推奨）`,
        suggestion: '簡潔な見出しに修正することを推奨します',
        lineNumber,
        code: 'HEADING_TOO_LONG'
      });
    }
    if (line.level > this.config.recommendedHeadingDepth) {
      results.push({
        level: 'info',
        message: `見出し階層が深すぎます（${this.config.recommendedHeadingDepth}階層まで推奨）`,
        suggestion: '構造を見直すことを検討してください',
        lineNumber,
        code: 'HEADING_TOO_DEEP'
      });
    }
    return results;
  }
}

/**
 * Headings must not skip a level on the way down. The document starts at level 0,
 * so a first heading deeper than 1 is flagged too.
 */
export class HeadingHierarchyValidator implements Validator {
  readonly name = 'HeadingHierarchyValidator';
  readonly unit: ValidationUnit = 'document';

  validate(text: string): ValidationResult[] {
    const results: ValidationResult[] = [];
    let previous = 0;
    splitLines(text).forEach((raw, i) => {
      const line = classifyLine(raw);
      if (line.kind !== 'heading') return;
      if (line.level > previous + 1) {
        results.push({
          level: 'warning',
          message: `見出し階層が飛んでいます（レベル${previous}の次にレベル${line.level}）`,
          suggestion: '段階的な見出し階層を推奨します',
          lineNumber: i + 1,
          code: 'HEADING_HIERARCHY'
        });
      }
      previous = line.level;
    });
    return results;
  }
}

export class SkillValidator implements Validator {
  readonly name = 'SkillValidator';
  readonly unit: ValidationUnit = 'line';
  private readonly skills: Set<string>;
  private readonly skillList: string[];

  constructor(config: ConverterConfig) {
    this.skills = skillDictionary(config);
    this.skillList = [...this.skills];
  }

  private isAccepted(name: string): boolean {
    return this.skills.has(name) || CHARACTERISTIC_ROLL_PATTERN.test(name);
  }

  validate(text: string, lineNumber?: number): ValidationResult[] {
    const results: ValidationResult[] = [];
    for (const match of text.matchAll(new RegExp(SKILL_SOURCE, 'g'))) {
      const inner = match[1];
      const alternatives = parseSkillToken(inner).name.split(ALTERNATIVE_SEPARATOR).filter(Boolean);
      const unknown = alternatives.find(name => !this.isAccepted(name));
      if (unknown === undefined) continue;

      const similar = findSimilarSkill(unknown, this.skillList);
      results.push({
        level: 'warning',
        message: `未知の技能名です: ${inner}`,
        suggestion: similar ? `【${similar}】でしょうか？` : '標準技能名を確認してください',
        lineNumber,
        column: (match.index ?? 0) + 1,
        ...(similar ? { proposedFix: `【${similar}】` } : {}),
        code: 'SKILL_UNKNOWN'
      });
    }
    return results;
  }
}

export class DiceValidator implements Validator {
  readonly name = 'DiceValidator';
  readonly unit: ValidationUnit = 'line';

  validate(text: string, lineNumber?: number): ValidationResult[] {
    const results: ValidationResult[] = [];
    for (const match of text.matchAll(new RegExp(DICE_SOURCE, 'g'))) {
      const count = parseInt(match[1], 10);
      const sides = parseInt(match[2], 10);
      const modifier = match[3] === undefined ? 0 : parseInt(match[3], 10);
      const at = { lineNumber, column: (match.index ?? 0) + 1 };

      if (count === 0) {
        results.push({
          level: 'warning',
          message: `ダイス数が0です: ${match[0]}`,
          suggestion: '1個以上のダイスを指定してください',
          ...at,
          code: 'DICE_COUNT_ZERO'
        });
      } else if (count > MAX_DICE_COUNT) {
        results.push({
          level: 'warning',
          message: `ダイス数が多すぎます: ${match[0]}`,
          suggestion: '現実的なダイス数に調整してください',
          ...at,
          code: 'DICE_COUNT_HIGH'
        });
      }
      if (!STANDARD_DICE_SIDES.includes(sides)) {
        results.push({
          level: 'info',
          message: `一般的でないダイス面数です: ${match[0]}`,
          suggestion: '標準的なダイス（d6, d10, d100等）の使用を推奨',
          ...at,
          code: 'DICE_SIDES_UNUSUAL'
        });
      }
      if (Math.abs(modifier) > MAX_DICE_MODIFIER) {
        results.push({
          level: 'warning',
          message: `修正値が大きすぎます: ${match[0]}`,
          suggestion: '適切な修正値に調整してください',
          ...at,
          code: 'DICE_MODIFIER_HIGH'
        });
      }
    }
    return results;
  }
}

/**
 * Largest value a SAN loss term can take: "3", "1d6", "2d6+1"
 */
export function maxSanLoss(term: string): number {
  const match = term.match(/^(\d+)(?:[dD](\d+))?([+-]\d+)?$/);
  if (!match) return 0;
  const base = match[2] === undefined
    ? parseInt(match[1], 10)
    : parseInt(match[1], 10) * parseInt(match[2], 10);
  return base + (match[3] === undefined ? 0 : parseInt(match[3], 10));
}

export class SanValidator implements Validator {
  readonly name = 'SanValidator';
  readonly unit: ValidationUnit = 'line';

  validate(text: string, lineNumber?: number): ValidationResult[] {
    const results: ValidationResult[] = [];
    for (const match of text.matchAll(new RegExp(SAN_SOURCE, 'g'))) {
      const [source, success, failure] = match;
      if (maxSanLoss(success) <= maxSanLoss(failure)) continue;

      const prefix = source.slice(0, source.length - success.length - failure.length - 1);
      results.push({
        level: 'warning',
        message: `成功時のSAN減少が失敗時より大きくなっています: ${source}`,
        suggestion: '「成功時/失敗時」の順で記述してください',
        lineNumber,
        column: (match.index ?? 0) + 1,
        proposedFix: `${prefix}${failure}/${success}`,
        code: 'SAN_INVERTED'
      });
    }
    return results;
  }
}

/**
 * Column counts of every table, read the way the assembler reads them.
 * A blank line keeps a table open. A separator right after a row promotes
 * that row to the header of a new table.
 */
export class TableValidator implements Validator {
  readonly name = 'TableValidator';
  readonly unit: ValidationUnit = 'document';

  validate(text: string): ValidationResult[] {
    const results: ValidationResult[] = [];
    const lines = classifyLines(splitLines(text));

    let headerColumns: number | null = null;
    let previousRow: number | null = null;
    let tableStart: number | null = null;
    let headerlessRows = 0;
    let inNpc = false;

    const endTable = () => {
      if (tableStart !== null && headerColumns === null && headerlessRows >= 2) {
        results.push({
          level: 'info',
          message: '表に見出し行がありません',
          suggestion: '1行目の下に区切り行（|---|---|）を追加すると見出し行になります',
          lineNumber: tableStart,
          code: 'TABLE_NO_HEADER'
        });
      }
      headerColumns = null;
      previousRow = null;
      tableStart = null;
      headerlessRows = 0;
    };

    lines.forEach((line, i) => {
      const lineNo = i + 1;
      switch (line.kind) {
        case 'blank':
          previousRow = null;
          inNpc = false;
          return;

        case 'tableSeparator':
          inNpc = false;
          if (previousRow !== null && headerColumns === null) {
            // Rows above the promoted one stay a table of their own
            const header = previousRow;
            headerlessRows--;
            endTable();
            headerColumns = header;
            tableStart = lineNo - 1;
          } else if (tableStart === null) {
            tableStart = lineNo;
          }
          previousRow = null;
          return;

        case 'tableRow': {
          if (inNpc) return;
          if (tableStart === null) tableStart = lineNo;
          const columns = line.cells.length;
          if (headerColumns === null) {
            headerlessRows++;
          } else if (columns !== headerColumns) {
            results.push({
              level: 'warning',
              message: `表の列数が見出し行と一致しません（見出し${headerColumns}列、この行${columns}列）`,
              suggestion: '列数を見出し行に揃えてください',
              lineNumber: lineNo,
              code: 'TABLE_COLUMN_MISMATCH'
            });
          }
          previousRow = columns;
          return;
        }

        case 'npcStatus':
          endTable();
          inNpc = true;
          return;

        case 'heading':
        case 'divider':
          endTable();
          inNpc = false;
          return;

        default:
          endTable();
      }
    });
    endTable();

    return results;
  }
}

export class NpcValidator implements Validator {
  readonly name = 'NpcValidator';
  readonly unit: ValidationUnit = 'line';

  validate(text: string, lineNumber?: number): ValidationResult[] {
    const npc = parseNpcStatusLine(text);
    if (!npc) return [];

    const results: ValidationResult[] = [];
    const present = new Set(npc.stats.map(stat => stat.attribute));
    const missing = EXPECTED_NPC_ATTRIBUTES.filter(attribute => !present.has(attribute));
    if (missing.length > 0) {
      results.push({
        level: 'warning',
        message: `NPC「${npc.name}」に能力値がありません: ${missing.join(', ')}`,
        suggestion: `${missing.join('、')}を追加してください`,
        lineNumber,
        code: 'NPC_MISSING_ATTRIBUTE'
      });
    }

    const leftover = npc.attributeList
      .replace(NPC_STAT_PATTERN, ' ')
      .replace(DICE_VALUED_ENTRY, ' ')
      .replace(STAT_SEPARATORS, ' ')
      .trim();
    if (leftover) {
      results.push({
        level: 'warning',
        message: `NPC「${npc.name}」の能力値に読み取れない記述があります: ${leftover}`,
        suggestion: '「STR 12 CON 14」の形式で記述してください',
        lineNumber,
        code: 'NPC_STATS_MALFORMED'
      });
    }
    return results;
  }
}

function positionIn(text: string, index: number, firstLine: number): { lineNumber: number; column: number } {
  const before = text.slice(0, index);
  const newlines = before.split('\n').length - 1;
  return {
    lineNumber: firstLine + newlines,
    column: index - (before.lastIndexOf('\n') + 1) + 1
  };
}

/**
 * Unbalanced 【】『』「」 inside a block. Dialogue may span lines, so the
 * whole block is scanned at once.
 */
export class BracketValidator implements Validator {
  readonly name = 'BracketValidator';
  readonly unit: ValidationUnit = 'block';

  validate(text: string, lineNumber = 1): ValidationResult[] {
    const results: ValidationResult[] = [];

    for (const [open, close] of BRACKET_PAIRS) {
      const openings: number[] = [];
      for (let i = 0; i < text.length; i++) {
        if (text[i] === open) {
          openings.push(i);
        } else if (text[i] === close) {
          if (openings.pop() === undefined) {
            results.push({
              level: 'warning',
              message: `対応する${open}のない${close}があります`,
              suggestion: `${open}を追加するか${close}を削除してください`,
              ...positionIn(text, i, lineNumber),
              code: 'BRACKET_UNOPENED'
            });
          }
        }
      }
      for (const index of openings) {
        results.push({
          level: 'warning',
          message: `${open}が閉じられていません`,
          suggestion: `${close}を追加してください`,
          ...positionIn(text, index, lineNumber),
          code: 'BRACKET_UNCLOSED'
        });
      }
    }
    return results;
  }
}

export class DocumentValidator implements Validator {
  readonly name = 'DocumentValidator';
  readonly unit: ValidationUnit = 'document';

  validate(text: string): ValidationResult[] {
    if (!text.trim()) {
      return [{
        level: 'warning',
        message: 'ドキュメントが空です',
        suggestion: 'シナリオ本文を入力してください',
        code: 'DOCUMENT_EMPTY'
      }];
    }
    if (text.length > LARGE_DOCUMENT_CHARS) {
      return [{
        level: 'info',
        message: `ドキュメントが大きすぎます（${text.length}文字）`,
        suggestion: 'シナリオを分割することを検討してください',
        code: 'DOCUMENT_LARGE'
      }];
    }
    return [];
  }
}

/**
 * Hints for common notation slips. Registered in beginner mode only.
 */
export class NotationHintValidator implements Validator {
  readonly name = 'NotationHintValidator';
  readonly unit: ValidationUnit = 'line';
  private readonly skills: Set<string>;

  constructor(config: ConverterConfig) {
    this.skills = skillDictionary(config);
  }

  validate(text: string, lineNumber?: number): ValidationResult[] {
    const results: ValidationResult[] = [];

    for (const match of text.matchAll(SQUARE_BRACKET_PATTERN)) {
      const { name } = parseSkillToken(match[1]);
      if (!this.skills.has(name)) continue;
      const fix = `【${match[1]}】`;
      results.push({
        level: 'suggestion',
        message: `技能は【】で囲みます: ${match[0]}`,
        suggestion: `${fix}と記述してください`,
        lineNumber,
        column: (match.index ?? 0) + 1,
        proposedFix: fix,
        code: 'HINT_SKILL_BRACKET'
      });
    }

    for (const match of text.matchAll(FULLWIDTH_DICE_PATTERN)) {
      if (!FULLWIDTH_CHAR.test(match[0])) continue;
      const fix = `${match[1].normalize('NFKC')}d${match[3].normalize('NFKC')}`;
      results.push({
        level: 'suggestion',
        message: `ダイス記法に全角文字が使われています: ${match[0]}`,
        suggestion: `${fix}と半角で記述してください`,
        lineNumber,
        column: (match.index ?? 0) + 1,
        proposedFix: fix,
        code: 'HINT_FULLWIDTH_DICE'
      });
    }
    return results;
  }
}

/**
 * Engine with the built-in validators registered for a config
 */
export function createValidationEngine(config: ConverterConfig): ValidationEngine {
  if (!isKnownSystem(config.trpgSystem)) {
    console.warn(`Unknown TRPG system "${config.trpgSystem}", using ${DEFAULT_SYSTEM} skills`);
  }

  const engine = new ValidationEngine()
    .register(new HeadingValidator(config))
    .register(new HeadingHierarchyValidator())
    .register(new SkillValidator(config))
    .register(new DiceValidator())
    .register(new SanValidator())
    .register(new TableValidator())
    .register(new NpcValidator())
    .register(new BracketValidator())
    .register(new DocumentValidator());

  if (config.beginnerMode) {
    engine.register(new NotationHintValidator(config));
  }
  return engine;
}
