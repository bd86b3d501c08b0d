import type { NpcStat } from './types.js';

/**
 * Structural role of one input line.
 */
export type ClassifiedLine =
  | { kind: 'divider' }
  | { kind: 'tableSeparator' }
  | { kind: 'heading'; level: number; title: string }
  | { kind: 'npcStatus'; npc: NpcStatusLine }
  | { kind: 'definitionItem'; term: string; description: string }
  | { kind: 'bulletItem'; text: string }
  | { kind: 'tableRow'; cells: string[] }
  | { kind: 'dialogue'; text: string }
  | { kind: 'blank' }
  | { kind: 'plain'; text: string };

export type LineKind = ClassifiedLine['kind'];

/** Neighbouring raw lines, used for table detection */
export interface LineContext {
  previous?: string;
  next?: string;
}

export interface NpcStatusLine {
  name: string;
  note?: string;
  stats: NpcStat[];
  /** The text between the parentheses */
  attributeList: string;
}

/**
 * Regex patterns for the scenario notation
 */

// A whole line of one repeated rule character, spaces allowed: "---", "- - -", "―――"
const DIVIDER_PATTERN = /^(?:=(?:\s*=){2,}|-(?:\s*-){2,}|\*(?:\s*\*){2,}|＝(?:\s*＝){2,}|―(?:\s*―){2,}|━(?:\s*━){2,})$/;

// Pipes, dashes, colons and spaces only: "|---|:--:|"
const TABLE_SEPARATOR_PATTERN = /^[|:\-\s]+$/;

// "# Title", "##探索", "#" (empty title is still a heading), but not "#hashtag"
const SYMBOL_HEADING_PATTERN = /^(#+)(?:$|\s+(.*)$|(\P{ASCII}.*)$)/u;

// "1. Title", "2-1.Title", "2-1-1. Title" but not "1.5倍"
const NUMBERED_HEADING_PATTERN = /^(\d+(?:-\d+)*)\.(?!\d)\s*(\S.*)$/;

// "Name (STR 12 CON 14 ...) note", with ASCII or full-width parentheses
const NPC_LINE_PATTERN = /^(.+?)\s*[（(]([^()（）]+)[)）]\s*(.*)$/;

// "STR 12", "HP:10", "SAN＝45"; a dice-valued entry such as "DB+1d4" is not a stat
export const NPC_STAT_PATTERN = /\b([A-Za-z]+)\s*[:：=＝]?\s*([+-]?\d+)(?![\dDd])/g;

/** Attributes that mark a parenthesised list as an NPC stat list */
export const NPC_ATTRIBUTES: readonly string[] = [
  'STR', 'CON', 'POW', 'DEX', 'APP', 'SIZ', 'INT', 'EDU', 'HP', 'MP', 'SAN'
];

const DEFINITION_PATTERN = /^◆\s*(.+)$/;
const BULLET_PATTERN = /^(?:・|[-*]\s)\s*(.+)$/;

/**
 * Parse a heading line, symbolic or numbered
 */
export function parseHeadingLine(line: string): { level: number; title: string; numbered: boolean } | null {
  const trimmed = line.trim();

  const symbolic = trimmed.match(SYMBOL_HEADING_PATTERN);
  if (symbolic) {
    const title = symbolic[2] ?? symbolic[3] ?? '';
    return { level: symbolic[1].length, title: title.trim(), numbered: false };
  }

  const numbered = trimmed.match(NUMBERED_HEADING_PATTERN);
  if (numbered) {
    // The number is part of the visible title
    return { level: numbered[1].split('-').length, title: trimmed, numbered: true };
  }

  return null;
}

/**
 * Parse every "ATTR value" pair of an attribute list, in source order
 */
export function parseNpcStats(attributeList: string): NpcStat[] {
  const stats: NpcStat[] = [];
  for (const match of attributeList.matchAll(NPC_STAT_PATTERN)) {
    stats.push({ attribute: match[1].toUpperCase(), value: parseInt(match[2], 10) });
  }
  return stats;
}

/**
 * Parse an NPC status line. Returns null unless the parenthesised list holds
 * at least one known attribute with a value.
 */
export function parseNpcStatusLine(line: string): NpcStatusLine | null {
  const match = line.trim().match(NPC_LINE_PATTERN);
  if (!match) return null;

  const attributeList = match[2];
  const stats = parseNpcStats(attributeList);
  if (!stats.some(stat => NPC_ATTRIBUTES.includes(stat.attribute))) {
    return null;
  }

  const note = match[3].trim();
  return {
    name: match[1].trim(),
    note: note || undefined,
    stats,
    attributeList
  };
}

export function isTableSeparator(line: string): boolean {
  const trimmed = line.trim();
  return trimmed.includes('|') && trimmed.includes('-') && TABLE_SEPARATOR_PATTERN.test(trimmed);
}

/**
 * Split a table row into trimmed cells. Outer pipes are optional and empty
 * inner cells are kept, so column counts stay comparable.
 */
export function splitTableCells(line: string): string[] {
  let body = line.trim();
  if (body.startsWith('|')) body = body.slice(1);
  if (body.endsWith('|')) body = body.slice(0, -1);
  return body.split('|').map(cell => cell.trim());
}

function isDivider(trimmed: string): boolean {
  return DIVIDER_PATTERN.test(trimmed);
}

function isTableRow(trimmed: string, context: LineContext): boolean {
  if (trimmed.startsWith('|')) return true;
  if (!trimmed.includes('|')) return false;
  return (context.previous ?? '').includes('|') || (context.next ?? '').includes('|');
}

/**
 * Classify one line. Patterns are tried in a fixed priority order:
 * divider, table separator, heading, NPC status, definition, bullet,
 * table row, dialogue, then plain text.
 */
export function classifyLine(line: string, context: LineContext = {}): ClassifiedLine {
  const trimmed = line.trim();
  if (!trimmed) {
    return { kind: 'blank' };
  }

  if (isDivider(trimmed)) {
    return { kind: 'divider' };
  }

  if (isTableSeparator(trimmed)) {
    return { kind: 'tableSeparator' };
  }

  const heading = parseHeadingLine(trimmed);
  if (heading) {
    return { kind: 'heading', level: heading.level, title: heading.title };
  }

  const npc = parseNpcStatusLine(trimmed);
  if (npc) {
    return { kind: 'npcStatus', npc };
  }

  const definition = trimmed.match(DEFINITION_PATTERN);
  if (definition) {
    const { term, description } = splitDefinition(definition[1]);
    return { kind: 'definitionItem', term, description };
  }

  const bullet = trimmed.match(BULLET_PATTERN);
  if (bullet) {
    return { kind: 'bulletItem', text: bullet[1].trim() };
  }

  if (isTableRow(trimmed, context)) {
    return { kind: 'tableRow', cells: splitTableCells(trimmed) };
  }

  if (trimmed.includes('「') || trimmed.includes('」')) {
    return { kind: 'dialogue', text: trimmed };
  }

  return { kind: 'plain', text: trimmed };
}

/**
 * Classify every line of a text, giving each its neighbours as context
 */
export function classifyLines(lines: string[]): ClassifiedLine[] {
  return lines.map((line, i) => classifyLine(line, {
    previous: i > 0 ? lines[i - 1] : undefined,
    next: i + 1 < lines.length ? lines[i + 1] : undefined
  }));
}

function splitDefinition(content: string): { term: string; description: string } {
  const fullWidth = content.indexOf('：');
  const ascii = content.indexOf(':');
  const candidates = [fullWidth, ascii].filter(index => index >= 0);
  if (candidates.length === 0) {
    return { term: content.trim(), description: '' };
  }
  const split = Math.min(...candidates);
  return {
    term: content.slice(0, split).trim(),
    description: content.slice(split + 1).trim()
  };
}
