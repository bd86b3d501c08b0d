/**
 * Inline runs produced from paragraph text.
 * Every run keeps its verbatim `source` span, so joining the sources of a
 * run list gives back the original text.
 */
export type InlineRun =
  | { kind: 'text'; source: string }
  | { kind: 'skill'; source: string; name: string; modifier?: number }
  | { kind: 'item'; source: string; name: string }
  | { kind: 'dice'; source: string; count: number; sides: number; modifier?: number }
  | { kind: 'san'; source: string; success: string; failure: string }
  | { kind: 'dialogue'; source: string; text: string }
  | { kind: 'symbol'; source: string; text: string; tone: SymbolTone };

/** Styling hint for bracket notation that is not a game mechanic */
export type SymbolTone = 'plain' | 'success' | 'failure' | 'handout';

export interface NpcStat {
  attribute: string;
  value: number;
}

export interface DefinitionItem {
  term: string;
  description: string;
}

/**
 * A section heading. Blocks that follow it (up to the next heading of the
 * same or a shallower level) are its children.
 */
export interface HeadingBlock {
  type: 'heading';
  level: number;
  title: string;
  /** Unique within one document */
  anchor: string;
  line: number;
  children: Block[];
}

export interface ParagraphBlock {
  type: 'paragraph';
  runs: InlineRun[];
  line: number;
}

export interface DialogueParagraphBlock {
  type: 'dialogue';
  runs: InlineRun[];
  line: number;
}

export interface TableBlock {
  type: 'table';
  /** Empty when the table had no separator row */
  header: string[];
  rows: string[][];
  line: number;
}

export interface DefinitionListBlock {
  type: 'definitions';
  items: DefinitionItem[];
  line: number;
}

export interface BulletListBlock {
  type: 'bullets';
  items: string[];
  line: number;
}

export interface NpcStatusBlock {
  type: 'npc';
  name: string;
  note?: string;
  /** Attribute/value pairs in source order */
  stats: NpcStat[];
  skills: string[];
  equipment: string[];
  attacks: string[];
  other: string[];
  line: number;
}

export interface DividerBlock {
  type: 'divider';
  line: number;
}

export type Block =
  | HeadingBlock
  | ParagraphBlock
  | DialogueParagraphBlock
  | TableBlock
  | DefinitionListBlock
  | BulletListBlock
  | NpcStatusBlock
  | DividerBlock;

/**
 * Result of assembling one scenario text.
 */
export interface ScenarioDocument {
  blocks: Block[];
}

/**
 * A table of contents entry, nested the same way as the headings.
 */
export interface TocEntry {
  level: number;
  title: string;
  anchor: string;
  children: TocEntry[];
}
