import type {
  Block,
  DefinitionItem,
  HeadingBlock,
  NpcStatusBlock,
  ScenarioDocument
} from './types.js';
import { classifyLines, ClassifiedLine, NpcStatusLine } from './classifier.js';
import { transformInline } from './inline.js';
import { AnchorRegistry } from './anchors.js';
import { RenderError } from './errors.js';

// Leading list marker inside an NPC block: "・技能: ..." reads as "技能: ..."
const NPC_MARKER_PATTERN = /^(?:・|◆|[-*]\s)\s*/;
const NPC_SKILL_PATTERN = /^(?:技能|スキル)\s*[:：]\s*(.*)$/;
const NPC_EQUIPMENT_PATTERN = /^(?:装備|所持品|武器)\s*[:：]\s*(.*)$/;
const NPC_ATTACK_PATTERN = /^(?:攻撃手段|攻撃)\s*[:：]\s*(.*)$/;
const NPC_ATTACK_HINT_PATTERN = /噛みつき|爪|ダメージ|\d+[dD]\d+/;

/**
 * Normalize line endings and drop a byte order mark
 */
export function splitLines(content: string): string[] {
  return content
    .replace(/^\uFEFF/, '')
    .replace(/\r\n/g, '\n')
    .replace(/\r/g, '\n')
    .split('\n');
}

/**
 * Sort one line of an NPC block into its field
 */
function addNpcDetail(npc: NpcStatusBlock, text: string): void {
  const line = text.replace(NPC_MARKER_PATTERN, '').trim();
  let match: RegExpMatchArray | null;

  if (line.startsWith('【')) {
    npc.skills.push(line);
  } else if ((match = line.match(NPC_SKILL_PATTERN))) {
    npc.skills.push(match[1].trim());
  } else if ((match = line.match(NPC_EQUIPMENT_PATTERN))) {
    npc.equipment.push(match[1].trim());
  } else if ((match = line.match(NPC_ATTACK_PATTERN))) {
    npc.attacks.push(match[1].trim());
  } else if (NPC_ATTACK_HINT_PATTERN.test(line)) {
    npc.attacks.push(line);
  } else {
    npc.other.push(line);
  }
}

function lineText(classified: ClassifiedLine, raw: string): string {
  switch (classified.kind) {
    case 'plain':
    case 'dialogue':
      return classified.text;
    default:
      return raw.trim();
  }
}

/**
 * Assemble a scenario text into a block tree.
 *
 * Single pass over the classified lines. Headings open nested sections;
 * tables, lists and NPC blocks are collected until their run ends.
 * Irregular input never throws here: open structures are closed with what
 * was collected and the validators report the problem.
 */
export function parseScenario(content: string): ScenarioDocument {
  const lines = splitLines(content);
  const classified = classifyLines(lines);
  const anchors = new AnchorRegistry();
  const root: Block[] = [];

  // Open sections, outermost first
  const sections: HeadingBlock[] = [];

  let paragraph: { lines: string[]; dialogue: boolean; line: number } | null = null;
  let table: { header: string[]; rows: string[][]; line: number; lastWasRow: boolean } | null = null;
  let definitions: { items: DefinitionItem[]; line: number } | null = null;
  let bullets: { items: string[]; line: number } | null = null;
  let npc: NpcStatusBlock | null = null;

  function append(block: Block) {
    const parent = sections[sections.length - 1];
    if (parent) {
      parent.children.push(block);
    } else {
      root.push(block);
    }
  }

  function flushParagraph() {
    if (!paragraph) return;
    const runs = transformInline(paragraph.lines.join('\n'));
    append(paragraph.dialogue
      ? { type: 'dialogue', runs, line: paragraph.line }
      : { type: 'paragraph', runs, line: paragraph.line });
    paragraph = null;
  }

  function flushTable() {
    if (!table) return;
    if (table.header.length > 0 || table.rows.length > 0) {
      append({ type: 'table', header: table.header, rows: table.rows, line: table.line });
    }
    table = null;
  }

  function flushDefinitions() {
    if (!definitions) return;
    append({ type: 'definitions', items: definitions.items, line: definitions.line });
    definitions = null;
  }

  function flushBullets() {
    if (!bullets) return;
    append({ type: 'bullets', items: bullets.items, line: bullets.line });
    bullets = null;
  }

  function flushNpc() {
    if (!npc) return;
    append(npc);
    npc = null;
  }

  function flushAll() {
    flushParagraph();
    flushTable();
    flushDefinitions();
    flushBullets();
    flushNpc();
  }

  function openSection(level: number, title: string, lineNum: number) {
    if (level < 1) {
      throw new RenderError(`Heading level ${level} at line ${lineNum} is below 1`);
    }
    // Close sections at the same level or deeper
    while (sections.length > 0 && sections[sections.length - 1].level >= level) {
      sections.pop();
    }
    const heading: HeadingBlock = {
      type: 'heading',
      level,
      title,
      anchor: anchors.next(title),
      line: lineNum,
      children: []
    };
    append(heading);
    sections.push(heading);
  }

  function createNpc(status: NpcStatusLine, lineNum: number): NpcStatusBlock {
    return {
      type: 'npc',
      name: status.name,
      note: status.note,
      stats: status.stats,
      skills: [],
      equipment: [],
      attacks: [],
      other: [],
      line: lineNum
    };
  }

  for (let i = 0; i < lines.length; i++) {
    const line = classified[i];
    const lineNum = i + 1;

    switch (line.kind) {
      case 'heading':
        flushAll();
        openSection(line.level, line.title, lineNum);
        continue;

      case 'divider':
        flushAll();
        append({ type: 'divider', line: lineNum });
        continue;

      case 'npcStatus':
        flushAll();
        npc = createNpc(line.npc, lineNum);
        continue;

      case 'blank':
        flushParagraph();
        flushNpc();
        if (table) table.lastWasRow = false;
        continue;

      case 'tableSeparator':
        flushParagraph();
        flushDefinitions();
        flushBullets();
        flushNpc();
        if (table && table.lastWasRow && table.header.length === 0) {
          // Promote the row just above to the header of a new table
          const header: string[] = table.rows.pop() ?? [];
          const headerLine = lineNum - 1;
          flushTable();
          table = { header, rows: [], line: headerLine, lastWasRow: false };
        } else if (!table) {
          table = { header: [], rows: [], line: lineNum, lastWasRow: false };
        }
        continue;
    }

    if (npc) {
      addNpcDetail(npc, lineText(line, lines[i]));
      continue;
    }

    switch (line.kind) {
      case 'tableRow':
        flushParagraph();
        flushDefinitions();
        flushBullets();
        if (!table) {
          table = { header: [], rows: [], line: lineNum, lastWasRow: false };
        }
        table.rows.push(line.cells);
        table.lastWasRow = true;
        break;

      case 'definitionItem':
        flushParagraph();
        flushTable();
        flushBullets();
        if (!definitions) {
          definitions = { items: [], line: lineNum };
        }
        definitions.items.push({ term: line.term, description: line.description });
        break;

      case 'bulletItem':
        flushParagraph();
        flushTable();
        flushDefinitions();
        if (!bullets) {
          bullets = { items: [], line: lineNum };
        }
        bullets.items.push(line.text);
        break;

      case 'plain':
      case 'dialogue':
        flushTable();
        flushDefinitions();
        flushBullets();
        if (!paragraph) {
          paragraph = { lines: [], dialogue: false, line: lineNum };
        }
        paragraph.lines.push(line.text);
        if (line.kind === 'dialogue') {
          paragraph.dialogue = true;
        }
        break;
    }
  }

  flushAll();

  return { blocks: root };
}

/**
 * Visit every block depth-first, in document order
 */
export function walkBlocks(blocks: Block[], visit: (block: Block) => void): void {
  for (const block of blocks) {
    visit(block);
    if (block.type === 'heading') {
      walkBlocks(block.children, visit);
    }
  }
}
