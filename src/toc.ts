import type { Block, ScenarioDocument, TocEntry } from './types.js';

function collect(blocks: Block[]): TocEntry[] {
  const entries: TocEntry[] = [];
  for (const block of blocks) {
    if (block.type !== 'heading') continue;
    entries.push({
      level: block.level,
      title: block.title,
      anchor: block.anchor,
      children: collect(block.children)
    });
  }
  return entries;
}

/**
 * Build the table of contents from the heading tree.
 * Anchors are the ones the parser assigned.
 */
export function buildToc(document: ScenarioDocument): TocEntry[] {
  return collect(document.blocks);
}

/**
 * Flatten a TOC tree into document order
 */
export function flattenToc(entries: TocEntry[]): TocEntry[] {
  return entries.flatMap(entry => [entry, ...flattenToc(entry.children)]);
}
