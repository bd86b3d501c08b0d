/**
 * Generate a URL-fragment slug from heading text. Letters and digits of any
 * script are kept; everything else except spaces and hyphens is dropped.
 */
export function slugify(text: string): string {
  return text
    .normalize('NFKC')
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s-]/gu, '') // Remove punctuation and symbols
    .replace(/\s+/g, '-')              // Replace spaces with hyphens
    .replace(/-+/g, '-')               // Collapse multiple hyphens
    .replace(/^-|-$/g, '');
}

const FALLBACK_SLUG = 'section';

/**
 * Hands out unique anchors for one conversion. Repeated slugs get "-2",
 * "-3", ... in order of appearance.
 */
export class AnchorRegistry {
  private readonly used = new Set<string>();
  private readonly counters = new Map<string, number>();

  next(title: string): string {
    const base = slugify(title) || FALLBACK_SLUG;
    let anchor = base;
    if (this.used.has(anchor)) {
      let n = this.counters.get(base) ?? 1;
      do {
        n++;
        anchor = `${base}-${n}`;
      } while (this.used.has(anchor));
      this.counters.set(base, n);
    }
    this.used.add(anchor);
    return anchor;
  }
}
