/**
 * Collapse hyphen runs in an anchor slug and trim hyphens from both ends
 *
 * Source documents write their table-of-contents links with GitHub-style slugs,
 * where an em-dash, arrow or slash between words leaves "--" or "---" behind.
 * The heading ids we generate never contain such runs, so every fragment that
 * points at a heading must pass through here.
 *
 * @example
 * ```typescript
 * normalizeAnchor('step-1--parse---validate'); // 'step-1-parse-validate'
 * normalizeAnchor('-lead-trail-'); // 'lead-trail'
 * ```
 */
export function normalizeAnchor(anchor: string): string {
  return anchor.replace(/-{2,}/g, '-').replace(/^-+|-+$/g, '');
}

/**
 * Heading text to element id
 * Accents are folded to ASCII; other punctuation is dropped. Output is always
 * a fixed point of normalizeAnchor
 */
export function slugifyHeading(text: string): string {
  const folded = text
    .trim()
    .toLowerCase()
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, ''); // "Café" -> "cafe"

  const words = folded.replace(/[^\w\s-]/g, '').split(/[\s-]+/);
  return words.filter((word) => word.length > 0).join('-');
}

/**
 * Hands out unique heading ids within one page
 * A repeated slug gets "_1", "_2", ... appended in order of appearance
 */
export class HeadingIdAllocator {
  private used = new Set<string>();

  allocate(text: string): string {
    const slug = slugifyHeading(text) || 'section';
    let id = slug;
    let counter = 1;
    while (this.used.has(id)) {
      id = `${slug}_${counter}`;
      counter++;
    }
    this.used.add(id);
    return id;
  }
}
