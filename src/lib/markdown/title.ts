import type { ExportConfig } from '../config.js';

/**
 * Return the text of the first level-one heading, or the fallback
 */
export function extractTitle(markdown: string, fallback = 'Document'): string {
  const match = markdown.match(/^#[ \t]+(.+)$/m);
  const title = match?.[1]?.trim();
  return title ? title : fallback;
}

/**
 * Pick a page title: frontmatter "title" wins over the first H1
 */
export function resolveDocumentTitle(frontmatter: Record<string, unknown>, body: string, fallback: string): string {
  const declared = frontmatter.title;
  if (typeof declared === 'string' && declared.trim()) {
    return declared.trim();
  }
  return extractTitle(body, fallback);
}

/**
 * Percent-encode a title as a single path segment
 * Unlike encodeURIComponent, also encodes ! ' ( ) * so only A-Z a-z 0-9 - _ . ~ stay literal
 */
function encodePathSegment(text: string): string {
  return encodeURIComponent(text).replace(
    /[!'()*]/g,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`,
  );
}

/**
 * Build the wiki's display URL for a page title
 *
 * Uses the /wiki/display/{space}/{title} form, which the wiki resolves to the
 * live page once one with that title exists. Spaces are written as "+".
 *
 * @example
 * ```typescript
 * wikiPageUrl('A/B Design', { wikiBaseUrl: 'https://host', spaceKey: 'RAIL' });
 * // 'https://host/wiki/display/RAIL/A%2FB+Design'
 * ```
 */
export function wikiPageUrl(title: string, config: Pick<ExportConfig, 'wikiBaseUrl' | 'spaceKey'>): string {
  const slug = encodePathSegment(title).replace(/%20/g, '+');
  const base = config.wikiBaseUrl.replace(/\/+$/, '');
  return `${base}/wiki/display/${encodePathSegment(config.spaceKey)}/${slug}`;
}
