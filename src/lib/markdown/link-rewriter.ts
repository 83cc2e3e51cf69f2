import { normalizeAnchor } from './anchors.js';

/**
 * Output page file name (e.g. "overview.html") -> canonical wiki URL
 */
export type PageUrlMap = ReadonlyMap<string, string>;

export interface CrossPageRewriteResult {
  html: string;
  /** hrefs that pointed at a page missing from the batch, in order of appearance */
  unresolved: string[];
}

const SOURCE_LINK = /href="([^"]+?)\.md(#[^"]*)?"/g;
const ANCHOR_ELEMENT = /<a\s+href="([^"]*)"[^>]*>([\s\S]*?)<\/a>/g;
const URL_SCHEME = /^[a-z][a-z0-9+.-]*:/i;

/**
 * Undo the percent-encoding marked applies to hrefs, so "my%20doc.html" finds "my doc.html"
 * Malformed escapes are looked up as written
 */
function decodeTarget(target: string): string {
  try {
    return decodeURIComponent(target);
  } catch (error) {
    if (error instanceof URIError) {
      return target;
    }
    throw error;
  }
}

/**
 * Retarget links from source documents to their generated pages
 *
 * href="guide.md#Step--One" becomes href="guide.html#Step-One"; the fragment
 * goes through normalizeAnchor so it matches the generated heading ids.
 */
export function rewriteSourceLinks(html: string): string {
  return html.replace(SOURCE_LINK, (_match, path: string, fragment: string | undefined) => {
    const anchor = fragment ? normalizeAnchor(fragment.slice(1)) : '';
    return anchor ? `href="${path}.html#${anchor}"` : `href="${path}.html"`;
  });
}

/**
 * Point links between pages at the wiki
 *
 * - Same-page anchors and links with a URL scheme are kept as-is
 * - Other links lose their fragment (the wiki does not deep-link across pages)
 *   and resolve through the page URL map by their decoded file name
 * - A page missing from the map is rendered as bold text so readers still see it
 */
export function rewriteCrossPageLinks(html: string, pageUrlMap: PageUrlMap): CrossPageRewriteResult {
  const unresolved: string[] = [];

  const rewritten = html.replace(ANCHOR_ELEMENT, (match, href: string, inner: string) => {
    if (href.startsWith('#') || URL_SCHEME.test(href)) {
      return match;
    }

    const target = href.split('#')[0].replace(/^\.\//, '');
    const url = pageUrlMap.get(decodeTarget(target));
    if (url) {
      return `<a href="${url}">${inner}</a>`;
    }

    unresolved.push(href);
    return `<strong>${inner}</strong>`;
  });

  return { html: rewritten, unresolved };
}
