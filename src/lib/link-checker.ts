import { join } from 'node:path';
import { readTextFile, scanFiles } from './file-scanner.js';

/**
 * Page file name -> ids defined on that page
 */
export type AnchorIndex = Map<string, Set<string>>;

/**
 * A cross-page link with a fragment, e.g. href="b.html#setup" found in a.html
 */
export interface LinkRecord {
  source: string;
  target: string;
  anchor: string;
}

export interface BrokenLink extends LinkRecord {
  /** Up to three ids on the target page sharing the anchor's leading token */
  candidates: string[];
}

export interface LinkCheckReport {
  total: number;
  ok: LinkRecord[];
  broken: BrokenLink[];
}

const MAX_CANDIDATES = 3;

/**
 * Every id="..." value in a page
 */
export function collectAnchorIds(html: string): Set<string> {
  const ids = new Set<string>();
  for (const match of html.matchAll(/id="([^"]+)"/g)) {
    ids.add(match[1]);
  }
  return ids;
}

/**
 * Links of the shape href="<page>.html#<anchor>"
 * Same-page "#anchor" links are not included
 */
export function extractAnchoredLinks(source: string, html: string): LinkRecord[] {
  const links: LinkRecord[] = [];
  for (const match of html.matchAll(/href="([^"#]+\.html)#([^"]+)"/g)) {
    links.push({ source, target: match[1], anchor: match[2] });
  }
  return links;
}

export function buildAnchorIndex(pages: ReadonlyMap<string, string>): AnchorIndex {
  const index: AnchorIndex = new Map();
  for (const [fileName, html] of pages) {
    index.set(fileName, collectAnchorIds(html));
  }
  return index;
}

/**
 * Best-effort hint for a broken link: target ids starting with the anchor's first token
 */
export function findCandidates(anchor: string, ids: ReadonlySet<string> | undefined): string[] {
  if (!ids) {
    return [];
  }
  const prefix = anchor.split('-')[0];
  return [...ids]
    .sort()
    .filter((id) => id.startsWith(prefix))
    .slice(0, MAX_CANDIDATES);
}

/**
 * Resolve every cross-page anchored link against the anchors of its target
 * The index covers all pages before any link is tested, so forward references resolve
 */
export function checkLinks(pages: ReadonlyMap<string, string>): LinkCheckReport {
  const index = buildAnchorIndex(pages);
  const ok: LinkRecord[] = [];
  const broken: BrokenLink[] = [];

  const sources = [...pages.keys()].sort();
  for (const source of sources) {
    for (const link of extractAnchoredLinks(source, pages.get(source) ?? '')) {
      const ids = index.get(link.target);
      if (ids?.has(link.anchor)) {
        ok.push(link);
      } else {
        broken.push({ ...link, candidates: findCandidates(link.anchor, ids) });
      }
    }
  }

  return { total: ok.length + broken.length, ok, broken };
}

/**
 * Read every generated page in a directory and check its anchored links
 */
export function checkDirectory(directory: string): LinkCheckReport {
  const pages = new Map<string, string>();
  for (const fileName of scanFiles(directory, '.html')) {
    pages.set(fileName, readTextFile(join(directory, fileName)));
  }
  return checkLinks(pages);
}
