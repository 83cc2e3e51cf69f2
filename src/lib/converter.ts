import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import type { ExportConfig, MarkdownFeature } from './config.js';
import { FileSystemError } from './errors.js';
import { readTextFile, scanFiles } from './file-scanner.js';
import {
  extractDiagrams,
  renderMarkdown,
  renderWithFallback,
  resolveDocumentTitle,
  restoreDiagrams,
  rewriteCrossPageLinks,
  rewriteSourceLinks,
  splitFrontmatter,
  wikiPageUrl,
  type MarkdownRenderFn,
  type PageUrlMap,
} from './markdown/index.js';
import { renderPage } from './page-template.js';

export const SOURCE_EXTENSION = '.md';
export const OUTPUT_EXTENSION = '.html';

/**
 * One Markdown file of the batch, read once and never modified
 */
export interface SourceDocument {
  /** File stem, e.g. "overview" for overview.md */
  name: string;
  fileName: string;
  title: string;
  /** Markdown without frontmatter */
  body: string;
  warnings: string[];
}

export interface OutputPage {
  fileName: string;
  title: string;
  html: string;
  diagramCount: number;
  /** Feature set the body was finally rendered with */
  features: readonly MarkdownFeature[];
  usedFallback: boolean;
  warnings: string[];
}

export interface ConversionHooks {
  onPageUrlMap?: (pageUrlMap: PageUrlMap) => void;
  onPageWritten?: (document: SourceDocument, page: OutputPage) => void;
}

export interface ConversionReport {
  sourceDir: string;
  outputDir: string;
  pageUrlMap: PageUrlMap;
  pages: OutputPage[];
}

export function outputFileName(document: Pick<SourceDocument, 'name'>): string {
  return `${document.name}${OUTPUT_EXTENSION}`;
}

/**
 * Build a SourceDocument from a file's text
 */
export function parseSourceDocument(fileName: string, text: string, fallbackTitle: string): SourceDocument {
  const { frontmatter, content, warning } = splitFrontmatter(text, fileName);
  return {
    name: fileName.endsWith(SOURCE_EXTENSION) ? fileName.slice(0, -SOURCE_EXTENSION.length) : fileName,
    fileName,
    title: resolveDocumentTitle(frontmatter, content, fallbackTitle),
    body: content,
    warnings: warning ? [warning] : [],
  };
}

/**
 * Read every Markdown file directly inside a directory
 */
export function readDocuments(directory: string, fallbackTitle: string): SourceDocument[] {
  return scanFiles(directory, SOURCE_EXTENSION).map((fileName) =>
    parseSourceDocument(fileName, readTextFile(join(directory, fileName)), fallbackTitle),
  );
}

/**
 * Map each output page name to its wiki URL
 * Built from the whole batch before any document is converted, since links may point forward
 */
export function buildPageUrlMap(
  documents: readonly SourceDocument[],
  config: Pick<ExportConfig, 'wikiBaseUrl' | 'spaceKey'>,
): PageUrlMap {
  const mapping = new Map<string, string>();
  for (const document of documents) {
    mapping.set(outputFileName(document), wikiPageUrl(document.title, config));
  }
  return mapping;
}

/**
 * Convert one document into a standalone page
 *
 * Diagram extraction runs before rendering and re-insertion right after it,
 * so marked sees neither diagram source nor the image markup. Link rewriting
 * runs last, on the final body.
 */
export function convertDocument(
  document: SourceDocument,
  pageUrlMap: PageUrlMap,
  config: ExportConfig,
  render: MarkdownRenderFn = renderMarkdown,
): OutputPage {
  const { markdown, placeholders } = extractDiagrams(document.body, config);

  const rendered = renderWithFallback(markdown, config.extensions, render);
  let body = restoreDiagrams(rendered.html, placeholders);
  body = rewriteSourceLinks(body);
  const crossPage = rewriteCrossPageLinks(body, pageUrlMap);

  const warnings = [
    ...document.warnings,
    ...rendered.warnings,
    ...crossPage.unresolved.map((href) => `Link to "${href}" has no page in this batch; rendered as bold text`),
  ];

  return {
    fileName: outputFileName(document),
    title: document.title,
    html: renderPage(document.title, crossPage.html.trim()),
    diagramCount: placeholders.size,
    features: rendered.features,
    usedFallback: rendered.usedFallback,
    warnings,
  };
}

/**
 * Convert every Markdown file in sourceDir and write the pages to outputDir
 * The first file system failure aborts the run
 */
export function convertDirectory(
  sourceDir: string,
  outputDir: string,
  config: ExportConfig,
  hooks: ConversionHooks = {},
  render: MarkdownRenderFn = renderMarkdown,
): ConversionReport {
  const documents = readDocuments(sourceDir, config.fallbackTitle);
  const pageUrlMap = buildPageUrlMap(documents, config);
  hooks.onPageUrlMap?.(pageUrlMap);

  try {
    mkdirSync(outputDir, { recursive: true });
  } catch (error) {
    throw new FileSystemError(`Failed to create output directory ${outputDir}: ${error}`);
  }

  const pages: OutputPage[] = [];
  for (const document of documents) {
    const page = convertDocument(document, pageUrlMap, config, render);
    const destination = join(outputDir, page.fileName);
    try {
      writeFileSync(destination, page.html, 'utf-8');
    } catch (error) {
      throw new FileSystemError(`Failed to write ${destination}: ${error}`);
    }
    pages.push(page);
    hooks.onPageWritten?.(document, page);
  }

  return { sourceDir, outputDir, pageUrlMap, pages };
}
