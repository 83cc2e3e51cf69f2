export { HeadingIdAllocator, normalizeAnchor, slugifyHeading } from './anchors.js';
export { diagramImageUrl, extractDiagrams, restoreDiagrams, type DiagramPlaceholders } from './diagrams.js';
export { splitFrontmatter, type SplitMarkdown } from './frontmatter.js';
export {
  HtmlRenderer,
  renderMarkdown,
  renderWithFallback,
  type FallbackRenderResult,
  type MarkdownRenderFn,
  type RenderResult,
} from './html-renderer.js';
export {
  rewriteCrossPageLinks,
  rewriteSourceLinks,
  type CrossPageRewriteResult,
  type PageUrlMap,
} from './link-rewriter.js';
export { extractTitle, resolveDocumentTitle, wikiPageUrl } from './title.js';
