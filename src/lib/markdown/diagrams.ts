import type { ExportConfig } from '../config.js';

/**
 * Placeholder token -> rendered image markup, in order of appearance
 */
export type DiagramPlaceholders = Map<string, string>;

export interface DiagramExtraction {
  markdown: string;
  placeholders: DiagramPlaceholders;
}

const DIAGRAM_FENCE = /```mermaid[ \t]*\r?\n([\s\S]*?)```/g;

/**
 * Encode text as URL-safe base64, keeping the "=" padding
 */
function toBase64Url(text: string): string {
  return Buffer.from(text, 'utf-8').toString('base64').replace(/\+/g, '-').replace(/\//g, '_');
}

/**
 * Image URL of a diagram on the rendering service
 * The service is never called here; the URL is embedded in the page
 */
export function diagramImageUrl(source: string, config: Pick<ExportConfig, 'diagramBaseUrl' | 'diagramTheme'>): string {
  const theme = encodeURIComponent(config.diagramTheme);
  return `${config.diagramBaseUrl}/${toBase64Url(source)}?theme=${theme}`;
}

function escapeAttribute(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/"/g, '&quot;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/**
 * Pick a token prefix that does not occur anywhere in the document
 */
function choosePlaceholderPrefix(markdown: string): string {
  let prefix = 'DIAGRAM-PLACEHOLDER';
  while (markdown.includes(prefix)) {
    prefix += '-X';
  }
  return prefix;
}

/**
 * Swap every mermaid fence for a placeholder token
 *
 * Must run before Markdown rendering so the renderer never treats diagram
 * source as a code block.
 */
export function extractDiagrams(
  markdown: string,
  config: Pick<ExportConfig, 'diagramBaseUrl' | 'diagramTheme'>,
): DiagramExtraction {
  const placeholders: DiagramPlaceholders = new Map();
  const prefix = choosePlaceholderPrefix(markdown);

  const replaced = markdown.replace(DIAGRAM_FENCE, (_match, source: string) => {
    const token = `${prefix}-${placeholders.size}-END`;
    const src = escapeAttribute(diagramImageUrl(source.trim(), config));
    placeholders.set(token, `<img class="mermaid-img" src="${src}" alt="Mermaid diagram" />`);
    return token;
  });

  return { markdown: replaced, placeholders };
}

/**
 * Put the rendered image markup back in place of each token
 * A token the renderer wrapped in its own paragraph loses the <p> wrapper
 */
export function restoreDiagrams(html: string, placeholders: DiagramPlaceholders): string {
  let result = html;
  for (const [token, block] of placeholders) {
    result = result.split(`<p>${token}</p>`).join(block);
    result = result.split(token).join(block);
  }
  return result;
}
