import { Marked, type Renderer, type Tokens } from 'marked';
import type { ExtensionSets, MarkdownFeature } from '../config.js';
import { MarkdownRenderError } from '../errors.js';
import { HeadingIdAllocator } from './anchors.js';

export interface RenderResult {
  html: string;
  warnings: string[];
}

export interface FallbackRenderResult extends RenderResult {
  features: readonly MarkdownFeature[];
  usedFallback: boolean;
}

/**
 * Markdown -> HTML fragment for a given feature set
 * Must throw MarkdownRenderError when the feature set cannot render the document
 */
export type MarkdownRenderFn = (markdown: string, features: readonly MarkdownFeature[]) => RenderResult;

/**
 * Decode the entities marked emits for inline text
 */
function decodeHtmlEntities(text: string): string {
  return text
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&amp;/g, '&');
}

/**
 * HTML renderer that turns a Markdown body into a page fragment
 * Wraps marked; each named feature switches one piece of behaviour on
 */
export class HtmlRenderer {
  private warnings: string[] = [];
  private readonly features: readonly MarkdownFeature[];

  constructor(features: readonly MarkdownFeature[]) {
    this.features = features;
  }

  private has(feature: MarkdownFeature): boolean {
    return this.features.includes(feature);
  }

  /**
   * Strip dangerous elements and attributes from a raw HTML block
   */
  private sanitizeHtml(raw: string): string {
    let html = raw;

    html = html
      // Script, iframe and object elements with their content
      .replace(/<script\b[^<]*(?:(?!<\/script>)<[^<]*)*<\/script>/gi, '')
      .replace(/<iframe\b[^<]*(?:(?!<\/iframe>)<[^<]*)*<\/iframe>/gi, '')
      .replace(/<object\b[^<]*(?:(?!<\/object>)<[^<]*)*<\/object>/gi, '')
      .replace(/<embed\b[^>]*>/gi, '')
      // Event handlers (onclick, onerror, etc.)
      .replace(/\son\w+\s*=\s*["'][^"']*["']/gi, '')
      // javascript: and data: URLs
      .replace(/href\s*=\s*["']javascript:[^"']*["']/gi, 'href="#"')
      .replace(/src\s*=\s*["'](?:javascript|data):[^"']*["']/gi, 'src=""');

    if (html !== raw) {
      this.warnings.push('Potentially unsafe HTML was sanitized (scripts, iframes, event handlers, or dangerous URLs removed).');
    }
    return html;
  }

  /**
   * Create a configured Marked instance with custom renderer
   * A fresh instance per render keeps heading ids unique per page only
   */
  private createMarkedInstance(): Marked {
    const self = this;
    const headingIds = new HeadingIdAllocator();
    const renderer: Partial<Renderer> = {};

    if (this.has('heading-ids')) {
      renderer.heading = function (this: Renderer, token: Tokens.Heading): string {
        const text = this.parser.parseInline(token.tokens);
        const plain = decodeHtmlEntities(text.replace(/<[^>]+>/g, ''));
        const id = headingIds.allocate(plain);
        return `<h${token.depth} id="${id}">${text}</h${token.depth}>\n`;
      };
    }

    if (this.has('sanitize-html')) {
      renderer.html = function (this: Renderer, token: Tokens.HTML): string {
        return self.sanitizeHtml(token.text);
      };
    }

    return new Marked({
      gfm: this.has('tables'),
      breaks: this.has('line-breaks'),
      renderer,
    });
  }

  /**
   * Convert Markdown to an HTML fragment
   */
  render(markdown: string): RenderResult {
    this.warnings = [];
    const markedInstance = this.createMarkedInstance();

    let html: string;
    try {
      html = markedInstance.parse(markdown, { async: false });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new MarkdownRenderError(
        `Failed to render Markdown with features [${this.features.join(', ')}]: ${reason}`,
      );
    }

    return {
      html,
      warnings: [...this.warnings],
    };
  }
}

/**
 * Default render function backed by HtmlRenderer
 */
export const renderMarkdown: MarkdownRenderFn = (markdown, features) => new HtmlRenderer(features).render(markdown);

/**
 * Render with the primary feature set, retrying once with the fallback set
 *
 * Only a MarkdownRenderError triggers the retry. Anything else, or a failure
 * of the fallback set, propagates to the caller.
 */
export function renderWithFallback(
  markdown: string,
  extensions: ExtensionSets,
  render: MarkdownRenderFn = renderMarkdown,
): FallbackRenderResult {
  try {
    const result = render(markdown, extensions.primary);
    return { ...result, features: extensions.primary, usedFallback: false };
  } catch (error) {
    if (!(error instanceof MarkdownRenderError)) {
      throw error;
    }

    const result = render(markdown, extensions.fallback);
    return {
      html: result.html,
      warnings: [`${error.message}; rendered with [${extensions.fallback.join(', ')}] instead`, ...result.warnings],
      features: extensions.fallback,
      usedFallback: true,
    };
  }
}
