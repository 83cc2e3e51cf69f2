import matter from 'gray-matter';

export interface SplitMarkdown {
  frontmatter: Record<string, unknown>;
  content: string;
  /** Set when a leading "---" block could not be read as frontmatter */
  warning?: string;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Separate YAML frontmatter from the Markdown body
 *
 * A document may open with a "---" thematic break rather than frontmatter.
 * When the block is not YAML, or not a mapping, the whole text stays the body
 * and a warning says why.
 */
export function splitFrontmatter(markdown: string, source = 'document'): SplitMarkdown {
  let parsed: ReturnType<typeof matter>;
  try {
    parsed = matter(markdown);
  } catch (error) {
    const reason = error instanceof Error ? error.message.split('\n')[0] : String(error);
    return {
      frontmatter: {},
      content: markdown,
      warning: `Leading "---" block in ${source} is not frontmatter (${reason}); kept as Markdown`,
    };
  }

  const data: unknown = parsed.data;
  if (!isPlainRecord(data)) {
    return {
      frontmatter: {},
      content: markdown,
      warning: `Leading "---" block in ${source} is not a frontmatter mapping; kept as Markdown`,
    };
  }

  return {
    frontmatter: data,
    content: parsed.content,
  };
}
