import chalk from 'chalk';
import type { OutputPage, SourceDocument } from './converter.js';
import type { LinkCheckReport } from './link-checker.js';
import type { PageUrlMap } from './markdown/link-rewriter.js';

/**
 * Page URL map, one "file → url" line per page sorted by file name
 */
export function formatPageUrlMap(pageUrlMap: PageUrlMap): string {
  const lines = [chalk.bold('Wiki page URL map:')];
  const entries = [...pageUrlMap.entries()].sort(([a], [b]) => a.localeCompare(b));
  for (const [fileName, url] of entries) {
    lines.push(`  ${chalk.cyan(fileName)} → ${url}`);
  }
  return lines.join('\n');
}

/**
 * One line for a written page, plus its warnings
 * Pages rendered with the fallback feature set name the features used
 */
export function formatConvertedPage(document: SourceDocument, page: OutputPage): string {
  const diagrams = page.diagramCount > 0 ? chalk.gray(` (${page.diagramCount} diagram${page.diagramCount === 1 ? '' : 's'})`) : '';
  const fallback = page.usedFallback ? chalk.yellow(` [fallback: ${page.features.join(', ')}]`) : '';
  const lines = [`${document.fileName}  →  ${page.fileName}${diagrams}${fallback}`];
  for (const warning of page.warnings) {
    lines.push(chalk.yellow(`    ⚠ ${warning}`));
  }
  return lines.join('\n');
}

/**
 * Summary of an anchor link check
 */
export function formatLinkCheckReport(report: LinkCheckReport): string {
  const lines = [
    `Total anchored links checked: ${report.total}`,
    `  OK:     ${chalk.green(String(report.ok.length))}`,
    `  Broken: ${report.broken.length > 0 ? chalk.red(String(report.broken.length)) : String(report.broken.length)}`,
  ];

  if (report.broken.length === 0) {
    lines.push('', chalk.green('All anchored links resolve correctly.'));
    return lines.join('\n');
  }

  lines.push('', chalk.red.bold('BROKEN links:'));
  for (const link of report.broken) {
    lines.push(`  [${link.source}] -> ${link.target}#${link.anchor}`);
    if (link.candidates.length > 0) {
      const prefix = link.anchor.split('-')[0];
      lines.push(chalk.gray(`    actual IDs starting with '${prefix}': ${link.candidates.join(', ')}`));
    }
  }
  return lines.join('\n');
}
