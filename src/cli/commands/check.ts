import { resolve } from 'node:path';
import { EXIT_CODES } from '../../lib/errors.js';
import { formatLinkCheckReport } from '../../lib/formatters.js';
import { checkDirectory } from '../../lib/link-checker.js';

export interface CheckCommandOptions {
  htmlDir?: string;
  /** Exit non-zero when a link is broken */
  strict?: boolean;
}

/**
 * Check command - verifies that every cross-page anchored link resolves
 */
export async function checkCommand(options: CheckCommandOptions = {}): Promise<void> {
  const htmlDir = resolve(options.htmlDir ?? 'html');
  const report = checkDirectory(htmlDir);

  console.log(formatLinkCheckReport(report));

  if (options.strict && report.broken.length > 0) {
    process.exit(EXIT_CODES.BROKEN_LINKS);
  }
}
