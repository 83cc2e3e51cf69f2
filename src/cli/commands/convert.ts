import { resolve } from 'node:path';
import chalk from 'chalk';
import ora from 'ora';
import { loadExportConfig, type ConfigOverrides } from '../../lib/config.js';
import { convertDirectory, type ConversionReport } from '../../lib/converter.js';
import { formatConvertedPage, formatPageUrlMap } from '../../lib/formatters.js';

export interface ConvertCommandOptions extends ConfigOverrides {
  sourceDir?: string;
  outputDir?: string;
}

/**
 * Convert command - renders every Markdown file of a directory to a wiki-ready page
 */
export async function convertCommand(options: ConvertCommandOptions = {}): Promise<void> {
  const sourceDir = resolve(options.sourceDir ?? '.');
  const outputDir = resolve(options.outputDir ?? resolve(sourceDir, 'html'));
  const verbose = process.env.WIKIDOC_DEBUG === '1';

  const config = loadExportConfig(sourceDir, {
    wikiBaseUrl: options.wikiBaseUrl,
    spaceKey: options.spaceKey,
    diagramTheme: options.diagramTheme,
  });
  if (verbose) {
    process.stderr.write(`[debug] config: ${JSON.stringify(config)}\n`);
  }

  const spinner = ora(`Converting ${sourceDir} → ${outputDir}`).start();
  let written = 0;

  let report: ConversionReport;
  try {
    report = convertDirectory(sourceDir, outputDir, config, {
      onPageUrlMap: (pageUrlMap) => {
        if (pageUrlMap.size === 0) {
          return;
        }
        spinner.stop();
        console.log(formatPageUrlMap(pageUrlMap));
        console.log('');
        spinner.start();
      },
      onPageWritten: (document, page) => {
        written++;
        spinner.succeed(formatConvertedPage(document, page));
        if (verbose) {
          process.stderr.write(`[debug] ${page.fileName}: ${page.html.length} bytes\n`);
        }
        spinner.start(`Converting (${written} done)`);
      },
    });
  } catch (error) {
    spinner.fail('Conversion failed');
    throw error;
  }

  if (report.pages.length === 0) {
    spinner.warn(`No Markdown files found in ${sourceDir}`);
    return;
  }

  spinner.stop();
  console.log('');
  console.log(chalk.green(`Done. ${report.pages.length} page(s) written to ${outputDir}`));
}
