#!/usr/bin/env node
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import chalk from 'chalk';
import { EXIT_CODES, getExitCodeForError, isWikidocError } from '../lib/errors.js';
import { checkCommand } from './commands/check.js';
import { convertCommand } from './commands/convert.js';
import { showCheckHelp, showConvertHelp, showHelp } from './help.js';
import { findPositional, readFlagValue } from './utils/args.js';

// Get version from package.json
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJsonPath = join(__dirname, '..', '..', 'package.json');
const packageJson: { version: string } = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
const VERSION = packageJson.version;

const CONVERT_VALUE_FLAGS = ['--out', '--base-url', '--space', '--theme'];

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  // Handle no arguments or help
  if (args.length === 0 || args[0] === 'help' || args[0] === '--help' || args[0] === '-h') {
    showHelp();
    process.exit(EXIT_CODES.SUCCESS);
  }

  // Handle version
  if (args[0] === '--version' || args[0] === '-v') {
    console.log(`wikidoc version ${VERSION}`);
    process.exit(EXIT_CODES.SUCCESS);
  }

  const command = args[0];
  const subArgs = args.slice(1);

  // Check for verbose mode
  if (args.includes('--verbose') && process.env.WIKIDOC_DEBUG !== '1') {
    process.env.WIKIDOC_DEBUG = '1';
  }

  try {
    switch (command) {
      case 'convert':
        if (args.includes('--help')) {
          showConvertHelp();
          process.exit(EXIT_CODES.SUCCESS);
        }
        await convertCommand({
          sourceDir: findPositional(subArgs, CONVERT_VALUE_FLAGS),
          outputDir: readFlagValue(subArgs, '--out'),
          wikiBaseUrl: readFlagValue(subArgs, '--base-url'),
          spaceKey: readFlagValue(subArgs, '--space'),
          diagramTheme: readFlagValue(subArgs, '--theme'),
        });
        break;

      case 'check':
        if (args.includes('--help')) {
          showCheckHelp();
          process.exit(EXIT_CODES.SUCCESS);
        }
        await checkCommand({
          htmlDir: findPositional(subArgs, []),
          strict: subArgs.includes('--strict'),
        });
        break;

      default:
        console.error(`Unknown command: ${command}`);
        console.log('Run "wikidoc help" for usage information');
        process.exit(EXIT_CODES.INVALID_ARGUMENTS);
    }
  } catch (error) {
    console.error(chalk.red('Error:'), error instanceof Error ? error.message : 'Unknown error');
    process.exit(isWikidocError(error) ? getExitCodeForError(error) : EXIT_CODES.GENERAL_ERROR);
  }
}

// Run the CLI
main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.GENERAL_ERROR);
});
