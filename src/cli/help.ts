import chalk from 'chalk';

export function showConvertHelp(): void {
  console.log(`
${chalk.bold('wikidoc convert - Convert Markdown files to wiki-ready HTML pages')}

${chalk.yellow('Usage:')}
  wikidoc convert [source-dir] [options]

${chalk.yellow('Description:')}
  Renders every .md file directly inside source-dir (default: current
  directory) to a standalone .html page. Mermaid diagrams become static
  images, links between documents point at the wiki page of their target,
  and links to documents outside the batch are shown as bold text.

  Reads wikiBaseUrl, spaceKey and other settings from .wikidoc.json in
  source-dir; command-line options take precedence.

${chalk.yellow('Options:')}
  --out <dir>               Output directory (default: <source-dir>/html)
  --base-url <url>          Wiki base URL, e.g. https://example.atlassian.net
  --space <key>             Wiki space key
  --theme <name>            Diagram rendering theme (default: neutral)
  --help                    Show this help message

${chalk.yellow('Examples:')}
  wikidoc convert docs --space DOCS --base-url https://example.atlassian.net
  wikidoc convert docs --out build/pages
`);
}

export function showCheckHelp(): void {
  console.log(`
${chalk.bold('wikidoc check - Verify anchored links between generated pages')}

${chalk.yellow('Usage:')}
  wikidoc check [html-dir] [options]

${chalk.yellow('Description:')}
  Collects the ids defined by every .html page in html-dir (default: ./html)
  and checks each link of the form page.html#anchor against them.
  Broken links are listed with similarly named ids of the target page.

${chalk.yellow('Options:')}
  --strict                  Exit with a non-zero code when a link is broken
  --help                    Show this help message

${chalk.yellow('Examples:')}
  wikidoc check docs/html
  wikidoc check docs/html --strict
`);
}

export function showHelp(): void {
  console.log(`
${chalk.bold('wikidoc - Markdown to wiki page converter')}

Convert Markdown documents to HTML pages ready to paste into a wiki.

${chalk.yellow('Commands:')}
  wikidoc convert           Convert a directory of Markdown files
  wikidoc check             Check anchored links between generated pages

${chalk.yellow('Global Options:')}
  --help, -h                Show help message
  --version, -v             Show version number
  --verbose                 Enable verbose output

${chalk.yellow('Environment Variables:')}
  WIKIDOC_CONFIG_PATH       Override config file location
  WIKIDOC_DEBUG             Enable debug logging
  NO_COLOR                  Disable colored output

${chalk.yellow('Examples:')}
  wikidoc convert docs      Convert docs/*.md into docs/html
  wikidoc check docs/html   Check the generated pages

${chalk.gray('For more information on a command, run: wikidoc <command> --help')}
`);
}
