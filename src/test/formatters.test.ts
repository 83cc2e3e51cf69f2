import { beforeAll, describe, expect, test } from 'vitest';
import chalk from 'chalk';
import { formatConvertedPage, formatLinkCheckReport, formatPageUrlMap } from '../lib/formatters.js';

beforeAll(() => {
  chalk.level = 0;
});

describe('formatPageUrlMap', () => {
  test('lists pages sorted by file name', () => {
    const pageUrlMap = new Map([
      ['b.html', 'https://wiki.test/b'],
      ['a.html', 'https://wiki.test/a'],
    ]);

    expect(formatPageUrlMap(pageUrlMap)).toBe(
      ['Wiki page URL map:', '  a.html → https://wiki.test/a', '  b.html → https://wiki.test/b'].join('\n'),
    );
  });
});

describe('formatConvertedPage', () => {
  test('shows the file pair, diagram count and warnings', () => {
    const output = formatConvertedPage(
      { name: 'alpha', fileName: 'alpha.md', title: 'Alpha', body: '', warnings: [] },
      {
        fileName: 'alpha.html',
        title: 'Alpha',
        html: '',
        diagramCount: 2,
        features: ['tables'],
        usedFallback: false,
        warnings: ['Link to "z.html" has no page'],
      },
    );

    expect(output).toBe('alpha.md  →  alpha.html (2 diagrams)\n    ⚠ Link to "z.html" has no page');
  });

  test('omits the diagram count when there are none', () => {
    const output = formatConvertedPage(
      { name: 'beta', fileName: 'beta.md', title: 'Beta', body: '', warnings: [] },
      { fileName: 'beta.html', title: 'Beta', html: '', diagramCount: 0, features: ['tables'], usedFallback: false, warnings: [] },
    );

    expect(output).toBe('beta.md  →  beta.html');
  });

  test('names the fallback feature set when the page needed it', () => {
    const output = formatConvertedPage(
      { name: 'gamma', fileName: 'gamma.md', title: 'Gamma', body: '', warnings: [] },
      {
        fileName: 'gamma.html',
        title: 'Gamma',
        html: '',
        diagramCount: 1,
        features: ['tables', 'heading-ids'],
        usedFallback: true,
        warnings: [],
      },
    );

    expect(output).toBe('gamma.md  →  gamma.html (1 diagram) [fallback: tables, heading-ids]');
  });
});

describe('formatLinkCheckReport', () => {
  test('summarizes a clean run', () => {
    const ok = { source: 'a.html', target: 'b.html', anchor: 'setup' };

    expect(formatLinkCheckReport({ total: 1, ok: [ok], broken: [] })).toBe(
      [
        'Total anchored links checked: 1',
        '  OK:     1',
        '  Broken: 0',
        '',
        'All anchored links resolve correctly.',
      ].join('\n'),
    );
  });

  test('lists broken links with candidate ids', () => {
    const report = {
      total: 2,
      ok: [],
      broken: [
        { source: 'A.html', target: 'B.html', anchor: 'setup-mac', candidates: ['setup-linux', 'setup-macos'] },
        { source: 'A.html', target: 'C.html', anchor: 'gone', candidates: [] },
      ],
    };

    expect(formatLinkCheckReport(report)).toBe(
      [
        'Total anchored links checked: 2',
        '  OK:     0',
        '  Broken: 2',
        '',
        'BROKEN links:',
        '  [A.html] -> B.html#setup-mac',
        "    actual IDs starting with 'setup': setup-linux, setup-macos",
        '  [A.html] -> C.html#gone',
      ].join('\n'),
    );
  });
});
