import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  checkDirectory,
  checkLinks,
  collectAnchorIds,
  extractAnchoredLinks,
  findCandidates,
} from '../lib/link-checker.js';

describe('collectAnchorIds', () => {
  test('collects every id attribute', () => {
    const html = '<h1 id="title">T</h1><h2 id="setup">S</h2><div class="x" id="note-1"></div>';

    expect([...collectAnchorIds(html)]).toEqual(['title', 'setup', 'note-1']);
  });
});

describe('extractAnchoredLinks', () => {
  test('extracts only cross-page links with a fragment', () => {
    const html = [
      '<a href="b.html#setup">b</a>',
      '<a href="#local">local</a>',
      '<a href="c.html">no fragment</a>',
      '<a href="https://wiki.test/page">external</a>',
      '<a href="docs/d.html#intro">d</a>',
    ].join('\n');

    expect(extractAnchoredLinks('a.html', html)).toEqual([
      { source: 'a.html', target: 'b.html', anchor: 'setup' },
      { source: 'a.html', target: 'docs/d.html', anchor: 'intro' },
    ]);
  });
});

describe('findCandidates', () => {
  const ids = new Set(['setup-windows', 'intro', 'setup-macos', 'setup-zos', 'setup-linux']);

  test('returns up to three sorted ids sharing the leading token', () => {
    expect(findCandidates('setup-mac', ids)).toEqual(['setup-linux', 'setup-macos', 'setup-windows']);
  });

  test('returns nothing for an unknown target page', () => {
    expect(findCandidates('setup-mac', undefined)).toEqual([]);
  });
});

describe('checkLinks', () => {
  test('reports a link to a missing anchor as broken', () => {
    const pages = new Map([
      ['A.html', '<p><a href="B.html#missing-id">b</a></p>'],
      ['B.html', '<h2 id="other-id">Other</h2>'],
    ]);

    const report = checkLinks(pages);

    expect(report.total).toBe(1);
    expect(report.ok).toEqual([]);
    expect(report.broken).toEqual([{ source: 'A.html', target: 'B.html', anchor: 'missing-id', candidates: [] }]);
  });

  test('resolves forward and backward references alike', () => {
    const pages = new Map([
      ['b.html', '<h1 id="b-top">B</h1><a href="a.html#a-top">back</a>'],
      ['a.html', '<h1 id="a-top">A</h1><a href="b.html#b-top">forward</a>'],
    ]);

    const report = checkLinks(pages);

    expect(report.total).toBe(2);
    expect(report.broken).toEqual([]);
    expect(report.ok).toEqual([
      { source: 'a.html', target: 'b.html', anchor: 'b-top' },
      { source: 'b.html', target: 'a.html', anchor: 'a-top' },
    ]);
  });

  test('treats links to pages outside the set as broken', () => {
    const report = checkLinks(new Map([['a.html', '<a href="gone.html#x">gone</a>']]));

    expect(report.broken).toEqual([{ source: 'a.html', target: 'gone.html', anchor: 'x', candidates: [] }]);
  });

  test('suggests similarly named anchors for broken links', () => {
    const pages = new Map([
      ['a.html', '<a href="b.html#step-1-parse">b</a>'],
      ['b.html', '<h2 id="step-1--parse">S</h2><h2 id="intro">I</h2>'],
    ]);

    expect(checkLinks(pages).broken[0].candidates).toEqual(['step-1--parse']);
  });

  test('ignores same-page anchors', () => {
    const report = checkLinks(new Map([['a.html', '<a href="#nowhere">x</a>']]));

    expect(report.total).toBe(0);
  });
});

describe('checkDirectory', () => {
  let htmlDir: string;

  beforeEach(() => {
    htmlDir = mkdtempSync(join(tmpdir(), 'wikidoc-check-'));
  });

  afterEach(() => {
    rmSync(htmlDir, { recursive: true, force: true });
  });

  test('checks every .html page in the directory', () => {
    writeFileSync(join(htmlDir, 'a.html'), '<a href="b.html#setup">ok</a><a href="b.html#nope">bad</a>');
    writeFileSync(join(htmlDir, 'b.html'), '<h2 id="setup">Setup</h2>');
    writeFileSync(join(htmlDir, 'notes.txt'), '<a href="b.html#ignored">x</a>');

    const report = checkDirectory(htmlDir);

    expect(report.total).toBe(2);
    expect(report.ok).toEqual([{ source: 'a.html', target: 'b.html', anchor: 'setup' }]);
    expect(report.broken.map((link) => link.anchor)).toEqual(['nope']);
  });
});
