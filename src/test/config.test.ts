import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Effect, Either } from 'effect';
import {
  CONFIG_FILENAME,
  DEFAULT_EXTENSIONS,
  getConfigPath,
  loadExportConfig,
  loadExportConfigEffect,
} from '../lib/config.js';
import { ConfigError, ParseError, ValidationError } from '../lib/errors.js';

describe('loadExportConfig', () => {
  let testDir: string;
  let originalEnv: string | undefined;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'wikidoc-config-'));
    originalEnv = process.env.WIKIDOC_CONFIG_PATH;
    delete process.env.WIKIDOC_CONFIG_PATH;
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
    if (originalEnv !== undefined) {
      process.env.WIKIDOC_CONFIG_PATH = originalEnv;
    } else {
      delete process.env.WIKIDOC_CONFIG_PATH;
    }
  });

  function writeConfig(contents: unknown): void {
    writeFileSync(join(testDir, CONFIG_FILENAME), JSON.stringify(contents));
  }

  test('fills in defaults around the overrides', () => {
    const config = loadExportConfig(testDir, { wikiBaseUrl: 'https://wiki.test/', spaceKey: 'DOCS' });

    expect(config).toEqual({
      wikiBaseUrl: 'https://wiki.test',
      spaceKey: 'DOCS',
      diagramBaseUrl: 'https://mermaid.ink/img',
      diagramTheme: 'neutral',
      fallbackTitle: 'Document',
      extensions: DEFAULT_EXTENSIONS,
    });
  });

  test('reads the config file from the source directory', () => {
    writeConfig({
      wikiBaseUrl: 'https://wiki.test',
      spaceKey: 'DOCS',
      diagramTheme: 'dark',
      fallbackTitle: 'Untitled',
      extensions: { fallback: ['tables'] },
    });

    const config = loadExportConfig(testDir);

    expect(config.spaceKey).toBe('DOCS');
    expect(config.diagramTheme).toBe('dark');
    expect(config.fallbackTitle).toBe('Untitled');
    expect(config.extensions).toEqual({ primary: DEFAULT_EXTENSIONS.primary, fallback: ['tables'] });
  });

  test('lets command-line overrides win over the file', () => {
    writeConfig({ wikiBaseUrl: 'https://wiki.test', spaceKey: 'DOCS', diagramTheme: 'dark' });

    const config = loadExportConfig(testDir, { spaceKey: 'OPS', diagramTheme: 'forest' });

    expect(config.spaceKey).toBe('OPS');
    expect(config.diagramTheme).toBe('forest');
  });

  test('honours WIKIDOC_CONFIG_PATH', () => {
    const otherDir = mkdtempSync(join(tmpdir(), 'wikidoc-config-other-'));
    const configPath = join(otherDir, 'shared.json');
    writeFileSync(configPath, JSON.stringify({ wikiBaseUrl: 'https://shared.test', spaceKey: 'SHARED' }));
    process.env.WIKIDOC_CONFIG_PATH = configPath;

    try {
      expect(getConfigPath(testDir)).toBe(configPath);
      expect(loadExportConfig(testDir).spaceKey).toBe('SHARED');
    } finally {
      rmSync(otherDir, { recursive: true, force: true });
    }
  });

  test('fails with ConfigError without a wiki base URL', () => {
    expect(() => loadExportConfig(testDir, { spaceKey: 'DOCS' })).toThrow(ConfigError);
  });

  test('fails with ConfigError without a space key', () => {
    expect(() => loadExportConfig(testDir, { wikiBaseUrl: 'https://wiki.test' })).toThrow(ConfigError);
  });

  test('fails with ParseError on invalid JSON', () => {
    writeFileSync(join(testDir, CONFIG_FILENAME), '{ not json');

    expect(() => loadExportConfig(testDir)).toThrow(ParseError);
  });

  test('fails with ValidationError on an unknown feature', () => {
    writeConfig({ wikiBaseUrl: 'https://wiki.test', spaceKey: 'DOCS', extensions: { primary: ['tables', 'emoji'] } });

    expect(() => loadExportConfig(testDir)).toThrow(ValidationError);
  });

  test('fails with ValidationError on a non-http base URL', () => {
    expect(() => loadExportConfig(testDir, { wikiBaseUrl: 'ftp://wiki.test', spaceKey: 'DOCS' })).toThrow(
      ValidationError,
    );
  });

  test('exposes tagged failures through the Effect API', () => {
    const result = Effect.runSync(Effect.either(loadExportConfigEffect(testDir)));

    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left._tag).toBe('ConfigError');
    }
  });
});
