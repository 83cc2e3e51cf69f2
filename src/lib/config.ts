import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { Effect, Either, pipe, Schema } from 'effect';
import { ConfigError, FileSystemError, ParseError, ValidationError } from './errors.js';

/**
 * Schema for the wiki and diagram service addresses
 * Any http(s) origin, optionally followed by a path
 */
const HttpUrlSchema = Schema.String.pipe(
  Schema.pattern(/^https?:\/\/[^\s/]+(\/\S*)?$/),
  Schema.annotations({
    message: () => 'URL must start with http:// or https://',
  }),
);

const SpaceKeySchema = Schema.String.pipe(
  Schema.pattern(/^\S+$/),
  Schema.annotations({
    message: () => 'Space key must be a non-empty string without whitespace',
  }),
);

/**
 * Named Markdown rendering features understood by the HTML renderer
 */
export const MarkdownFeatureSchema = Schema.Literal('tables', 'heading-ids', 'line-breaks', 'sanitize-html');

export type MarkdownFeature = Schema.Schema.Type<typeof MarkdownFeatureSchema>;

const FeatureListSchema = Schema.Array(MarkdownFeatureSchema);

const ExtensionSetsSchema = Schema.Struct({
  primary: FeatureListSchema,
  fallback: FeatureListSchema,
});

export type ExtensionSets = Schema.Schema.Type<typeof ExtensionSetsSchema>;

/**
 * Resolved configuration threaded through every conversion entry point
 */
const ExportConfigSchema = Schema.Struct({
  wikiBaseUrl: HttpUrlSchema,
  spaceKey: SpaceKeySchema,
  diagramBaseUrl: HttpUrlSchema,
  diagramTheme: Schema.String.pipe(Schema.minLength(1)),
  fallbackTitle: Schema.String.pipe(Schema.minLength(1)),
  extensions: ExtensionSetsSchema,
});

export type ExportConfig = Schema.Schema.Type<typeof ExportConfigSchema>;

/**
 * Shape of .wikidoc.json - every field optional, merged over the defaults
 */
const ExportConfigFileSchema = Schema.Struct({
  wikiBaseUrl: Schema.optional(Schema.String),
  spaceKey: Schema.optional(Schema.String),
  diagramBaseUrl: Schema.optional(Schema.String),
  diagramTheme: Schema.optional(Schema.String),
  fallbackTitle: Schema.optional(Schema.String),
  extensions: Schema.optional(
    Schema.Struct({
      primary: Schema.optional(FeatureListSchema),
      fallback: Schema.optional(FeatureListSchema),
    }),
  ),
});

export type ExportConfigFile = Schema.Schema.Type<typeof ExportConfigFileSchema>;

/**
 * Values given on the command line; they win over the config file
 */
export interface ConfigOverrides {
  wikiBaseUrl?: string;
  spaceKey?: string;
  diagramTheme?: string;
}

export const CONFIG_FILENAME = '.wikidoc.json';

export const DEFAULT_EXTENSIONS: ExtensionSets = {
  primary: ['tables', 'heading-ids', 'line-breaks', 'sanitize-html'],
  fallback: ['tables', 'heading-ids'],
};

export const CONFIG_DEFAULTS = {
  diagramBaseUrl: 'https://mermaid.ink/img',
  diagramTheme: 'neutral',
  fallbackTitle: 'Document',
} as const;

type ConfigLoadError = ConfigError | FileSystemError | ParseError | ValidationError;

/**
 * Path of the config file for a source directory
 * WIKIDOC_CONFIG_PATH overrides the per-directory file
 */
export function getConfigPath(directory: string): string {
  return process.env.WIKIDOC_CONFIG_PATH ? process.env.WIKIDOC_CONFIG_PATH : join(directory, CONFIG_FILENAME);
}

function readConfigFileEffect(configPath: string): Effect.Effect<ExportConfigFile, FileSystemError | ParseError | ValidationError> {
  return pipe(
    Effect.sync(() => existsSync(configPath)),
    Effect.flatMap((fileExists): Effect.Effect<ExportConfigFile, FileSystemError | ParseError | ValidationError> => {
      if (!fileExists) {
        return Effect.succeed<ExportConfigFile>({});
      }

      return pipe(
        Effect.try({
          try: () => readFileSync(configPath, 'utf-8'),
          catch: (error) => new FileSystemError(`Failed to read config file: ${error}`),
        }),
        Effect.flatMap((configData) =>
          Effect.try({
            try: (): unknown => JSON.parse(configData),
            catch: (error) => new ParseError(`Invalid JSON in config file: ${error}`),
          }),
        ),
        Effect.flatMap((raw) =>
          pipe(
            Schema.decodeUnknown(ExportConfigFileSchema)(raw),
            Effect.mapError((error) => new ValidationError(`Invalid config file ${configPath}: ${error.message}`)),
          ),
        ),
      );
    }),
  );
}

/**
 * Merge defaults, file values and overrides, then validate the result
 */
export function resolveExportConfigEffect(
  file: ExportConfigFile,
  overrides: ConfigOverrides = {},
): Effect.Effect<ExportConfig, ConfigError | ValidationError> {
  const wikiBaseUrl = overrides.wikiBaseUrl ?? file.wikiBaseUrl;
  const spaceKey = overrides.spaceKey ?? file.spaceKey;

  if (!wikiBaseUrl) {
    return Effect.fail(
      new ConfigError(`No wiki base URL configured. Set "wikiBaseUrl" in ${CONFIG_FILENAME} or pass --base-url.`),
    );
  }
  if (!spaceKey) {
    return Effect.fail(new ConfigError(`No space key configured. Set "spaceKey" in ${CONFIG_FILENAME} or pass --space.`));
  }

  const candidate = {
    wikiBaseUrl: wikiBaseUrl.replace(/\/+$/, ''),
    spaceKey,
    diagramBaseUrl: (file.diagramBaseUrl ?? CONFIG_DEFAULTS.diagramBaseUrl).replace(/\/+$/, ''),
    diagramTheme: overrides.diagramTheme ?? file.diagramTheme ?? CONFIG_DEFAULTS.diagramTheme,
    fallbackTitle: file.fallbackTitle ?? CONFIG_DEFAULTS.fallbackTitle,
    extensions: {
      primary: file.extensions?.primary ?? DEFAULT_EXTENSIONS.primary,
      fallback: file.extensions?.fallback ?? DEFAULT_EXTENSIONS.fallback,
    },
  };

  return pipe(
    Schema.decodeUnknown(ExportConfigSchema)(candidate),
    Effect.mapError((error) => new ValidationError(`Invalid config: ${error.message}`)),
  );
}

/**
 * Effect-based configuration loading with detailed error handling
 */
export function loadExportConfigEffect(
  directory: string,
  overrides: ConfigOverrides = {},
): Effect.Effect<ExportConfig, ConfigLoadError> {
  return pipe(
    readConfigFileEffect(getConfigPath(directory)),
    Effect.flatMap((file) => resolveExportConfigEffect(file, overrides)),
  );
}

/**
 * Synchronous wrapper for loadExportConfigEffect
 * Throws the tagged error instead of Effect's fiber failure
 */
export function loadExportConfig(directory: string, overrides: ConfigOverrides = {}): ExportConfig {
  const result = Effect.runSync(Effect.either(loadExportConfigEffect(directory, overrides)));
  if (Either.isLeft(result)) {
    throw result.left;
  }
  return result.right;
}
