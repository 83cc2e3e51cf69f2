/**
 * Error types for the wikidoc CLI with discriminated unions using _tag property
 * These error types follow the Effect pattern for type-safe error handling
 */

/**
 * Configuration-related errors (missing wiki address or space key)
 */
export class ConfigError extends Error {
  readonly _tag = 'ConfigError' as const;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * File system operation errors
 */
export class FileSystemError extends Error {
  readonly _tag = 'FileSystemError' as const;

  constructor(message: string) {
    super(message);
    this.name = 'FileSystemError';
  }
}

/**
 * JSON parsing errors
 */
export class ParseError extends Error {
  readonly _tag = 'ParseError' as const;

  constructor(message: string) {
    super(message);
    this.name = 'ParseError';
  }
}

/**
 * Schema validation errors
 */
export class ValidationError extends Error {
  readonly _tag = 'ValidationError' as const;

  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Markdown rendering failed for a given feature set
 */
export class MarkdownRenderError extends Error {
  readonly _tag = 'MarkdownRenderError' as const;

  constructor(message: string) {
    super(message);
    this.name = 'MarkdownRenderError';
  }
}

/**
 * Union type of all error types for comprehensive error handling
 */
export type WikidocError = ConfigError | FileSystemError | ParseError | ValidationError | MarkdownRenderError;

/**
 * Exit codes for CLI
 */
export const EXIT_CODES = {
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  CONFIG_ERROR: 2,
  INVALID_ARGUMENTS: 3,
  FILE_SYSTEM_ERROR: 4,
  RENDER_ERROR: 5,
  BROKEN_LINKS: 6,
} as const;

/**
 * Narrow an unknown thrown value to one of the wikidoc errors
 */
export function isWikidocError(error: unknown): error is WikidocError {
  return (
    error instanceof ConfigError ||
    error instanceof FileSystemError ||
    error instanceof ParseError ||
    error instanceof ValidationError ||
    error instanceof MarkdownRenderError
  );
}

/**
 * Get exit code for a given error
 */
export function getExitCodeForError(error: WikidocError): number {
  switch (error._tag) {
    case 'ConfigError':
    case 'ParseError':
    case 'ValidationError':
      return EXIT_CODES.CONFIG_ERROR;
    case 'FileSystemError':
      return EXIT_CODES.FILE_SYSTEM_ERROR;
    case 'MarkdownRenderError':
      return EXIT_CODES.RENDER_ERROR;
    default:
      return EXIT_CODES.GENERAL_ERROR;
  }
}
