/**
 * CLI Shared Utilities
 * Token listing, diagnostic formatting and exit codes
 */

import { readFileSync } from 'node:fs';
import { enrichError } from './cli-error-enrichment.js';
import {
  formatError as formatEnrichedError,
  type FormatOptions,
} from './cli-error-formatter.js';
import { LexerError } from './lexer/errors.js';
import type { TokenizeResult } from './lexer/tokenizer.js';
import type { Token } from './token-types.js';

/** Escape line breaks and tabs so a lexeme fits on one output line */
export function escapeLexeme(lexeme: string): string {
  return lexeme
    .replace(/\r/g, '\\r')
    .replace(/\n/g, '\\n')
    .replace(/\t/g, '\\t');
}

/**
 * Format one token for the listing.
 *
 * @example
 * formatToken(token, 'human')   // (1, Keyword, int)
 * formatToken(token, 'compact') // 1:1\tKeyword\tint
 */
export function formatToken(token: Token, format: 'human' | 'compact'): string {
  const { line, column } = token.span.start;
  const lexeme = escapeLexeme(token.lexeme);
  if (format === 'compact') {
    return `${line}:${column}\t${token.type}\t${lexeme}`;
  }
  return `(${line}, ${token.type}, ${lexeme})`;
}

/** JSON.stringify replacer; integer constant values are bigints */
export function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

/**
 * Format error for stderr output
 *
 * Lexer diagnostics go through the enrichment pipeline when the source is
 * available; anything else prints its message.
 */
export function formatError(
  err: Error,
  source?: string,
  options?: Partial<FormatOptions>
): string {
  if (source !== undefined && err instanceof LexerError) {
    return formatEnrichedError(enrichError(err, source), {
      format: options?.format ?? 'human',
      verbose: options?.verbose ?? false,
      file: options?.file,
    });
  }

  if (err instanceof LexerError) {
    return `Lexer error at line ${err.location.line}: ${err.toData().message}`;
  }

  if ('code' in err && err.code === 'ENOENT' && 'path' in err) {
    return `File not found: ${String(err.path)}`;
  }

  return err.message;
}

/**
 * Determine exit code from a scan
 *
 * - completed scan, even with recoverable diagnostics: 0
 * - fatal scan: 1
 */
export function determineExitCode(result: TokenizeResult): number {
  return result.fatal === null ? 0 : 1;
}

/**
 * Detect help or version flags in CLI argument array.
 * Checks for --help, -h, --version, -v in any position.
 */
export function detectHelpVersionFlag(
  argv: string[]
): { mode: 'help' | 'version' } | null {
  // Help takes precedence over version
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }
  return null;
}

function readVersion(): string {
  const manifest: unknown = JSON.parse(
    readFileSync(new URL('../package.json', import.meta.url), 'utf-8')
  );
  if (
    typeof manifest === 'object' &&
    manifest !== null &&
    'version' in manifest &&
    typeof manifest.version === 'string'
  ) {
    return manifest.version;
  }
  return '0.0.0';
}

/** Package version string, read from package.json */
export const VERSION = readVersion();
