#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Implements main(), parseArgs() and lexSource() for the c89lex binary.
 * Reads a C source file (or stdin), prints its tokens to stdout and its
 * diagnostics to stderr.
 */

import * as fs from 'node:fs/promises';
import * as fsSync from 'node:fs';
import type { OutputFormat } from './cli-error-formatter.js';
import { explainError } from './cli-explain.js';
import { toLspDiagnostic } from './cli-lsp-diagnostic.js';
import {
  detectHelpVersionFlag,
  determineExitCode,
  formatError,
  formatToken,
  jsonReplacer,
  VERSION,
} from './cli-shared.js';
import { tokenize } from './lexer/index.js';

/**
 * Parsed command-line arguments
 */
export type ParsedArgs =
  | {
      mode: 'lex';
      file: string;
      format: OutputFormat;
      verbose: boolean;
      lineComments: boolean;
      comments: boolean;
    }
  | { mode: 'help' | 'version' }
  | { mode: 'explain'; errorId: string };

const FLAGS_WITH_VALUE = ['--format', '--explain'];
const KNOWN_FLAGS = [
  '--help',
  '-h',
  '--version',
  '-v',
  '--explain',
  '--format',
  '--verbose',
  '--line-comments',
  '--comments',
];

/**
 * Parse command-line arguments into structured command
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @throws Error on unknown options, a bad --format value or a missing file
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const helpOrVersion = detectHelpVersionFlag(argv);
  if (helpOrVersion) {
    return helpOrVersion;
  }

  const explainIndex = argv.indexOf('--explain');
  if (explainIndex !== -1) {
    const errorId = argv[explainIndex + 1];
    if (!errorId) {
      throw new Error('Missing error ID after --explain');
    }
    return { mode: 'explain', errorId };
  }

  let format: OutputFormat = 'human';
  const formatIndex = argv.indexOf('--format');
  if (formatIndex !== -1) {
    const formatValue = argv[formatIndex + 1];
    if (
      formatValue !== 'human' &&
      formatValue !== 'json' &&
      formatValue !== 'compact'
    ) {
      throw new Error(
        `Invalid --format value: ${formatValue ?? '(missing)'}. Must be one of: human, json, compact`
      );
    }
    format = formatValue;
  }

  const positionalArgs: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;
    if (arg.startsWith('-') && arg !== '-') {
      if (!KNOWN_FLAGS.includes(arg)) {
        throw new Error(`Unknown option: ${arg}`);
      }
      if (FLAGS_WITH_VALUE.includes(arg)) i++;
      continue;
    }
    positionalArgs.push(arg);
  }

  const [file, ...extra] = positionalArgs;
  if (file === undefined) {
    throw new Error('Missing file argument');
  }
  if (extra.length > 0) {
    throw new Error(`Unexpected argument: ${extra.join(' ')}`);
  }

  return {
    mode: 'lex',
    file,
    format,
    verbose: argv.includes('--verbose'),
    lineComments: argv.includes('--line-comments'),
    comments: argv.includes('--comments'),
  };
}

/**
 * Read source text from a file, or from stdin for '-'
 *
 * @throws Error if the file does not exist or cannot be read
 */
export async function readSource(file: string): Promise<string> {
  if (file === '-') {
    return fsSync.readFileSync(0, 'utf-8');
  }
  try {
    await fs.access(file);
  } catch {
    throw new Error(`File not found: ${file}`);
  }
  return fs.readFile(file, 'utf-8');
}

/** Everything one run writes, split by stream */
export interface LexReport {
  readonly stdout: string[];
  readonly stderr: string[];
  readonly exitCode: number;
}

/**
 * Tokenize source text and render the output of one run.
 *
 * `human` and `compact` list tokens on stdout and diagnostics on stderr;
 * `json` writes one `{ file, tokens, diagnostics }` document to stdout.
 */
export function lexSource(
  source: string,
  args: Extract<ParsedArgs, { mode: 'lex' }>
): LexReport {
  const result = tokenize(source, {
    allowLineComments: args.lineComments,
    includeComments: args.comments,
  });
  const exitCode = determineExitCode(result);

  if (args.format === 'json') {
    const document = {
      file: args.file,
      tokens: result.tokens.map((token) => ({
        type: token.type,
        lexeme: token.lexeme,
        line: token.span.start.line,
        column: token.span.start.column,
        offset: token.span.start.offset,
        ...(token.value === undefined ? {} : { value: token.value }),
      })),
      diagnostics: result.diagnostics.map((error) =>
        toLspDiagnostic(error.toData())
      ),
    };
    return {
      stdout: [JSON.stringify(document, jsonReplacer, 2)],
      stderr: [],
      exitCode,
    };
  }

  const format = args.format;
  // The human listing stops before EndOfFile
  const listed =
    format === 'human'
      ? result.tokens.filter((token) => token.type !== 'EndOfFile')
      : result.tokens;
  return {
    stdout: listed.map((token) => formatToken(token, format)),
    stderr: result.diagnostics.map((error) =>
      formatError(error, source, {
        format,
        verbose: args.verbose,
        file: args.file === '-' ? '<stdin>' : args.file,
      })
    ),
    exitCode,
  };
}

const USAGE = `Usage:
  c89lex <file.c>               Tokenize a C89 source file
  c89lex -                      Read source from stdin
  c89lex --help                 Show this help message
  c89lex --version              Show version information
  c89lex --explain C89-LXXX     Show diagnostic documentation

Options:
  --format <format>   Output format: human, json, compact (default: human)
  --line-comments     Accept // comments
  --comments          Keep comments as Comment tokens
  --verbose           Include resolution hints under diagnostics

Examples:
  c89lex main.c
  c89lex --format json main.c
  c89lex --explain C89-L003
  echo "int x;" | c89lex -`;

/**
 * Entry point for the c89lex binary
 *
 * Writes tokens to stdout and diagnostics to stderr.
 * Exits 1 on a fatal scan, an unreadable file or a usage error.
 */
export async function main(): Promise<void> {
  try {
    const parsed = parseArgs(process.argv.slice(2));

    switch (parsed.mode) {
      case 'help':
        console.log(USAGE);
        return;

      case 'version':
        console.log(VERSION);
        return;

      case 'explain': {
        const documentation = explainError(parsed.errorId);
        if (documentation === null) {
          console.error(`Invalid error ID: ${parsed.errorId}`);
          console.error(
            'Error ID must be in format C89-L{3-digit}, e.g., C89-L003'
          );
          process.exit(1);
          return;
        }
        console.log(documentation);
        return;
      }

      case 'lex': {
        const source = await readSource(parsed.file);
        const report = lexSource(source, parsed);
        for (const line of report.stdout) console.log(line);
        for (const line of report.stderr) console.error(line);
        process.exit(report.exitCode);
      }
    }
  } catch (err) {
    console.error(
      formatError(err instanceof Error ? err : new Error(String(err)))
    );
    process.exit(1);
  }
}

// Only run main if not in test environment
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  void main();
}
