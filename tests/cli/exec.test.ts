/**
 * CLI argument parsing, source reading and output
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import {
  lexSource,
  type ParsedArgs,
  parseArgs,
  readSource,
} from '../../src/cli.js';

type LexArgs = Extract<ParsedArgs, { mode: 'lex' }>;

function lexArgs(overrides: Partial<LexArgs> = {}): LexArgs {
  return {
    mode: 'lex',
    file: 'main.c',
    format: 'human',
    verbose: false,
    lineComments: false,
    comments: false,
    ...overrides,
  };
}

describe('parseArgs', () => {
  it('parses a file with defaults', () => {
    expect(parseArgs(['main.c'])).toEqual(lexArgs());
  });

  it('parses options in any position', () => {
    expect(
      parseArgs([
        '--format',
        'compact',
        'main.c',
        '--line-comments',
        '--comments',
        '--verbose',
      ])
    ).toEqual(
      lexArgs({
        format: 'compact',
        lineComments: true,
        comments: true,
        verbose: true,
      })
    );
  });

  it('accepts - for stdin', () => {
    expect(parseArgs(['-'])).toEqual(lexArgs({ file: '-' }));
  });

  it('detects help, version and explain', () => {
    expect(parseArgs(['main.c', '-h'])).toEqual({ mode: 'help' });
    expect(parseArgs(['--version'])).toEqual({ mode: 'version' });
    expect(parseArgs(['--explain', 'C89-L003'])).toEqual({
      mode: 'explain',
      errorId: 'C89-L003',
    });
  });

  it('rejects a missing error ID after --explain', () => {
    expect(() => parseArgs(['--explain'])).toThrow(
      'Missing error ID after --explain'
    );
  });

  it('rejects an unknown --format value', () => {
    expect(() => parseArgs(['--format', 'xml', 'main.c'])).toThrow(
      'Invalid --format value: xml. Must be one of: human, json, compact'
    );
  });

  it('rejects unknown options', () => {
    expect(() => parseArgs(['--fast', 'main.c'])).toThrow(
      'Unknown option: --fast'
    );
  });

  it('requires exactly one file', () => {
    expect(() => parseArgs([])).toThrow('Missing file argument');
    expect(() => parseArgs(['a.c', 'b.c'])).toThrow(
      'Unexpected argument: b.c'
    );
  });
});

describe('readSource', () => {
  let dir = '';

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'c89lex-'));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads a file', async () => {
    const file = join(dir, 'main.c');
    writeFileSync(file, 'int x;\n');

    await expect(readSource(file)).resolves.toBe('int x;\n');
  });

  it('rejects a missing file', async () => {
    const file = join(dir, 'absent.c');

    await expect(readSource(file)).rejects.toThrow(`File not found: ${file}`);
  });
});

describe('lexSource', () => {
  it('lists tokens in human format', () => {
    expect(lexSource('int x;', lexArgs())).toEqual({
      stdout: [
        '(1, Keyword, int)',
        '(1, Identifier, x)',
        '(1, Punctuator, ;)',
      ],
      stderr: [],
      exitCode: 0,
    });
  });

  it('leaves EndOfFile out of the human listing', () => {
    expect(lexSource('a\n', lexArgs()).stdout).toEqual(['(1, Identifier, a)']);
    expect(lexSource('', lexArgs()).stdout).toEqual([]);
  });

  it('lists tokens in compact format', () => {
    expect(lexSource('x', lexArgs({ format: 'compact' })).stdout).toEqual([
      '1:1\tIdentifier\tx',
      '1:2\tEndOfFile\t',
    ]);
  });

  it('writes diagnostics to stderr and exits 0 on recoverable errors', () => {
    const report = lexSource('@', lexArgs({ format: 'compact' }));

    expect(report.stderr).toEqual([
      "main.c:1:1: error[C89-L002] Unknown character '@' (U+0040)",
    ]);
    expect(report.exitCode).toBe(0);
  });

  it('exits 1 on a fatal scan', () => {
    const report = lexSource('int /* open', lexArgs());

    expect(report.stdout).toEqual(['(1, Keyword, int)']);
    expect(report.stderr[0]?.split('\n')[0]).toBe(
      'fatal[C89-L001]: Unterminated block comment'
    );
    expect(report.exitCode).toBe(1);
  });

  it('names stdin in diagnostics', () => {
    const report = lexSource('@', lexArgs({ file: '-', format: 'compact' }));

    expect(report.stderr[0]).toMatch(/^<stdin>:1:1: /);
  });

  it('applies the comment options', () => {
    const report = lexSource(
      'a // b',
      lexArgs({ lineComments: true, comments: true })
    );

    expect(report.stdout).toEqual([
      '(1, Identifier, a)',
      '(1, Comment, // b)',
    ]);
  });

  it('writes one json document with tokens and LSP diagnostics', () => {
    const report = lexSource('n = 1; @', lexArgs({ format: 'json' }));
    const [output] = report.stdout;
    if (output === undefined) throw new Error('missing output');
    const document: unknown = JSON.parse(output);

    expect(report.stderr).toEqual([]);
    expect(document).toMatchObject({
      file: 'main.c',
      diagnostics: [
        {
          code: 'C89-L002',
          severity: 1,
          range: {
            start: { line: 0, character: 7 },
            end: { line: 0, character: 8 },
          },
        },
      ],
    });
    expect(document).toHaveProperty(['tokens', 2], {
      type: 'IntegerConstant',
      lexeme: '1',
      line: 1,
      column: 5,
      offset: 4,
      value: {
        kind: 'integer',
        value: '1',
        radix: 10,
        unsigned: false,
        long: false,
      },
    });
  });
});
