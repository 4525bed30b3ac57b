/**
 * Error Registry
 * Central definition of every lexical diagnostic, with template rendering.
 */

// ============================================================
// SEVERITY AND KINDS
// ============================================================

/**
 * Diagnostic severity.
 * - fatal: scanning stops
 * - error: the offending text becomes an Invalid token, scanning continues
 * - warning: the token is kept as-is
 */
export type ErrorSeverity = 'fatal' | 'error' | 'warning';

export type DiagnosticKind =
  | 'UnterminatedComment'
  | 'UnknownCharacter'
  | 'InvalidNumericConstant'
  | 'UnterminatedCharacterConstant'
  | 'UnterminatedStringLiteral'
  | 'EmptyCharacterConstant'
  | 'InvalidEscapeSequence'
  | 'MultiCharacterConstant'
  | 'EscapeOutOfRange'
  | 'ScannerStalled';

/**
 * Example demonstrating an error condition.
 * Used by `--explain` to show common scenarios.
 */
export interface ErrorExample {
  readonly description: string;
  readonly code: string;
}

/** Registry entry containing all metadata for a single diagnostic */
export interface ErrorDefinition {
  /** Format: C89-L{3-digit} (e.g., C89-L003) */
  readonly errorId: string;
  readonly kind: DiagnosticKind;
  readonly severity: ErrorSeverity;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  readonly cause?: string | undefined;
  readonly resolution?: string | undefined;
  readonly examples?: readonly ErrorExample[] | undefined;
}

/** Pattern every registered error ID follows */
export const ERROR_ID_PATTERN = /^C89-L\d{3}$/;

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Lookup table for all diagnostic definitions.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  byKind(kind: DiagnosticKind): ErrorDefinition;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;
  private readonly kinds: ReadonlyMap<DiagnosticKind, ErrorDefinition>;

  constructor(definitions: readonly ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();
    const kindMap = new Map<DiagnosticKind, ErrorDefinition>();

    for (const def of definitions) {
      idMap.set(def.errorId, Object.freeze(def));
      kindMap.set(def.kind, def);
    }

    this.byId = idMap;
    this.kinds = kindMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  byKind(kind: DiagnosticKind): ErrorDefinition {
    const def = this.kinds.get(kind);
    if (!def) {
      throw new TypeError(`No error registered for kind: ${kind}`);
    }
    return def;
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

const ERROR_DEFINITIONS: readonly ErrorDefinition[] = [
  {
    errorId: 'C89-L001',
    kind: 'UnterminatedComment',
    severity: 'fatal',
    description: 'Unterminated block comment',
    messageTemplate: 'Unterminated block comment',
    cause:
      'A block comment opened with /* reaches the end of the file without a closing */. Block comments do not nest.',
    resolution:
      'Close the comment with */. If the comment contains another /*, the first */ already ends it.',
    examples: [
      {
        description: 'Comment never closed',
        code: 'int x; /* trailing note',
      },
      {
        description: 'Nested comment closes early',
        code: '/* outer /* inner */ still outer */',
      },
    ],
  },
  {
    errorId: 'C89-L002',
    kind: 'UnknownCharacter',
    severity: 'error',
    description: 'Unknown character',
    messageTemplate: 'Unknown character {char} ({code})',
    cause:
      'The character is not part of the C89 source character set outside of comments, character constants and string literals.',
    resolution:
      'Remove the character or move it into a string literal or comment. # is only valid at the start of a line.',
    examples: [
      {
        description: 'Dollar sign in an identifier',
        code: 'int $count;',
      },
      {
        description: 'Stray @',
        code: 'x = a @ b;',
      },
    ],
  },
  {
    errorId: 'C89-L003',
    kind: 'InvalidNumericConstant',
    severity: 'error',
    description: 'Invalid numeric constant',
    messageTemplate: 'Invalid numeric constant {lexeme}: {reason}',
    cause:
      'The constant has a suffix C89 does not define, a digit outside its base, an exponent without digits, or 0x without hex digits.',
    resolution:
      'Integer suffixes are u, l, ul and lu in any case; floating suffixes are f and l. Octal constants use digits 0-7 only.',
    examples: [
      {
        description: 'Digit 8 in an octal constant',
        code: 'int mode = 08;',
      },
      {
        description: 'long long suffix',
        code: 'long n = 10LL;',
      },
      {
        description: 'Exponent without digits',
        code: 'double d = 1e+;',
      },
    ],
  },
  {
    errorId: 'C89-L004',
    kind: 'UnterminatedCharacterConstant',
    severity: 'error',
    description: 'Unterminated character constant',
    messageTemplate: 'Unterminated character constant {lexeme}',
    cause:
      'A character constant opened with a single quote reaches the end of the line or file before its closing quote.',
    resolution: "Add the closing quote. Write a literal quote as '\\''.",
    examples: [
      {
        description: 'Missing closing quote',
        code: "char c = 'a;",
      },
    ],
  },
  {
    errorId: 'C89-L005',
    kind: 'UnterminatedStringLiteral',
    severity: 'error',
    description: 'Unterminated string literal',
    messageTemplate: 'Unterminated string literal {lexeme}',
    cause:
      'A string literal opened with a double quote reaches the end of the line or file before its closing quote.',
    resolution:
      'Add the closing quote. To continue a string on the next line, end the line with a backslash or use adjacent literals.',
    examples: [
      {
        description: 'Missing closing quote',
        code: 'puts("hello);',
      },
      {
        description: 'Newline inside a string',
        code: 'char *s = "first\nsecond";',
      },
    ],
  },
  {
    errorId: 'C89-L006',
    kind: 'EmptyCharacterConstant',
    severity: 'error',
    description: 'Empty character constant',
    messageTemplate: "Empty character constant ''",
    cause: 'Two single quotes with nothing between them.',
    resolution: "Put a character between the quotes, for example '\\0'.",
    examples: [
      {
        description: 'Empty constant',
        code: "char c = '';",
      },
    ],
  },
  {
    errorId: 'C89-L007',
    kind: 'InvalidEscapeSequence',
    severity: 'error',
    description: 'Invalid escape sequence',
    messageTemplate: 'Invalid escape sequence {sequence}',
    cause:
      'A backslash inside a character constant or string literal is followed by a character that does not start an escape.',
    resolution:
      'Use one of \\n \\t \\v \\b \\r \\f \\a \\\\ \\? \\\' \\", an octal escape \\ooo or a hex escape \\xhh. Write a literal backslash as \\\\.',
    examples: [
      {
        description: 'Unknown escape letter',
        code: 'printf("100\\%");',
      },
      {
        description: 'Hex escape without digits',
        code: "char c = '\\x';",
      },
    ],
  },
  {
    errorId: 'C89-L008',
    kind: 'MultiCharacterConstant',
    severity: 'warning',
    description: 'Multi-character constant',
    messageTemplate: 'Multi-character constant {lexeme}{detail}',
    cause:
      'A character constant holds more than one character. Its value is implementation-defined.',
    resolution: 'Use a string literal, or a single character.',
    examples: [
      {
        description: 'Two characters',
        code: "int tag = 'ab';",
      },
    ],
  },
  {
    errorId: 'C89-L009',
    kind: 'EscapeOutOfRange',
    severity: 'warning',
    description: 'Escape sequence out of range',
    messageTemplate: 'Escape sequence {sequence} is out of range',
    cause:
      'A numeric escape denotes a value above 0xFF and is truncated to its low byte.',
    resolution:
      'Use at most two hex digits, or end the escape by splitting the literal: "\\x41" "BC".',
    examples: [
      {
        description: 'Hex escape swallowing following letters',
        code: 'char *s = "\\x41BC";',
      },
    ],
  },
  {
    errorId: 'C89-L010',
    kind: 'ScannerStalled',
    severity: 'fatal',
    description: 'Scanner made no progress',
    messageTemplate: 'Scanner made no progress at offset {offset}',
    cause:
      'Internal invariant violation: a scan step returned a token without consuming input.',
    resolution: 'Report the input that triggers this as a bug.',
  },
];

/** All diagnostic definitions indexed by error ID */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Replaces `{name}` placeholders in a message template with context values.
 *
 * Missing context values render as empty strings. A `{{` sequence is kept
 * literally, and a template with an unclosed brace is returned unchanged.
 *
 * @example
 * renderMessage('Invalid escape sequence {sequence}', { sequence: '\\q' })
 * // Returns: "Invalid escape sequence \q"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template[i] ?? '';

    if (char === '{' && template[i + 1] !== '{') {
      const close = template.indexOf('}', i + 1);
      if (close === -1) {
        return template;
      }

      const value = context[template.slice(i + 1, close)];
      if (value !== undefined) {
        result += String(value);
      }
      i = close + 1;
      continue;
    }

    if (char === '{') {
      // Escaped brace: keep both characters
      result += '{{';
      i += 2;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
