import { LexError } from './errors.js';
import { RESERVED_CHARACTERS, WILDCARD_CHARACTERS, isWhitespace } from './escaping.js';

// ============================================================================
// Token Types
// ============================================================================

export type TokenType =
  | 'FIELD'
  | 'OPERATOR'
  | 'VALUE'
  | 'REGEX'
  | 'LPAREN'
  | 'RPAREN'
  | 'AND'
  | 'OR'
  | 'NOT'
  | 'RANGE_OPEN'
  | 'RANGE_CLOSE'
  | 'TO'
  | 'EOF';

export type ComparisonOperator = ':' | '>' | '>=' | '<' | '<=';

interface TokenBase {
  /** Offset of the first character of the lexeme in the input */
  position: number;
}

export interface FieldToken extends TokenBase {
  type: 'FIELD';
  value: string;
}

export interface OperatorToken extends TokenBase {
  type: 'OPERATOR';
  value: ComparisonOperator;
}

export interface ValueToken extends TokenBase {
  type: 'VALUE';
  /** Unescaped text, or a wildcard pattern when `wildcard` is set */
  value: string;
  /** Unescaped text, whatever `wildcard` says */
  text: string;
  quoted: boolean;
  wildcard: boolean;
}

export interface RegexToken extends TokenBase {
  type: 'REGEX';
  /** The literal including its `/` delimiters, escapes untouched */
  value: string;
}

export interface RangeToken extends TokenBase {
  type: 'RANGE_OPEN' | 'RANGE_CLOSE';
  value: '[' | ']' | '{' | '}';
  inclusive: boolean;
}

export interface SymbolToken extends TokenBase {
  type: 'LPAREN' | 'RPAREN' | 'AND' | 'OR' | 'NOT' | 'TO' | 'EOF';
  value: string;
}

export type Token = FieldToken | OperatorToken | ValueToken | RegexToken | RangeToken | SymbolToken;

const KEYWORDS: Record<string, 'AND' | 'OR' | 'NOT' | 'TO'> = {
  AND: 'AND',
  OR: 'OR',
  NOT: 'NOT',
  TO: 'TO',
};

/** Reserved characters Lucene accepts inside a term once it has started. */
const TERM_BODY_CHARACTERS: ReadonlySet<string> = new Set(['+', '-', '=', '!', '&', '|', '~', '^', '/']);

/** Characters that always end a bare word. */
const WORD_TERMINATORS: ReadonlySet<string> = new Set(['(', ')', ':', '[', ']', '{', '}', '"', '<', '>']);

function isControlCharacter(ch: string): boolean {
  const code = ch.charCodeAt(0);
  return code < 0x20 || code === 0x7f;
}

// ============================================================================
// Lexer
// ============================================================================

/**
 * Converts query-string text into a flat token list.
 *
 * Lexes quoted phrases, bare words (with backslash escapes and wildcard
 * detection), `field:` prefixes, comparison operators, range brackets,
 * regex literals and the `AND`/`OR`/`NOT`/`TO` keywords.
 */
export class Lexer {
  private pos = 0;
  private input: string;
  private openRange: { position: number } | null = null;

  constructor(input: string) {
    this.input = input;
  }

  private peek(offset = 0): string {
    return this.input[this.pos + offset] || '';
  }

  private advance(): string {
    return this.input[this.pos++] || '';
  }

  private skipWhitespace(): void {
    while (this.pos < this.input.length && isWhitespace(this.peek())) {
      this.advance();
    }
  }

  tokenize(): Token[] {
    const tokens: Token[] = [];

    while (this.pos < this.input.length) {
      this.skipWhitespace();

      if (this.pos >= this.input.length) {
        break;
      }

      const startPos = this.pos;
      const ch = this.peek();

      if (ch === '(') {
        this.advance();
        tokens.push({ type: 'LPAREN', value: '(', position: startPos });
        continue;
      }

      if (ch === ')') {
        this.advance();
        tokens.push({ type: 'RPAREN', value: ')', position: startPos });
        continue;
      }

      if (ch === '[' || ch === '{') {
        if (this.openRange) {
          throw new LexError(
            startPos,
            `Unexpected '${ch}' inside a range opened at character offset ${this.openRange.position}`,
            'Ranges cannot be nested; close the first range with ] or }'
          );
        }
        this.advance();
        this.openRange = { position: startPos };
        tokens.push({ type: 'RANGE_OPEN', value: ch, inclusive: ch === '[', position: startPos });
        continue;
      }

      if (ch === ']' || ch === '}') {
        if (!this.openRange) {
          throw new LexError(startPos, `Unbalanced '${ch}'`, 'Escape the bracket (\\' + ch + ') to search for it literally');
        }
        this.advance();
        this.openRange = null;
        tokens.push({ type: 'RANGE_CLOSE', value: ch, inclusive: ch === ']', position: startPos });
        continue;
      }

      if (ch === ':') {
        this.advance();
        tokens.push({ type: 'OPERATOR', value: ':', position: startPos });
        continue;
      }

      if (ch === '>' || ch === '<') {
        this.advance();
        if (this.peek() === '=') {
          this.advance();
          tokens.push({ type: 'OPERATOR', value: ch === '>' ? '>=' : '<=', position: startPos });
        } else {
          tokens.push({ type: 'OPERATOR', value: ch, position: startPos });
        }
        continue;
      }

      if (ch === '"') {
        tokens.push(this.readQuoted());
        continue;
      }

      if (ch === '/') {
        tokens.push(this.readRegex());
        continue;
      }

      if (RESERVED_CHARACTERS.has(ch) && ch !== '\\' && !WILDCARD_CHARACTERS.has(ch)) {
        throw new LexError(
          startPos,
          `Unexpected character '${ch}'`,
          `Escape reserved characters with a backslash (\\${ch}) or wrap the value in double quotes`
        );
      }

      tokens.push(this.readWord(tokens));
    }

    if (this.openRange) {
      throw new LexError(
        this.openRange.position,
        'Unbalanced range bracket',
        'Close the range with ] (inclusive) or } (exclusive)'
      );
    }

    tokens.push({ type: 'EOF', value: '', position: this.pos });
    return tokens;
  }

  /**
   * Read a double-quoted phrase. Any backslash-escaped character is taken literally.
   */
  private readQuoted(): ValueToken {
    const startPos = this.pos;
    this.advance(); // skip opening "

    let value = '';
    while (this.pos < this.input.length && this.peek() !== '"') {
      const ch = this.advance();
      if (ch === '\\') {
        if (this.pos >= this.input.length) break;
        value += this.advance();
      } else {
        value += ch;
      }
    }

    if (this.peek() !== '"') {
      throw new LexError(startPos, 'Unterminated quoted value', 'Close the value with a double quote (")');
    }

    this.advance(); // skip closing "
    return { type: 'VALUE', value, text: value, quoted: true, wildcard: false, position: startPos };
  }

  /**
   * Read a `/.../` regex literal verbatim, delimiters included.
   */
  private readRegex(): RegexToken {
    const startPos = this.pos;
    let value = this.advance();

    while (this.pos < this.input.length && this.peek() !== '/') {
      const ch = this.advance();
      value += ch;
      if (ch === '\\' && this.pos < this.input.length) {
        value += this.advance();
      }
    }

    if (this.peek() !== '/') {
      throw new LexError(startPos, 'Unterminated regular expression', 'Close the expression with a slash (/)');
    }

    value += this.advance();
    return { type: 'REGEX', value, position: startPos };
  }

  /**
   * Read a bare word: a field name when directly followed by `:`, a keyword,
   * or a value.
   *
   * Two spellings are collected at once because wildcard-ness is only known
   * once the word ends: the fully unescaped text, and a pattern in which
   * escaped `*`, `?` and `\` keep their backslash.
   */
  private readWord(previous: Token[]): Token {
    const startPos = this.pos;
    let text = '';
    let pattern = '';
    let wildcard = false;

    while (this.pos < this.input.length) {
      const ch = this.peek();

      if (ch === '\\') {
        const escaped = this.peek(1);
        if (!escaped) {
          throw new LexError(this.pos, 'Dangling escape character', 'Escape the backslash itself (\\\\)');
        }
        this.pos += 2;
        text += escaped;
        pattern += WILDCARD_CHARACTERS.has(escaped) || escaped === '\\' ? `\\${escaped}` : escaped;
        continue;
      }

      if (isWhitespace(ch) || WORD_TERMINATORS.has(ch)) {
        break;
      }

      if (isControlCharacter(ch)) {
        throw new LexError(
          this.pos,
          `Control character U+${ch.charCodeAt(0).toString(16).padStart(4, '0').toUpperCase()} in value`,
          'Remove the character or wrap the value in double quotes'
        );
      }

      if (RESERVED_CHARACTERS.has(ch) && !WILDCARD_CHARACTERS.has(ch) && !TERM_BODY_CHARACTERS.has(ch)) {
        break;
      }

      if (WILDCARD_CHARACTERS.has(ch)) {
        wildcard = true;
      }

      this.advance();
      text += ch;
      pattern += ch;
    }

    const rawWord = this.input.slice(startPos, this.pos);

    // field name: word immediately followed by ':' and not itself a field value
    const previousToken = previous[previous.length - 1];
    const followsFieldOperator = previousToken?.type === 'OPERATOR';
    if (this.peek() === ':' && !followsFieldOperator) {
      return { type: 'FIELD', value: text, position: startPos };
    }

    if (Object.prototype.hasOwnProperty.call(KEYWORDS, rawWord)) {
      return { type: KEYWORDS[rawWord], value: rawWord, position: startPos };
    }

    return {
      type: 'VALUE',
      value: wildcard ? pattern : text,
      text,
      quoted: false,
      wildcard,
      position: startPos,
    };
  }
}

/**
 * Convenience wrapper around {@link Lexer}.
 */
export function tokenize(text: string): Token[] {
  return new Lexer(text).tokenize();
}
