/**
 * Recursive-descent parser for the query-string language.
 *
 * @remarks
 * **Grammar:**
 * ```
 * Query     := OrExpr EOF
 * OrExpr    := AndExpr ('OR' AndExpr)*
 * AndExpr   := Unary (('AND')? Unary)*          adjacent atoms are joined with AND
 * Unary     := 'NOT' Unary | Primary
 * Primary   := '(' OrExpr ')' | FIELD ':' FieldRhs | VALUE | REGEX
 * FieldRhs  := ('>' | '>=' | '<' | '<=') VALUE
 *            | ('[' | '{') VALUE 'TO' VALUE (']' | '}')
 *            | '(' OrExpr ')'                   values inside inherit the field
 *            | VALUE | REGEX
 * ```
 *
 * Precedence, loosest first: `OR`, `AND`, `NOT`. Connectives produce n-ary
 * groups rather than binary chains. The parser never recovers from an error:
 * the first violation fails the whole input.
 */

import {
  type Bound,
  type QueryNode,
  type RangeNode,
  group,
  isValidIdentifier,
  literal,
  not,
  range,
  raw,
  term,
} from './ast.js';
import { ParseError } from './errors.js';
import type { ComparisonOperator, FieldToken, Token, TokenType, ValueToken } from './Lexer.js';

function describe(token: Token): string {
  if (token.type === 'EOF') return 'end of input';
  if (token.type === 'VALUE') return `value "${token.value}"`;
  return `'${token.value}'`;
}

export class Parser {
  private tokens: Token[];
  private current = 0;

  constructor(tokens: Token[]) {
    this.tokens = tokens;
  }

  private peek(): Token {
    return this.tokens[this.current];
  }

  private advance(): Token {
    if (this.current < this.tokens.length - 1) {
      return this.tokens[this.current++];
    }
    return this.tokens[this.tokens.length - 1]; // EOF
  }

  private match(...types: TokenType[]): boolean {
    return types.includes(this.peek().type);
  }

  private fail(expected: string, token: Token = this.peek(), hint?: string): never {
    throw new ParseError({
      offset: token.position,
      expected,
      found: describe(token),
      hint,
    });
  }

  /**
   * Parse the whole token stream.
   */
  parse(): QueryNode {
    if (this.match('EOF')) {
      this.fail('a query');
    }
    const expr = this.parseOrExpression();
    if (this.match('RPAREN')) {
      this.fail('end of input', this.peek(), "Remove the extra ')' or add the matching '('");
    }
    if (!this.match('EOF')) {
      this.fail('end of input');
    }
    return expr;
  }

  private parseOrExpression(field?: string): QueryNode {
    const children = [this.parseAndExpression(field)];

    while (this.match('OR')) {
      this.advance(); // consume OR
      children.push(this.parseAndExpression(field));
    }

    return children.length === 1 ? children[0] : group('OR', children);
  }

  private parseAndExpression(field?: string): QueryNode {
    const children = [this.parseUnary(field)];

    while (true) {
      if (this.match('AND')) {
        this.advance(); // consume AND
        children.push(this.parseUnary(field));
        continue;
      }
      // implicit AND between adjacent atoms
      if (this.startsOperand()) {
        children.push(this.parseUnary(field));
        continue;
      }
      break;
    }

    return children.length === 1 ? children[0] : group('AND', children);
  }

  private startsOperand(): boolean {
    return this.match('NOT', 'LPAREN', 'FIELD', 'VALUE', 'REGEX', 'OPERATOR', 'RANGE_OPEN');
  }

  private parseUnary(field?: string): QueryNode {
    if (this.match('NOT')) {
      this.advance(); // consume NOT
      return not(this.parseUnary(field));
    }
    return this.parsePrimary(field);
  }

  private parsePrimary(field?: string): QueryNode {
    const token = this.peek();

    switch (token.type) {
      case 'LPAREN': {
        const inner = this.parseParenthesized(field);
        // keep explicit parentheses around a single operand
        return inner.type === 'group' ? inner : group('AND', [inner]);
      }
      case 'FIELD': {
        if (field !== undefined) {
          this.fail('a value', token, `Field "${token.value}" cannot appear inside the value list of "${field}"`);
        }
        return this.parseFieldExpression(token);
      }
      case 'VALUE': {
        this.advance();
        return term(field, literal(token.value, token.quoted), token.wildcard);
      }
      case 'REGEX': {
        this.advance();
        return raw(field === undefined ? token.value : `${field}: ${token.value}`);
      }
      case 'OPERATOR':
      case 'RANGE_OPEN': {
        if (field === undefined) {
          this.fail('a field before the comparison', token, 'Write comparisons as field: >=value or field: [a TO b]');
        }
        return this.parseFieldValue(field);
      }
      case 'TO':
        return this.fail('a term', token, 'TO is only valid between the bounds of a range: field: [a TO b]');
      case 'AND':
      case 'OR':
        return this.fail('a term', token, `'${token.value}' needs an operand on both sides`);
      case 'RPAREN':
        return this.fail('a term', token, "Empty parentheses or a stray ')'");
      default:
        return this.fail('a term', token);
    }
  }

  private parseParenthesized(field?: string): QueryNode {
    const open = this.advance(); // consume (
    if (this.match('RPAREN')) {
      this.fail('a term', this.peek(), "Empty parentheses or a stray ')'");
    }
    const expr = this.parseOrExpression(field);
    if (!this.match('RPAREN')) {
      throw new ParseError({
        offset: open.position,
        expected: "')'",
        found: describe(this.peek()),
        message: `Unbalanced '(' at character offset ${open.position}: expected ')' but found ${describe(this.peek())}`,
        hint: "Close the group with ')'",
      });
    }
    this.advance(); // consume )
    return expr;
  }

  private parseFieldExpression(fieldToken: FieldToken): QueryNode {
    if (!isValidIdentifier(fieldToken.value)) {
      this.fail('an identifier', fieldToken, 'Field names start with a letter or underscore and contain only letters, digits, underscores and dots');
    }
    this.advance(); // consume field

    const colon = this.peek();
    if (colon.type !== 'OPERATOR' || colon.value !== ':') {
      this.fail("':'");
    }
    this.advance(); // consume :

    if (this.match('LPAREN')) {
      const inner = this.parseParenthesized(fieldToken.value);
      return inner.type === 'group' ? inner : group('AND', [inner]);
    }

    return this.parseFieldValue(fieldToken.value);
  }

  /**
   * The right-hand side of `field:` once grouping has been ruled out.
   */
  private parseFieldValue(field: string): QueryNode {
    const token = this.peek();

    if (token.type === 'OPERATOR') {
      if (token.value === ':') {
        this.fail('a value', token);
      }
      this.advance();
      return this.comparisonRange(field, token.value, this.expectValue());
    }

    if (token.type === 'RANGE_OPEN') {
      return this.parseRange(field);
    }

    if (token.type === 'VALUE') {
      this.advance();
      return term(field, literal(token.value, token.quoted), token.wildcard);
    }

    if (token.type === 'REGEX') {
      this.advance();
      return raw(`${field}: ${token.value}`);
    }

    return this.fail('a value', token);
  }

  private comparisonRange(field: string, op: Exclude<ComparisonOperator, ':'>, value: ValueToken): RangeNode {
    const bound: Bound = {
      value: literal(value.text, value.quoted),
      inclusive: op === '>=' || op === '<=',
    };
    return op === '>' || op === '>=' ? range(field, bound) : range(field, undefined, bound);
  }

  private parseRange(field: string): RangeNode {
    const open = this.advance();
    if (open.type !== 'RANGE_OPEN') {
      return this.fail("'[' or '{'", open);
    }

    const lower = this.expectValue();
    if (!this.match('TO')) {
      this.fail("'TO'", this.peek(), 'Ranges are written as [lower TO upper]');
    }
    this.advance(); // consume TO
    const upper = this.expectValue();

    const close = this.peek();
    if (close.type !== 'RANGE_CLOSE') {
      return this.fail("']' or '}'", close);
    }
    this.advance();

    return range(field, this.toBound(lower, open.inclusive), this.toBound(upper, close.inclusive));
  }

  /**
   * A bare, unescaped `*` leaves that side of the range open. Bounds are never
   * patterns, so any other wildcard marker is kept as literal text.
   */
  private toBound(token: ValueToken, inclusive: boolean): Bound | undefined {
    if (token.wildcard && token.value === '*') {
      return undefined;
    }
    return { value: literal(token.text, token.quoted), inclusive };
  }

  private expectValue(): ValueToken {
    const token = this.peek();
    if (token.type !== 'VALUE') {
      return this.fail('a value', token);
    }
    this.advance();
    return token;
  }
}

/**
 * Parse a token list produced by the lexer into an AST.
 */
export function parse(tokens: Token[]): QueryNode {
  return new Parser(tokens).parse();
}
