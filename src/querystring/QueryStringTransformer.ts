/**
 * Query-string transform pipeline: lex → parse → rewrite → serialize.
 *
 * This is the entry point callers use to normalize a user-supplied query
 * string against a field-mapping table and a value-translation table.
 */

import { logger } from '../utils/logger.js';
import type { QueryNode } from './ast.js';
import { isValidIdentifier } from './ast.js';
import { InvalidIdentifierError, LexError, ParseError, QueryStringParseError } from './errors.js';
import { Lexer } from './Lexer.js';
import { Parser } from './Parser.js';
import {
  type FieldMapping,
  type RewriteOptions,
  type ValueTranslations,
  Rewriter,
} from './Rewriter.js';
import { Serializer } from './Serializer.js';

export interface QueryStringTransformerOptions extends RewriteOptions {
  fieldMapping?: FieldMapping;
  valueTranslations?: ValueTranslations;
}

/**
 * Reject mapping tables whose targets would put an invalid identifier into a
 * rewritten tree. Value-translation keys are canonical identifiers too.
 */
function validateTables(fieldMapping: FieldMapping, valueTranslations: ValueTranslations): void {
  for (const [display, canonical] of Object.entries(fieldMapping)) {
    if (!isValidIdentifier(canonical)) {
      throw new InvalidIdentifierError(canonical, `field mapping for "${display}"`);
    }
  }
  for (const field of Object.keys(valueTranslations)) {
    if (!isValidIdentifier(field)) {
      throw new InvalidIdentifierError(field, 'value translations');
    }
  }
}

/**
 * Reusable transformer bound to one pair of mapping tables.
 *
 * The tables are read, never modified; callers must not mutate them while a
 * transform is in flight.
 *
 * @example
 * ```typescript
 * const transformer = new QueryStringTransformer({
 *   fieldMapping: { level: 'severity', state: 'status' },
 *   valueTranslations: { severity: [['1', 'fatal'], ['2', 'warning']] },
 * });
 *
 * transformer.transform('level: fatal AND state: ABNORMAL');
 * // severity: 1 AND status: ABNORMAL
 * ```
 */
export class QueryStringTransformer {
  private readonly rewriter: Rewriter;
  private readonly serializer = new Serializer();

  constructor(options: QueryStringTransformerOptions = {}) {
    const fieldMapping = options.fieldMapping ?? {};
    const valueTranslations = options.valueTranslations ?? {};
    validateTables(fieldMapping, valueTranslations);

    this.rewriter = new Rewriter(fieldMapping, valueTranslations, {
      quoteUntranslatedTerms: options.quoteUntranslatedTerms,
    });
  }

  /**
   * Lex and parse `text`, mapping lexer/parser failures to
   * {@link QueryStringParseError}.
   */
  parse(text: string): QueryNode {
    try {
      const tokens = new Lexer(text).tokenize();
      const ast = new Parser(tokens).parse();
      logger.debug('parse', 'Parsed query string', { text, tokens: tokens.length });
      return ast;
    } catch (error) {
      if (error instanceof LexError || error instanceof ParseError) {
        throw new QueryStringParseError(error.offset, error.message, error);
      }
      throw error;
    }
  }

  /**
   * Transform a query string. Blank input yields an empty string.
   *
   * @throws QueryStringParseError when the text cannot be lexed or parsed
   */
  transform(text: string): string {
    if (!text.trim()) {
      return '';
    }

    const ast = this.parse(text);
    const rewritten = this.rewriter.rewrite(ast);
    const output = this.serializer.serialize(rewritten);

    logger.debug('rewrite', 'Transformed query string', {
      input: text,
      output,
      changed: rewritten !== ast,
    });
    return output;
  }
}

/**
 * One-shot transform with explicit tables.
 *
 * @throws QueryStringParseError when the text cannot be lexed or parsed
 * @throws InvalidIdentifierError when a mapping target is not an identifier
 */
export function transform(
  text: string,
  fieldMapping: FieldMapping,
  valueTranslations: ValueTranslations,
  options?: RewriteOptions
): string {
  return new QueryStringTransformer({ fieldMapping, valueTranslations, ...options }).transform(text);
}
