export type {
  BooleanOp,
  Bound,
  GroupNode,
  Literal,
  NotNode,
  QueryNode,
  RangeNode,
  RawNode,
  TermNode,
} from './ast.js';
export { combine, group, isValidIdentifier, literal, not, range, raw, term } from './ast.js';

export {
  InvalidConditionError,
  InvalidIdentifierError,
  InvariantError,
  LexError,
  ParseError,
  QueryStringError,
  QueryStringParseError,
  UnsupportedOperatorError,
} from './errors.js';
export type { QueryStringStage } from './errors.js';

export {
  RESERVED_CHARACTERS,
  escapeLiteral,
  escapeQueryString,
  escapeRegexLiteral,
  escapeWildcardPattern,
  quote,
  unquote,
} from './escaping.js';

export { Lexer, tokenize } from './Lexer.js';
export type { Token, TokenType } from './Lexer.js';
export { Parser, parse } from './Parser.js';
export { Rewriter, rewrite } from './Rewriter.js';
export type { FieldMapping, RewriteOptions, ValueTranslation, ValueTranslations } from './Rewriter.js';
export { Serializer, serialize } from './Serializer.js';
export { QueryStringBuilder, build, buildQueryNode } from './QueryStringBuilder.js';
export type { ConditionNodeParser, QueryStringBuilderOptions } from './QueryStringBuilder.js';
export { QueryStringTransformer, transform } from './QueryStringTransformer.js';
export type { QueryStringTransformerOptions } from './QueryStringTransformer.js';
export { LOOKUP_ALIASES, Q } from './Q.js';
export type { QValue } from './Q.js';
