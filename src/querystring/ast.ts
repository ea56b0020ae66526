/**
 * AST shared by the parser, rewriter, serializer and builder.
 *
 * Nodes are plain immutable objects; the rewriter produces new trees rather
 * than editing existing ones, so a parsed tree can be reused across calls.
 */

export type BooleanOp = 'AND' | 'OR';

/**
 * A value as written in a query string.
 *
 * For wildcard terms `text` is a pattern: `*` and `?` are wildcards and a
 * literal `*`, `?` or `\` stays backslash-escaped.
 */
export interface Literal {
  readonly text: string;
  readonly quoted: boolean;
}

export interface Bound {
  readonly value: Literal;
  readonly inclusive: boolean;
}

/** `field: value`, or a bare value when `field` is absent. */
export interface TermNode {
  readonly type: 'term';
  readonly field?: string;
  readonly value: Literal;
  readonly isWildcard: boolean;
}

/** `field: [a TO b]` or one-sided `field: >=a`. */
export interface RangeNode {
  readonly type: 'range';
  readonly field: string;
  readonly lower?: Bound;
  readonly upper?: Bound;
}

export interface NotNode {
  readonly type: 'not';
  readonly inner: QueryNode;
}

/** Ordered children joined by one boolean operator. Never empty. */
export interface GroupNode {
  readonly type: 'group';
  readonly op: BooleanOp;
  readonly children: readonly QueryNode[];
}

/** Verbatim text the engine does not model (regex clauses). */
export interface RawNode {
  readonly type: 'raw';
  readonly text: string;
}

export type QueryNode = TermNode | RangeNode | NotNode | GroupNode | RawNode;

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_.]*$/;

export function isValidIdentifier(value: string): boolean {
  return IDENTIFIER_PATTERN.test(value);
}

export function literal(text: string, quoted = false): Literal {
  return { text, quoted };
}

export function term(field: string | undefined, value: Literal, isWildcard = false): TermNode {
  return field === undefined
    ? { type: 'term', value, isWildcard }
    : { type: 'term', field, value, isWildcard };
}

export function range(field: string, lower?: Bound, upper?: Bound): RangeNode {
  const node: { type: 'range'; field: string; lower?: Bound; upper?: Bound } = {
    type: 'range',
    field,
  };
  if (lower) node.lower = lower;
  if (upper) node.upper = upper;
  return node;
}

export function not(inner: QueryNode): NotNode {
  return { type: 'not', inner };
}

export function group(op: BooleanOp, children: readonly QueryNode[]): GroupNode {
  return { type: 'group', op, children };
}

export function raw(text: string): RawNode {
  return { type: 'raw', text };
}

/**
 * Join nodes with `op`, returning the node itself when there is only one.
 */
export function combine(op: BooleanOp, nodes: readonly QueryNode[]): QueryNode | undefined {
  if (nodes.length === 0) return undefined;
  if (nodes.length === 1) return nodes[0];
  return group(op, nodes);
}
