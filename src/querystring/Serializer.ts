import type { BooleanOp, Bound, GroupNode, Literal, QueryNode, RangeNode, TermNode } from './ast.js';
import { InvariantError } from './errors.js';
import { BOOLEAN_KEYWORDS, escapeLiteral, isWhitespace, quote } from './escaping.js';

/**
 * Emits query-string text for an AST.
 *
 * Output is semantically equivalent to the tree, not byte-identical to any
 * original input: parentheses are written only where the boolean operator
 * changes, or where a single-child group records explicit grouping.
 */
export class Serializer {
  serialize(node: QueryNode): string {
    return this.serializeNode(node);
  }

  private serializeNode(node: QueryNode, parentOp?: BooleanOp): string {
    switch (node.type) {
      case 'term':
        return this.serializeTerm(node);
      case 'range':
        return this.serializeRange(node);
      case 'raw':
        return node.text;
      case 'not':
        return `NOT ${this.serializeNegated(node.inner)}`;
      case 'group':
        return this.serializeGroup(node, parentOp);
    }
  }

  private serializeTerm(node: TermNode): string {
    const value = this.formatLiteral(node.value, node.isWildcard);
    return node.field === undefined ? value : `${node.field}: ${value}`;
  }

  private serializeRange(node: RangeNode): string {
    const { field, lower, upper } = node;

    if (lower && upper) {
      const open = lower.inclusive ? '[' : '{';
      const close = upper.inclusive ? ']' : '}';
      return `${field}: ${open}${this.formatBound(lower)} TO ${this.formatBound(upper)}${close}`;
    }
    if (lower) {
      return `${field}: ${lower.inclusive ? '>=' : '>'}${this.formatBound(lower)}`;
    }
    if (upper) {
      return `${field}: ${upper.inclusive ? '<=' : '<'}${this.formatBound(upper)}`;
    }
    return `${field}: [* TO *]`;
  }

  private serializeNegated(inner: QueryNode): string {
    if (inner.type === 'group' && inner.children.length > 1 && !this.sharedField(inner)) {
      return `(${this.serializeGroup(inner)})`;
    }
    return this.serializeNode(inner);
  }

  private serializeGroup(node: GroupNode, parentOp?: BooleanOp): string {
    if (node.children.length === 0) {
      throw new InvariantError(`Empty ${node.op} group cannot be serialized`);
    }

    if (node.children.length === 1) {
      return `(${this.serializeNode(node.children[0])})`;
    }

    const field = this.sharedField(node);
    if (field !== undefined) {
      const values = node.children.map((child) =>
        child.type === 'term' ? this.formatLiteral(child.value, child.isWildcard) : ''
      );
      return `${field}: (${values.join(` ${node.op} `)})`;
    }

    const body = node.children
      .map((child) => this.serializeNode(child, node.op))
      .join(` ${node.op} `);
    return parentOp !== undefined && parentOp !== node.op ? `(${body})` : body;
  }

  /**
   * The field every child term carries, when the group is only such terms.
   * These groups print as `field: (a OR b)`.
   */
  private sharedField(node: GroupNode): string | undefined {
    if (node.children.length < 2) return undefined;

    let field: string | undefined;
    for (const child of node.children) {
      if (child.type !== 'term' || child.field === undefined) return undefined;
      if (field === undefined) {
        field = child.field;
      } else if (child.field !== field) {
        return undefined;
      }
    }
    return field;
  }

  private formatBound(bound: Bound): string {
    return this.formatLiteral(bound.value, false);
  }

  private formatLiteral(value: Literal, isWildcard: boolean): string {
    const { text } = value;
    if (value.quoted) {
      return quote(text);
    }
    if (isWildcard) {
      return escapeLiteral(text, { preserveWildcards: true });
    }
    if (text === '' || BOOLEAN_KEYWORDS.has(text) || [...text].some(isWhitespace)) {
      return quote(text);
    }
    return escapeLiteral(text);
  }
}

/**
 * Serialize an AST to query-string text.
 *
 * @throws InvariantError for a tree that breaks the AST invariants
 */
export function serialize(ast: QueryNode): string {
  return new Serializer().serialize(ast);
}
