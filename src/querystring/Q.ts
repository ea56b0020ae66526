import { type ConditionValue, type OperatorKind, isOperatorKind } from '../conditions/types.js';
import { type BooleanOp, type QueryNode, combine, not } from './ast.js';
import { buildQueryNode } from './QueryStringBuilder.js';
import { serialize } from './Serializer.js';

/** A single value, a list of values, or nothing. */
export type QValue = ConditionValue | readonly ConditionValue[] | null | undefined;

/** Short operator names accepted as lookup suffixes and by {@link Q.where}. */
export const LOOKUP_ALIASES: Readonly<Record<string, OperatorKind>> = {
  eq: 'equal',
  neq: 'not_equal',
  contains: 'include',
  not_contains: 'not_include',
  regex: 'reg',
  not_regex: 'nreg',
};

interface QCondition {
  field: string;
  operator: string;
  values: ConditionValue[];
}

type QChild = QCondition | Q;

function resolveLookupOperator(name: string): OperatorKind | undefined {
  const lower = name.toLowerCase();
  if (isOperatorKind(lower)) return lower;
  return Object.prototype.hasOwnProperty.call(LOOKUP_ALIASES, lower) ? LOOKUP_ALIASES[lower] : undefined;
}

/**
 * `log__level__gte` → field `log.level`, operator `gte`. A key without a known
 * operator suffix is an `equal` lookup on the whole key.
 */
function parseLookup(key: string): { field: string; operator: OperatorKind } {
  const parts = key.split('__');
  const operator = parts.length > 1 ? resolveLookupOperator(parts[parts.length - 1]) : undefined;

  if (operator) {
    return { field: parts.slice(0, -1).join('.'), operator };
  }
  return { field: parts.join('.'), operator: 'equal' };
}

function isValueList(value: ConditionValue | readonly ConditionValue[]): value is readonly ConditionValue[] {
  return Array.isArray(value);
}

/**
 * Strings are trimmed and blank ones dropped. `include` values lose their
 * surrounding `*`, since the builder adds its own.
 */
function normalizeValues(operator: string, value: QValue): ConditionValue[] {
  if (value === null || value === undefined) return [];

  const list = isValueList(value) ? value : [value];
  const kind = resolveLookupOperator(operator);
  const stripStars = kind === 'include' || kind === 'not_include';

  const values: ConditionValue[] = [];
  for (const item of list) {
    if (typeof item !== 'string') {
      values.push(item);
      continue;
    }
    let text = item.trim();
    if (stripStars) {
      text = text.replace(/^\*+|\*+$/g, '');
    }
    if (text !== '') {
      values.push(text);
    }
  }
  return values;
}

/**
 * Composable query condition.
 *
 * Instances are immutable: {@link and}, {@link or} and {@link not} return new
 * objects. Conditions are emitted through the query-string builder, so
 * escaping and operator handling match {@link QueryStringBuilder}.
 *
 * @example
 * ```typescript
 * Q.lookup({ status: 'error' })
 *   .or(Q.lookup({ status: 'warning' }))
 *   .and(Q.lookup({ log__level__gte: 3 }))
 *   .build();
 * // status: ("error" OR "warning") AND log.level: >=3
 * ```
 */
export class Q {
  private constructor(
    private readonly connector: BooleanOp,
    private readonly negated: boolean,
    private readonly children: readonly QChild[]
  ) {}

  /** A condition that matches nothing on its own and vanishes when combined. */
  static empty(): Q {
    return new Q('AND', false, []);
  }

  /**
   * One condition with an explicit operator: a built-in kind or one of
   * {@link LOOKUP_ALIASES}. Unknown operators fail when the query is built.
   */
  static where(field: string, operator: string = 'equal', value?: QValue): Q {
    return new Q('AND', false, [{ field, operator, values: normalizeValues(operator, value) }]);
  }

  /**
   * Conditions from `field__operator` keys, joined with AND. `__` between
   * field segments becomes `.`.
   */
  static lookup(lookups: Readonly<Record<string, QValue>>): Q {
    const children = Object.entries(lookups).map(([key, value]): QCondition => {
      const { field, operator } = parseLookup(key);
      return { field, operator, values: normalizeValues(operator, value) };
    });
    return new Q('AND', false, children);
  }

  and(other: Q): Q {
    return this.combineWith(other, 'AND');
  }

  or(other: Q): Q {
    return this.combineWith(other, 'OR');
  }

  not(): Q {
    return new Q(this.connector, !this.negated, this.children);
  }

  isEmpty(): boolean {
    return this.children.length === 0;
  }

  /**
   * @throws UnsupportedOperatorError for an operator the builder cannot resolve
   * @throws InvalidIdentifierError for a field name that is not an identifier
   */
  toNode(): QueryNode | undefined {
    const nodes: QueryNode[] = [];
    for (const child of this.children) {
      const node =
        child instanceof Q
          ? child.toNode()
          : buildQueryNode([child], { operatorMapping: LOOKUP_ALIASES });
      if (node) nodes.push(node);
    }

    const node = combine(this.connector, nodes);
    return node && this.negated ? not(node) : node;
  }

  build(): string {
    const node = this.toNode();
    return node ? serialize(node) : '';
  }

  toString(): string {
    return this.build();
  }

  private combineWith(other: Q, connector: BooleanOp): Q {
    if (this.isEmpty()) return other;
    if (other.isEmpty()) return this;
    return new Q(connector, false, [this, other]);
  }
}
