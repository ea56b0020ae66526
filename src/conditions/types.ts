/**
 * Structured search conditions shared by the query-string builder and the
 * DSL builder.
 */

export const OPERATOR_KINDS = [
  'equal',
  'not_equal',
  'include',
  'not_include',
  'between',
  'gt',
  'gte',
  'lt',
  'lte',
  'exists',
  'not_exists',
  'reg',
  'nreg',
] as const;

export type OperatorKind = (typeof OPERATOR_KINDS)[number];

/** How several values of one condition, or several conditions, are combined. */
export type GroupRelation = 'AND' | 'OR';

export type ConditionValue = string | number | boolean;

/**
 * A single field/operator/values condition.
 *
 * `operator` is usually an {@link OperatorKind}; other names are accepted so
 * that builders can resolve aliases or hand them to a custom parser.
 */
export interface Condition {
  field: string;
  operator: OperatorKind | (string & {});
  values: readonly ConditionValue[];
  /** Relation between `values`; defaults to `OR` */
  groupRelation?: GroupRelation;
  /** The values already contain `*`/`?` wildcard markers */
  wildcard?: boolean;
}

export interface ConditionItem extends Condition {
  type?: 'item';
}

/** Logical nesting: `(a AND b) OR (c AND d)`. */
export interface ConditionGroup {
  type: 'group';
  relation: GroupRelation;
  children: readonly ConditionTree[];
  /** Only meaningful for `OR` groups */
  minimumShouldMatch?: number | string;
}

export type ScoreMode = 'avg' | 'max' | 'min' | 'sum' | 'none';

/** Conditions evaluated against nested documents under `path`. */
export interface NestedCondition {
  type: 'nested';
  path: string;
  relation: GroupRelation;
  children: readonly ConditionTree[];
  scoreMode?: ScoreMode;
  minimumShouldMatch?: number | string;
  innerHits?: Record<string, unknown>;
}

export type ConditionTree = ConditionItem | ConditionGroup | NestedCondition;

export function isOperatorKind(value: string): value is OperatorKind {
  const kinds: readonly string[] = OPERATOR_KINDS;
  return kinds.includes(value);
}
