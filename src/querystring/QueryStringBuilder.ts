import {
  type Condition,
  type ConditionValue,
  type GroupRelation,
  type OperatorKind,
  isOperatorKind,
} from '../conditions/types.js';
import { logger } from '../utils/logger.js';
import {
  type BooleanOp,
  type QueryNode,
  combine,
  isValidIdentifier,
  literal,
  not,
  range,
  raw,
  term,
} from './ast.js';
import { InvalidConditionError, InvalidIdentifierError, UnsupportedOperatorError } from './errors.js';
import { escapeRegexLiteral, escapeWildcardPattern } from './escaping.js';
import { serialize } from './Serializer.js';

/**
 * Extension point for operators outside the built-in set.
 *
 * `parse` receives the condition untouched and returns the node to emit, or
 * `undefined` to drop the condition. The field is validated before the parser
 * is called.
 */
export interface ConditionNodeParser {
  parse(condition: Condition): QueryNode | undefined;
}

export interface QueryStringBuilderOptions {
  /** External operator names resolved to built-in kinds, e.g. `{ eq: 'equal' }` */
  operatorMapping?: Readonly<Record<string, OperatorKind>>;
  /** Operator joining successive conditions; defaults to `AND` */
  logicOperator?: BooleanOp;
  /** Custom parsers keyed by operator name */
  conditionParsers?: Readonly<Record<string, ConditionNodeParser>>;
}

type ResolvedOperator =
  | { kind: 'builtin'; operator: OperatorKind }
  | { kind: 'custom'; parser: ConditionNodeParser };

/**
 * Builds query strings from structured conditions without going through the
 * lexer or parser.
 *
 * @example
 * ```typescript
 * const qs = new QueryStringBuilder()
 *   .addFilter('status', 'equal', ['error', 'warning'])
 *   .addFilter('level', 'gte', [3])
 *   .build();
 * // status: ("error" OR "warning") AND level: >=3
 * ```
 */
export class QueryStringBuilder {
  private conditions: Condition[] = [];
  private readonly operatorMapping: Readonly<Record<string, OperatorKind>>;
  private readonly logicOperator: BooleanOp;
  private readonly conditionParsers: Readonly<Record<string, ConditionNodeParser>>;

  constructor(options: QueryStringBuilderOptions = {}) {
    this.operatorMapping = options.operatorMapping ?? {};
    this.logicOperator = options.logicOperator ?? 'AND';
    this.conditionParsers = options.conditionParsers ?? {};
  }

  addFilter(
    field: string,
    operator: Condition['operator'],
    values: readonly ConditionValue[],
    options: { wildcard?: boolean; groupRelation?: GroupRelation } = {}
  ): this {
    return this.addCondition({ field, operator, values, ...options });
  }

  addCondition(condition: Condition): this {
    this.conditions.push(condition);
    return this;
  }

  /**
   * Build the AST for the collected conditions, or `undefined` when every
   * condition was dropped.
   */
  buildNode(): QueryNode | undefined {
    const nodes: QueryNode[] = [];
    for (const condition of this.conditions) {
      const node = this.conditionToNode(condition);
      if (node) {
        nodes.push(node);
      } else {
        logger.debug('build', 'Condition produced no clause', {
          field: condition.field,
          operator: condition.operator,
        });
      }
    }
    return combine(this.logicOperator, nodes);
  }

  build(): string {
    const node = this.buildNode();
    return node ? serialize(node) : '';
  }

  clear(): this {
    this.conditions = [];
    return this;
  }

  private resolveOperator(name: string): ResolvedOperator {
    if (isOperatorKind(name)) {
      return { kind: 'builtin', operator: name };
    }
    if (Object.prototype.hasOwnProperty.call(this.operatorMapping, name)) {
      return { kind: 'builtin', operator: this.operatorMapping[name] };
    }
    if (Object.prototype.hasOwnProperty.call(this.conditionParsers, name)) {
      return { kind: 'custom', parser: this.conditionParsers[name] };
    }
    throw new UnsupportedOperatorError(name);
  }

  private conditionToNode(condition: Condition): QueryNode | undefined {
    const resolved = this.resolveOperator(condition.operator);

    if (!isValidIdentifier(condition.field)) {
      throw new InvalidIdentifierError(condition.field, `condition "${condition.operator}"`);
    }

    if (resolved.kind === 'custom') {
      return resolved.parser.parse(condition);
    }
    return this.builtinNode(condition, resolved.operator);
  }

  private builtinNode(condition: Condition, operator: OperatorKind): QueryNode | undefined {
    const { field } = condition;
    const relation = condition.groupRelation ?? 'OR';
    const values = condition.values.map((value) => String(value));

    const needsValues = operator !== 'exists' && operator !== 'not_exists' && operator !== 'between';
    if (needsValues && values.length === 0) {
      return undefined;
    }

    switch (operator) {
      case 'exists':
        return this.existsNode(field);
      case 'not_exists':
        return not(this.existsNode(field));
      case 'equal':
        return this.equalNode(field, values, relation);
      case 'not_equal':
        return this.negate(this.equalNode(field, values, relation));
      case 'include':
        return this.includeNode(field, values, relation, condition.wildcard ?? false);
      case 'not_include':
        return this.negate(this.includeNode(field, values, relation, condition.wildcard ?? false));
      case 'between':
        if (values.length < 2) {
          throw new InvalidConditionError(field, operator, 'between requires two values');
        }
        return range(
          field,
          { value: literal(values[0]), inclusive: true },
          { value: literal(values[1]), inclusive: true }
        );
      case 'gt':
        return range(field, { value: literal(values[0]), inclusive: false });
      case 'gte':
        return range(field, { value: literal(values[0]), inclusive: true });
      case 'lt':
        return range(field, undefined, { value: literal(values[0]), inclusive: false });
      case 'lte':
        return range(field, undefined, { value: literal(values[0]), inclusive: true });
      case 'reg':
        return this.regexNode(field, values, relation);
      case 'nreg':
        return this.negate(this.regexNode(field, values, relation));
    }
  }

  private existsNode(field: string): QueryNode {
    return term(field, literal('*'), true);
  }

  private equalNode(field: string, values: string[], relation: GroupRelation): QueryNode | undefined {
    return combine(
      relation,
      values.map((value) => term(field, literal(value, true)))
    );
  }

  /**
   * `include` wraps each value as `*value*`. With `callerWildcards` the
   * caller's `*` and `?` stay wildcards inside the wrapped pattern; otherwise
   * they are matched literally.
   */
  private includeNode(
    field: string,
    values: string[],
    relation: GroupRelation,
    callerWildcards: boolean
  ): QueryNode | undefined {
    return combine(
      relation,
      values.map((value) => {
        const pattern = callerWildcards
          ? `*${value.replace(/\\/g, '\\\\')}*`
          : `*${escapeWildcardPattern(value)}*`;
        return term(field, literal(pattern), true);
      })
    );
  }

  private regexNode(field: string, values: string[], relation: GroupRelation): QueryNode | undefined {
    return combine(
      relation,
      values.map((value) => raw(`${field}: /${escapeRegexLiteral(value)}/`))
    );
  }

  private negate(node: QueryNode | undefined): QueryNode | undefined {
    return node ? not(node) : undefined;
  }
}

/**
 * Build the AST for `conditions`; successive conditions are joined with `AND`
 * unless `options.logicOperator` says otherwise.
 */
export function buildQueryNode(
  conditions: readonly Condition[],
  options?: QueryStringBuilderOptions
): QueryNode | undefined {
  const builder = new QueryStringBuilder(options);
  for (const condition of conditions) {
    builder.addCondition(condition);
  }
  return builder.buildNode();
}

/**
 * Build query-string text for `conditions`.
 *
 * @throws UnsupportedOperatorError for an operator the builder cannot resolve
 * @throws InvalidIdentifierError for a field name that is not an identifier
 */
export function build(conditions: readonly Condition[], options?: QueryStringBuilderOptions): string {
  const node = buildQueryNode(conditions, options);
  return node ? serialize(node) : '';
}
