/**
 * Conditions → search request body (query DSL) builder.
 *
 * Pure JSON builder, no I/O. It consumes the same {@link Condition} shape as
 * the query-string builder, plus groups and nested conditions, and embeds a
 * transformed query string as a `query_string` clause.
 */

import { FieldMapper, type MappedConditionTree } from '../conditions/FieldMapper.js';
import {
  type Condition,
  type ConditionGroup,
  type ConditionTree,
  type NestedCondition,
  type OperatorKind,
  isOperatorKind,
} from '../conditions/types.js';
import { isValidIdentifier } from '../querystring/ast.js';
import {
  InvalidConditionError,
  InvalidIdentifierError,
  UnsupportedOperatorError,
} from '../querystring/errors.js';
import { escapeWildcardPattern } from '../querystring/escaping.js';
import { logger } from '../utils/logger.js';

export type DslClause = Record<string, unknown>;

/** `*value*`; the caller's `*` and `?` stay wildcards only when `callerWildcards` is set. */
function includePattern(value: string, callerWildcards: boolean): string {
  return `*${callerWildcards ? value : escapeWildcardPattern(value)}*`;
}

export type SortOrder = 'asc' | 'desc';

export interface SearchRequestBody {
  query: DslClause;
  from: number;
  size: number;
  sort?: Array<Record<string, { order: SortOrder }>>;
  aggs?: Record<string, DslClause>;
}

export interface DslQueryBuilderOptions {
  fieldMapper?: FieldMapper;
  /** Applied to the query string before it is embedded, e.g. a QueryStringTransformer */
  queryStringTransformer?: { transform(text: string): string };
  operatorMapping?: Readonly<Record<string, OperatorKind>>;
}

interface AggregationSpec {
  name: string;
  type: string;
  field?: string;
  params: Record<string, unknown>;
}

const DEFAULT_PAGE_SIZE = 10;

function boolQuery(clauses: Record<string, unknown>): DslClause {
  return { bool: clauses };
}

function mustNot(clause: DslClause): DslClause {
  return boolQuery({ must_not: [clause] });
}

function rangeQuery(field: string, bounds: Record<string, unknown>): DslClause {
  return { range: { [field]: bounds } };
}

/**
 * Chainable request-body builder.
 *
 * @example
 * ```typescript
 * const body = new DslQueryBuilder({ fieldMapper, queryStringTransformer })
 *   .conditions([{ field: 'status', operator: 'equal', values: ['error'] }])
 *   .queryString('message: timeout')
 *   .ordering(['-createTime'])
 *   .pagination(2, 20)
 *   .build();
 * ```
 */
export class DslQueryBuilder {
  private readonly fieldMapper: FieldMapper;
  private readonly queryStringTransformer?: { transform(text: string): string };
  private readonly operatorMapping: Readonly<Record<string, OperatorKind>>;

  private conditionTree: MappedConditionTree[] = [];
  private queryText = '';
  private sortFields: string[] = [];
  private page = 1;
  private pageSize = DEFAULT_PAGE_SIZE;
  private aggregations: AggregationSpec[] = [];
  private extraFilters: DslClause[] = [];

  constructor(options: DslQueryBuilderOptions = {}) {
    this.fieldMapper = options.fieldMapper ?? new FieldMapper();
    this.queryStringTransformer = options.queryStringTransformer;
    this.operatorMapping = options.operatorMapping ?? {};
  }

  conditions(conditions: readonly ConditionTree[]): this {
    this.conditionTree = this.fieldMapper.transformConditionFields(conditions);
    return this;
  }

  queryString(text: string | undefined): this {
    this.queryText = text ?? '';
    return this;
  }

  ordering(fields: readonly string[]): this {
    this.sortFields = this.fieldMapper.transformOrderingFields(fields);
    return this;
  }

  /** Page numbers start at 1; both values are clamped to at least 1. */
  pagination(page = 1, pageSize = DEFAULT_PAGE_SIZE): this {
    this.page = Math.max(1, Math.floor(page));
    this.pageSize = Math.max(1, Math.floor(pageSize));
    return this;
  }

  addFilter(clause: DslClause | undefined): this {
    if (clause) {
      this.extraFilters.push(clause);
    }
    return this;
  }

  /** `field` is resolved through the field mapper's aggregation field. */
  addAggregation(name: string, type: string, field?: string, params: Record<string, unknown> = {}): this {
    this.aggregations.push({
      name,
      type,
      field: field ? this.fieldMapper.getEsField(field, true) : undefined,
      params,
    });
    return this;
  }

  build(): SearchRequestBody {
    const filter: DslClause[] = [];
    for (const condition of this.conditionTree) {
      const clause = this.compileTree(condition);
      if (clause) filter.push(clause);
    }
    filter.push(...this.extraFilters);

    const must: DslClause[] = [];
    const queryText = this.queryText.trim();
    if (queryText) {
      const query = this.queryStringTransformer
        ? this.queryStringTransformer.transform(queryText)
        : queryText;
      if (query) {
        must.push({ query_string: { query } });
      }
    }

    const boolClauses: Record<string, unknown> = {};
    if (filter.length > 0) boolClauses.filter = filter;
    if (must.length > 0) boolClauses.must = must;

    const body: SearchRequestBody = {
      query: Object.keys(boolClauses).length > 0 ? boolQuery(boolClauses) : { match_all: {} },
      from: (this.page - 1) * this.pageSize,
      size: this.pageSize,
    };

    if (this.sortFields.length > 0) {
      body.sort = this.sortFields.map((field) =>
        field.startsWith('-')
          ? { [field.slice(1)]: { order: 'desc' as const } }
          : { [field]: { order: 'asc' as const } }
      );
    }

    if (this.aggregations.length > 0) {
      const aggs: Record<string, DslClause> = {};
      for (const agg of this.aggregations) {
        aggs[agg.name] = {
          [agg.type]: agg.field ? { field: agg.field, ...agg.params } : { ...agg.params },
        };
      }
      body.aggs = aggs;
    }

    logger.debug('dsl', 'Built search request body', {
      conditions: this.conditionTree.length,
      hasQueryString: must.length > 0,
      from: body.from,
      size: body.size,
    });
    return body;
  }

  clear(): this {
    this.conditionTree = [];
    this.queryText = '';
    this.sortFields = [];
    this.page = 1;
    this.pageSize = DEFAULT_PAGE_SIZE;
    this.aggregations = [];
    this.extraFilters = [];
    return this;
  }

  private compileTree(node: ConditionTree): DslClause | undefined {
    switch (node.type) {
      case 'group':
        return this.compileGroup(node);
      case 'nested':
        return this.compileNested(node);
      default:
        return this.compileCondition(node);
    }
  }

  private compileChildren(children: readonly ConditionTree[]): DslClause[] {
    const clauses: DslClause[] = [];
    for (const child of children) {
      const clause = this.compileTree(child);
      if (clause) clauses.push(clause);
    }
    return clauses;
  }

  private innerBool(
    relation: ConditionGroup['relation'],
    clauses: DslClause[],
    minimumShouldMatch?: number | string
  ): DslClause {
    if (relation === 'OR') {
      const should: Record<string, unknown> = { should: clauses };
      if (minimumShouldMatch !== undefined) {
        should.minimum_should_match = minimumShouldMatch;
      }
      return boolQuery(should);
    }
    return boolQuery({ must: clauses });
  }

  private compileGroup(group: ConditionGroup): DslClause | undefined {
    const clauses = this.compileChildren(group.children);
    if (clauses.length === 0) return undefined;
    return this.innerBool(group.relation, clauses, group.minimumShouldMatch);
  }

  private compileNested(nested: NestedCondition): DslClause | undefined {
    if (!nested.path.trim()) {
      throw new InvalidConditionError(nested.path, 'nested', 'nested path cannot be empty');
    }
    const clauses = this.compileChildren(nested.children);
    if (clauses.length === 0) return undefined;

    const body: Record<string, unknown> = {
      path: nested.path,
      query: this.innerBool(nested.relation, clauses, nested.minimumShouldMatch),
    };
    if (nested.scoreMode !== undefined) body.score_mode = nested.scoreMode;
    if (nested.innerHits !== undefined) body.inner_hits = nested.innerHits;
    return { nested: body };
  }

  private resolveOperator(name: string): OperatorKind {
    if (isOperatorKind(name)) return name;
    if (Object.prototype.hasOwnProperty.call(this.operatorMapping, name)) {
      return this.operatorMapping[name];
    }
    throw new UnsupportedOperatorError(name);
  }

  /**
   * Compile one condition item. Conditions without values (other than
   * `exists`/`not_exists`, and `between`, which needs two) produce no clause.
   */
  private compileCondition(condition: Condition): DslClause | undefined {
    const operator = this.resolveOperator(condition.operator);
    const { field, values } = condition;
    if (!isValidIdentifier(field)) {
      throw new InvalidIdentifierError(field, `condition "${condition.operator}"`);
    }

    const relation = condition.groupRelation ?? 'OR';
    const combine = (clauses: DslClause[]): DslClause =>
      clauses.length === 1
        ? clauses[0]
        : boolQuery(relation === 'OR' ? { should: clauses, minimum_should_match: 1 } : { filter: clauses });

    const needsValues = operator !== 'exists' && operator !== 'not_exists' && operator !== 'between';
    if (needsValues && values.length === 0) {
      return undefined;
    }

    const first = values[0];

    switch (operator) {
      case 'exists':
        return { exists: { field } };
      case 'not_exists':
        return mustNot({ exists: { field } });
      case 'equal':
      case 'not_equal': {
        const clause =
          relation === 'OR'
            ? { terms: { [field]: [...values] } }
            : combine(values.map((value) => ({ term: { [field]: { value } } })));
        return operator === 'equal' ? clause : mustNot(clause);
      }
      case 'include':
      case 'not_include': {
        const clause = combine(
          values.map((value) => ({
            wildcard: { [field]: { value: includePattern(String(value), condition.wildcard ?? false) } },
          }))
        );
        return operator === 'include' ? clause : mustNot(clause);
      }
      case 'between':
        if (values.length < 2) {
          throw new InvalidConditionError(field, operator, 'between requires two values');
        }
        return rangeQuery(field, { gte: values[0], lte: values[1] });
      case 'gt':
      case 'gte':
      case 'lt':
      case 'lte':
        return rangeQuery(field, { [operator]: first });
      case 'reg':
      case 'nreg': {
        const clause = combine(values.map((value) => ({ regexp: { [field]: { value: String(value) } } })));
        return operator === 'reg' ? clause : mustNot(clause);
      }
    }
  }
}
