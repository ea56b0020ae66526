import type { FieldMapping } from '../querystring/Rewriter.js';
import type { ConditionTree } from './types.js';

/**
 * Configuration of one queryable field.
 */
export interface QueryField {
  /** Name used by callers (display identifier) */
  field: string;
  /** Name of the field in the search index */
  esField: string;
  /** Field to use for aggregations and sorting, e.g. a keyword sub-field */
  esFieldForAgg?: string;
  /** Human-readable label */
  display?: string;
  /** Values are character data (keyword/text) rather than numbers or dates */
  isChar?: boolean;
}

/** A condition item after renaming, remembering the caller's field name. */
export type MappedConditionTree = ConditionTree & { originField?: string };

/**
 * Maps caller-facing field names to index field names.
 */
export class FieldMapper {
  private readonly fields: ReadonlyMap<string, QueryField>;

  constructor(fields: readonly QueryField[] = []) {
    this.fields = new Map(fields.map((f) => [f.field, f]));
  }

  getEsField(field: string, forAgg = false): string {
    const config = this.fields.get(field);
    if (!config) {
      return field;
    }
    return forAgg && config.esFieldForAgg ? config.esFieldForAgg : config.esField;
  }

  getField(field: string): QueryField | undefined {
    return this.fields.get(field);
  }

  /**
   * Rename every condition item in a tree. Groups and nested conditions keep
   * their shape; a nested `path` is left as-is.
   */
  transformConditionFields(conditions: readonly ConditionTree[]): MappedConditionTree[] {
    return conditions.map((condition) => this.transformCondition(condition));
  }

  private transformCondition(condition: ConditionTree): MappedConditionTree {
    if (condition.type === 'group' || condition.type === 'nested') {
      return { ...condition, children: this.transformConditionFields(condition.children) };
    }
    return {
      ...condition,
      originField: condition.field,
      field: this.getEsField(condition.field),
    };
  }

  /**
   * Rename sort fields, keeping a leading `-` for descending order. Sorting
   * uses the aggregation field where one is configured.
   */
  transformOrderingFields(ordering: readonly string[]): string[] {
    return ordering.map((field) =>
      field.startsWith('-')
        ? `-${this.getEsField(field.slice(1), true)}`
        : this.getEsField(field, true)
    );
  }

  /**
   * Display-name table for {@link QueryStringTransformer}; fields whose
   * display and index names match are omitted.
   */
  toFieldMapping(): FieldMapping {
    const mapping: Record<string, string> = {};
    for (const config of this.fields.values()) {
      if (config.field !== config.esField) {
        mapping[config.field] = config.esField;
      }
    }
    return mapping;
  }
}
