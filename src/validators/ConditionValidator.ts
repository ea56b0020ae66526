import type {
  ConditionGroup,
  ConditionItem,
  ConditionTree,
  ConditionValue,
  GroupRelation,
  NestedCondition,
  ScoreMode,
} from '../conditions/types.js';
import { isRecord, ValidationError } from './ValidationError.js';

/**
 * Validates untrusted condition payloads (tool arguments, JSON bodies) and
 * returns them as typed condition trees.
 *
 * Relations are accepted in any case (`or` → `OR`). Operator names are only
 * checked for shape here; the builders resolve them against their operator
 * tables.
 */
export class ConditionValidator {
  private static readonly VALID_RELATIONS: GroupRelation[] = ['AND', 'OR'];
  private static readonly VALID_SCORE_MODES: ScoreMode[] = ['avg', 'max', 'min', 'sum', 'none'];

  /**
   * @throws ValidationError on the first malformed entry
   */
  static validate(input: unknown, path = 'conditions'): ConditionTree[] {
    if (!Array.isArray(input)) {
      throw new ValidationError(`${path} must be an array`);
    }
    return input.map((entry, index) => this.validateTree(entry, `${path}[${index}]`));
  }

  /**
   * Like {@link validate}, but only flat condition items are accepted.
   */
  static validateItems(input: unknown, path = 'conditions'): ConditionItem[] {
    if (!Array.isArray(input)) {
      throw new ValidationError(`${path} must be an array`);
    }
    return input.map((entry, index) => {
      const itemPath = `${path}[${index}]`;
      if (!isRecord(entry)) {
        throw new ValidationError(`${itemPath} must be an object`);
      }
      if (entry.type !== undefined && entry.type !== 'item') {
        throw new ValidationError(`${itemPath}: groups and nested conditions are not supported here`);
      }
      return this.validateItem(entry, itemPath);
    });
  }

  static validateRelation(value: unknown, path: string): GroupRelation {
    if (typeof value !== 'string') {
      throw new ValidationError(`${path} must be a string`);
    }
    const normalized = value.trim().toUpperCase();
    const relation = this.VALID_RELATIONS.find((candidate) => candidate === normalized);
    if (!relation) {
      throw new ValidationError(
        `Invalid ${path}: "${value}". Must be one of: ${this.VALID_RELATIONS.join(', ')}`
      );
    }
    return relation;
  }

  private static validateTree(entry: unknown, path: string): ConditionTree {
    if (!isRecord(entry)) {
      throw new ValidationError(`${path} must be an object`);
    }

    switch (entry.type) {
      case 'group':
        return this.validateGroup(entry, path);
      case 'nested':
        return this.validateNested(entry, path);
      case undefined:
      case 'item':
        return this.validateItem(entry, path);
      default:
        throw new ValidationError(
          `Invalid ${path}.type: "${String(entry.type)}". Must be one of: item, group, nested`
        );
    }
  }

  private static validateItem(entry: Record<string, unknown>, path: string): ConditionItem {
    const { field, operator, values, groupRelation, wildcard } = entry;

    if (typeof field !== 'string' || field.trim() === '') {
      throw new ValidationError(`${path}.field must be a non-empty string`);
    }
    if (typeof operator !== 'string' || operator.trim() === '') {
      throw new ValidationError(`${path}.operator must be a non-empty string`);
    }
    if (wildcard !== undefined && typeof wildcard !== 'boolean') {
      throw new ValidationError(`${path}.wildcard must be a boolean`);
    }

    const item: ConditionItem = {
      field,
      operator,
      values: this.validateValues(values, `${path}.values`),
    };
    if (groupRelation !== undefined) {
      return {
        ...item,
        groupRelation: this.validateRelation(groupRelation, `${path}.groupRelation`),
        ...(wildcard !== undefined ? { wildcard } : {}),
      };
    }
    return wildcard !== undefined ? { ...item, wildcard } : item;
  }

  private static validateValues(values: unknown, path: string): ConditionValue[] {
    if (values === undefined) {
      return [];
    }
    // A single scalar is accepted as a one-element list
    const list: unknown[] = Array.isArray(values) ? values : [values];
    return list.map((value, index) => {
      if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        return value;
      }
      throw new ValidationError(`${path}[${index}] must be a string, number or boolean`);
    });
  }

  private static validateChildren(entry: Record<string, unknown>, path: string): ConditionTree[] {
    const { children } = entry;
    if (!Array.isArray(children)) {
      throw new ValidationError(`${path}.children must be an array`);
    }
    return children.map((child, index) => this.validateTree(child, `${path}.children[${index}]`));
  }

  private static validateMinimumShouldMatch(value: unknown, path: string): number | string | undefined {
    if (value === undefined || typeof value === 'string') {
      return value;
    }
    if (typeof value === 'number' && Number.isInteger(value) && value >= 0) {
      return value;
    }
    throw new ValidationError(`${path} must be a non-negative integer or a string`);
  }

  private static validateGroup(entry: Record<string, unknown>, path: string): ConditionGroup {
    const minimumShouldMatch = this.validateMinimumShouldMatch(
      entry.minimumShouldMatch,
      `${path}.minimumShouldMatch`
    );
    return {
      type: 'group',
      relation: this.validateRelation(entry.relation ?? 'AND', `${path}.relation`),
      children: this.validateChildren(entry, path),
      ...(minimumShouldMatch !== undefined ? { minimumShouldMatch } : {}),
    };
  }

  private static validateNested(entry: Record<string, unknown>, path: string): NestedCondition {
    const nestedPath = entry.path;
    if (typeof nestedPath !== 'string' || nestedPath.trim() === '') {
      throw new ValidationError(`${path}.path must be a non-empty string`);
    }

    const nested: NestedCondition = {
      type: 'nested',
      path: nestedPath,
      relation: this.validateRelation(entry.relation ?? 'AND', `${path}.relation`),
      children: this.validateChildren(entry, path),
    };

    const minimumShouldMatch = this.validateMinimumShouldMatch(
      entry.minimumShouldMatch,
      `${path}.minimumShouldMatch`
    );
    const scoreMode = entry.scoreMode === undefined ? undefined : this.validateScoreMode(entry.scoreMode, path);
    const innerHits = this.validateInnerHits(entry.innerHits, path);

    return {
      ...nested,
      ...(minimumShouldMatch !== undefined ? { minimumShouldMatch } : {}),
      ...(scoreMode !== undefined ? { scoreMode } : {}),
      ...(innerHits !== undefined ? { innerHits } : {}),
    };
  }

  private static validateInnerHits(value: unknown, path: string): Record<string, unknown> | undefined {
    if (value === undefined || isRecord(value)) {
      return value;
    }
    throw new ValidationError(`${path}.innerHits must be an object`);
  }

  private static validateScoreMode(value: unknown, path: string): ScoreMode {
    const mode = this.VALID_SCORE_MODES.find((candidate) => candidate === value);
    if (!mode) {
      throw new ValidationError(
        `Invalid ${path}.scoreMode: "${String(value)}". Must be one of: ${this.VALID_SCORE_MODES.join(', ')}`
      );
    }
    return mode;
  }
}
