import type { QueryField } from '../conditions/FieldMapper.js';
import { type OperatorKind, OPERATOR_KINDS, isOperatorKind } from '../conditions/types.js';
import { isValidIdentifier } from '../querystring/ast.js';
import type { ValueTranslation } from '../querystring/Rewriter.js';
import { isRecord, ValidationError } from './ValidationError.js';

/**
 * Mapping file contents after validation. Every section is optional in the
 * file and defaults to empty.
 */
export interface MappingConfig {
  fields: QueryField[];
  fieldMapping: Record<string, string>;
  valueTranslations: Record<string, ValueTranslation[]>;
  operatorMapping: Record<string, OperatorKind>;
}

/**
 * Validates a parsed mapping file.
 *
 * Canonical field names (mapping targets, translation keys, `esField`) must be
 * plain identifiers so that rewritten query strings stay well-formed.
 */
export class MappingConfigValidator {
  /**
   * @throws ValidationError if any section is malformed
   */
  static validate(raw: unknown): MappingConfig {
    if (!isRecord(raw)) {
      throw new ValidationError('Mapping config must be a JSON object');
    }

    return {
      fields: this.validateFields(raw.fields),
      fieldMapping: this.validateFieldMapping(raw.fieldMapping),
      valueTranslations: this.validateValueTranslations(raw.valueTranslations),
      operatorMapping: this.validateOperatorMapping(raw.operatorMapping),
    };
  }

  private static requireIdentifier(value: unknown, path: string): string {
    if (typeof value !== 'string' || !isValidIdentifier(value)) {
      throw new ValidationError(
        `Invalid ${path}: "${String(value)}". Must match [A-Za-z_][A-Za-z0-9_.]*`
      );
    }
    return value;
  }

  private static validateFields(value: unknown): QueryField[] {
    if (value === undefined) {
      return [];
    }
    if (!Array.isArray(value)) {
      throw new ValidationError('fields must be an array');
    }

    return value.map((entry, index) => {
      const path = `fields[${index}]`;
      if (!isRecord(entry)) {
        throw new ValidationError(`${path} must be an object`);
      }
      const { field, esField, esFieldForAgg, display, isChar } = entry;
      if (typeof field !== 'string' || field.trim() === '') {
        throw new ValidationError(`${path}.field must be a non-empty string`);
      }
      if (display !== undefined && typeof display !== 'string') {
        throw new ValidationError(`${path}.display must be a string`);
      }
      if (isChar !== undefined && typeof isChar !== 'boolean') {
        throw new ValidationError(`${path}.isChar must be a boolean`);
      }

      const config: QueryField = {
        field,
        esField: this.requireIdentifier(esField ?? field, `${path}.esField`),
      };
      if (esFieldForAgg !== undefined) {
        config.esFieldForAgg = this.requireIdentifier(esFieldForAgg, `${path}.esFieldForAgg`);
      }
      if (display !== undefined) config.display = display;
      if (isChar !== undefined) config.isChar = isChar;
      return config;
    });
  }

  private static validateFieldMapping(value: unknown): Record<string, string> {
    if (value === undefined) {
      return {};
    }
    if (!isRecord(value)) {
      throw new ValidationError('fieldMapping must be an object');
    }

    const mapping: Record<string, string> = {};
    for (const [display, canonical] of Object.entries(value)) {
      mapping[display] = this.requireIdentifier(canonical, `fieldMapping["${display}"]`);
    }
    return mapping;
  }

  private static validateValueTranslations(value: unknown): Record<string, ValueTranslation[]> {
    if (value === undefined) {
      return {};
    }
    if (!isRecord(value)) {
      throw new ValidationError('valueTranslations must be an object');
    }

    const translations: Record<string, ValueTranslation[]> = {};
    for (const [field, pairs] of Object.entries(value)) {
      const path = `valueTranslations["${field}"]`;
      this.requireIdentifier(field, `${path} key`);
      if (!Array.isArray(pairs)) {
        throw new ValidationError(`${path} must be an array of [canonical, display] pairs`);
      }
      translations[field] = pairs.map((pair, index) => this.validatePair(pair, `${path}[${index}]`));
    }
    return translations;
  }

  private static validatePair(pair: unknown, path: string): ValueTranslation {
    if (!Array.isArray(pair) || pair.length !== 2) {
      throw new ValidationError(`${path} must be a [canonical, display] pair`);
    }
    const [canonical, display] = pair;
    if (
      typeof canonical !== 'string' &&
      typeof canonical !== 'number' &&
      typeof canonical !== 'boolean'
    ) {
      throw new ValidationError(`${path}[0] must be a string, number or boolean`);
    }
    if (typeof display !== 'string') {
      throw new ValidationError(`${path}[1] must be a string`);
    }
    return [canonical, display];
  }

  private static validateOperatorMapping(value: unknown): Record<string, OperatorKind> {
    if (value === undefined) {
      return {};
    }
    if (!isRecord(value)) {
      throw new ValidationError('operatorMapping must be an object');
    }

    const mapping: Record<string, OperatorKind> = {};
    for (const [alias, target] of Object.entries(value)) {
      if (typeof target !== 'string' || !isOperatorKind(target)) {
        throw new ValidationError(
          `Invalid operatorMapping["${alias}"]: "${String(target)}". Must be one of: ${OPERATOR_KINDS.join(', ')}`
        );
      }
      mapping[alias] = target;
    }
    return mapping;
  }
}
