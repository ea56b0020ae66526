import { FieldMapper } from '../conditions/FieldMapper.js';
import { type MappingConfig, emptyMappingConfig, resolveFieldMapping } from '../config/mappings.js';
import { DslQueryBuilder } from '../dsl/DslQueryBuilder.js';
import { QueryStringBuilder } from '../querystring/QueryStringBuilder.js';
import { QueryStringError, QueryStringParseError } from '../querystring/errors.js';
import { QueryStringTransformer } from '../querystring/QueryStringTransformer.js';
import { ConditionValidator } from '../validators/ConditionValidator.js';
import { isRecord, ValidationError } from '../validators/ValidationError.js';
import { logger } from '../utils/logger.js';

/**
 * MCP Content format for responses
 */
export type McpContent = {
  content: Array<{
    type: 'text';
    text: string;
  }>;
  isError?: boolean;
};

export type ToolArgs = Record<string, unknown>;

/**
 * QueryController - MCP tool layer
 *
 * Validates tool arguments, runs the query-string and DSL builders against
 * the loaded mapping config and formats results as MCP content. Failures are
 * returned as `isError` results, never thrown.
 *
 * **Supported Operations:**
 * - `transform_query_string`: rename fields and translate values in a query string
 * - `build_query_string`: conditions → query string
 * - `build_search_body`: conditions + query string → search request body
 */
export class QueryController {
  private readonly fieldMapper: FieldMapper;
  private readonly transformer: QueryStringTransformer;
  private readonly quotingTransformer: QueryStringTransformer;

  constructor(private readonly mappings: MappingConfig = emptyMappingConfig()) {
    const fieldMapping = resolveFieldMapping(mappings);
    this.fieldMapper = new FieldMapper(mappings.fields);
    this.transformer = new QueryStringTransformer({
      fieldMapping,
      valueTranslations: mappings.valueTranslations,
    });
    this.quotingTransformer = new QueryStringTransformer({
      fieldMapping,
      valueTranslations: mappings.valueTranslations,
      quoteUntranslatedTerms: true,
    });
  }

  /**
   * Format a result as MCP content
   */
  private formatResponse(result: unknown, summary?: string, isError = false): McpContent {
    const text = summary
      ? `${summary}\n\n${JSON.stringify(result, null, 2)}`
      : JSON.stringify(result, null, 2);

    return {
      content: [
        {
          type: 'text',
          text,
        },
      ],
      isError,
    };
  }

  private formatError(tool: string, error: unknown, summary: string): McpContent {
    const message = error instanceof Error ? error.message : String(error);
    const result: Record<string, unknown> = {
      status: 'error',
      errorType: error instanceof Error ? error.name : 'Error',
      error: message,
    };
    if (error instanceof QueryStringParseError) {
      result.offset = error.offset;
    }
    if (error instanceof QueryStringError && error.hint) {
      result.hint = error.hint;
    }

    // Input errors are the caller's problem; anything else is ours
    if (error instanceof QueryStringError || error instanceof ValidationError) {
      logger.warn(`${tool} rejected input`, { tool, errorType: result.errorType, error: message });
    } else {
      logger.error(`${tool} failed`, error);
    }
    return this.formatResponse(result, summary, true);
  }

  private optionalString(args: ToolArgs, key: string): string | undefined {
    const value = args[key];
    if (value === undefined || typeof value === 'string') {
      return value;
    }
    throw new ValidationError(`${key} must be a string`);
  }

  private optionalBoolean(args: ToolArgs, key: string): boolean | undefined {
    const value = args[key];
    if (value === undefined || typeof value === 'boolean') {
      return value;
    }
    throw new ValidationError(`${key} must be a boolean`);
  }

  private optionalPositiveInt(args: ToolArgs, key: string): number | undefined {
    const value = args[key];
    if (value === undefined) {
      return undefined;
    }
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
      throw new ValidationError(`${key} must be a positive integer`);
    }
    return value;
  }

  private optionalStringArray(args: ToolArgs, key: string): string[] {
    const value = args[key];
    if (value === undefined) {
      return [];
    }
    if (!Array.isArray(value) || !value.every((entry): entry is string => typeof entry === 'string')) {
      throw new ValidationError(`${key} must be an array of strings`);
    }
    return value;
  }

  /**
   * Handle TRANSFORM_QUERY_STRING tool
   */
  handleTransformTool(args: ToolArgs): McpContent {
    try {
      const query = this.optionalString(args, 'query');
      if (query === undefined) {
        throw new ValidationError('query is required');
      }
      const transformer = this.optionalBoolean(args, 'quoteUntranslatedTerms')
        ? this.quotingTransformer
        : this.transformer;

      const output = transformer.transform(query);
      return this.formatResponse({ status: 'ok', input: query, query: output }, output || '(empty query)');
    } catch (error) {
      return this.formatError('transform_query_string', error, 'Failed to transform query string');
    }
  }

  /**
   * Handle BUILD_QUERY_STRING tool
   */
  handleBuildQueryStringTool(args: ToolArgs): McpContent {
    try {
      const conditions = ConditionValidator.validateItems(args.conditions);
      const logic = args.logicOperator;
      const builder = new QueryStringBuilder({
        operatorMapping: this.mappings.operatorMapping,
        logicOperator:
          logic === undefined ? undefined : ConditionValidator.validateRelation(logic, 'logicOperator'),
      });

      for (const condition of this.fieldMapper.transformConditionFields(conditions)) {
        // transformConditionFields keeps items as items
        if (condition.type === undefined || condition.type === 'item') {
          builder.addCondition(condition);
        }
      }

      const query = builder.build();
      return this.formatResponse({ status: 'ok', query }, query || '(no conditions produced a clause)');
    } catch (error) {
      return this.formatError('build_query_string', error, 'Failed to build query string');
    }
  }

  /**
   * Handle BUILD_SEARCH_BODY tool
   */
  handleBuildSearchBodyTool(args: ToolArgs): McpContent {
    try {
      const builder = new DslQueryBuilder({
        fieldMapper: this.fieldMapper,
        queryStringTransformer: this.transformer,
        operatorMapping: this.mappings.operatorMapping,
      });

      if (args.conditions !== undefined) {
        builder.conditions(ConditionValidator.validate(args.conditions));
      }
      builder
        .queryString(this.optionalString(args, 'queryString'))
        .ordering(this.optionalStringArray(args, 'ordering'))
        .pagination(this.optionalPositiveInt(args, 'page'), this.optionalPositiveInt(args, 'pageSize'));

      for (const aggregation of this.validateAggregations(args.aggregations)) {
        builder.addAggregation(aggregation.name, aggregation.type, aggregation.field, aggregation.params);
      }

      const body = builder.build();
      return this.formatResponse({ status: 'ok', body });
    } catch (error) {
      return this.formatError('build_search_body', error, 'Failed to build search body');
    }
  }

  private validateAggregations(
    value: unknown
  ): Array<{ name: string; type: string; field?: string; params?: Record<string, unknown> }> {
    if (value === undefined) {
      return [];
    }
    if (!Array.isArray(value)) {
      throw new ValidationError('aggregations must be an array');
    }
    return value.map((entry, index) => {
      const path = `aggregations[${index}]`;
      if (!isRecord(entry)) {
        throw new ValidationError(`${path} must be an object`);
      }
      const { name, type, field, params } = entry;
      if (typeof name !== 'string' || name === '') {
        throw new ValidationError(`${path}.name must be a non-empty string`);
      }
      if (typeof type !== 'string' || type === '') {
        throw new ValidationError(`${path}.type must be a non-empty string`);
      }
      if (field !== undefined && typeof field !== 'string') {
        throw new ValidationError(`${path}.field must be a string`);
      }
      if (params !== undefined && !isRecord(params)) {
        throw new ValidationError(`${path}.params must be an object`);
      }
      return { name, type, field, params };
    });
  }
}
