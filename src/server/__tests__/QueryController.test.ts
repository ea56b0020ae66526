import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import type { MappingConfig } from '../../config/mappings.js';
import { QueryController, type McpContent } from '../QueryController.js';

const mappings: MappingConfig = {
  fields: [{ field: 'createTime', esField: 'create_time' }],
  fieldMapping: { level: 'severity' },
  valueTranslations: { severity: [[1, 'fatal']] },
  operatorMapping: { eq: 'equal' },
};

/** The JSON block follows the summary after a blank line. */
function resultJson(result: McpContent): unknown {
  const parts = result.content[0].text.split('\n\n');
  return JSON.parse(parts[parts.length - 1]);
}

describe('QueryController', () => {
  let controller: QueryController;

  beforeEach(() => {
    // error results are logged to stderr
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    controller = new QueryController(mappings);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('handleTransformTool', () => {
    it('should transform a query string', () => {
      const result = controller.handleTransformTool({ query: 'level: fatal' });

      expect(result.isError).toBe(false);
      expect(result.content[0].text.startsWith('severity: 1\n\n')).toBe(true);
      expect(resultJson(result)).toEqual({ status: 'ok', input: 'level: fatal', query: 'severity: 1' });
    });

    it('should quote untranslated terms on request', () => {
      const result = controller.handleTransformTool({ query: 'timeout', quoteUntranslatedTerms: true });

      expect(resultJson(result)).toMatchObject({ query: '"timeout"' });
    });

    it('should report a missing query', () => {
      const result = controller.handleTransformTool({});

      expect(result.isError).toBe(true);
      expect(result.content[0].text.startsWith('Failed to transform query string\n\n')).toBe(true);
      expect(resultJson(result)).toEqual({
        status: 'error',
        errorType: 'ValidationError',
        error: 'query is required',
      });
    });

    it('should report parse errors with offset and hint', () => {
      const result = controller.handleTransformTool({ query: 'status: (error' });

      expect(result.isError).toBe(true);
      expect(resultJson(result)).toEqual({
        status: 'error',
        errorType: 'QueryStringParseError',
        error: "Failed to parse query string: Unbalanced '(' at character offset 8: expected ')' but found end of input",
        offset: 8,
        hint: "Close the group with ')'",
      });
    });
  });

  describe('handleBuildQueryStringTool', () => {
    it('should build a query string with renamed fields and operator aliases', () => {
      const result = controller.handleBuildQueryStringTool({
        conditions: [
          { field: 'createTime', operator: 'eq', values: ['x'] },
          { field: 'level', operator: 'gte', values: [3] },
        ],
      });

      expect(resultJson(result)).toEqual({ status: 'ok', query: 'create_time: "x" AND level: >=3' });
    });

    it('should accept a lower-case logic operator', () => {
      const result = controller.handleBuildQueryStringTool({
        conditions: [
          { field: 'a', operator: 'exists' },
          { field: 'b', operator: 'exists' },
        ],
        logicOperator: 'or',
      });

      expect(resultJson(result)).toEqual({ status: 'ok', query: 'a: * OR b: *' });
    });

    it('should report unsupported operators', () => {
      const result = controller.handleBuildQueryStringTool({
        conditions: [{ field: 'a', operator: 'fuzzy', values: ['x'] }],
      });

      expect(result.isError).toBe(true);
      expect(resultJson(result)).toMatchObject({
        errorType: 'UnsupportedOperatorError',
        error: 'Unsupported operator: fuzzy',
      });
    });
  });

  describe('handleBuildSearchBodyTool', () => {
    it('should build a complete request body', () => {
      const result = controller.handleBuildSearchBodyTool({
        conditions: [{ field: 'createTime', operator: 'gte', values: [5] }],
        queryString: 'level: fatal',
        ordering: ['-createTime'],
        page: 2,
        pageSize: 5,
        aggregations: [{ name: 'levels', type: 'terms', field: 'level' }],
      });

      expect(result.isError).toBe(false);
      expect(resultJson(result)).toEqual({
        status: 'ok',
        body: {
          query: {
            bool: {
              filter: [{ range: { create_time: { gte: 5 } } }],
              must: [{ query_string: { query: 'severity: 1' } }],
            },
          },
          from: 5,
          size: 5,
          sort: [{ create_time: { order: 'desc' } }],
          aggs: { levels: { terms: { field: 'level' } } },
        },
      });
    });

    it('should reject invalid pagination', () => {
      const result = controller.handleBuildSearchBodyTool({ page: 0 });

      expect(result.isError).toBe(true);
      expect(resultJson(result)).toMatchObject({ error: 'page must be a positive integer' });
    });

    it('should reject malformed aggregations', () => {
      const result = controller.handleBuildSearchBodyTool({ aggregations: [{ name: 'x' }] });

      expect(resultJson(result)).toMatchObject({ error: 'aggregations[0].type must be a non-empty string' });
    });
  });
});
