import { describe, it, expect } from '@jest/globals';
import type { Condition } from '../../conditions/types.js';
import { literal, raw, term } from '../ast.js';
import { InvalidConditionError, InvalidIdentifierError, UnsupportedOperatorError } from '../errors.js';
import { tokenize } from '../Lexer.js';
import { parse } from '../Parser.js';
import { build, buildQueryNode, QueryStringBuilder } from '../QueryStringBuilder.js';
import { QueryStringTransformer } from '../QueryStringTransformer.js';
import { serialize } from '../Serializer.js';

describe('QueryStringBuilder', () => {
  it('should build grouped equality and a comparison', () => {
    const conditions: Condition[] = [
      { field: 'status', operator: 'equal', values: ['error', 'warning'] },
      { field: 'level', operator: 'gte', values: [3] },
    ];

    expect(build(conditions)).toBe('status: ("error" OR "warning") AND level: >=3');
  });

  describe('operators', () => {
    const one = (condition: Condition) => build([condition]);

    it('should quote equal values', () => {
      expect(one({ field: 'status', operator: 'equal', values: ['error'] })).toBe('status: "error"');
    });

    it('should negate not_equal', () => {
      expect(one({ field: 'status', operator: 'not_equal', values: ['ok'] })).toBe('NOT status: "ok"');
      expect(one({ field: 'status', operator: 'not_equal', values: ['a', 'b'] })).toBe('NOT status: ("a" OR "b")');
    });

    it('should combine values with AND when asked', () => {
      expect(one({ field: 'tags', operator: 'equal', values: ['a', 'b'], groupRelation: 'AND' })).toBe(
        'tags: ("a" AND "b")'
      );
    });

    it('should wrap include values in wildcards', () => {
      expect(one({ field: 'message', operator: 'include', values: ['time out'] })).toBe('message: *time\\ out*');
    });

    it('should escape wildcard characters inside include values', () => {
      expect(one({ field: 'message', operator: 'include', values: ['50%*'] })).toBe('message: *50%\\**');
    });

    it('should keep caller wildcards inside the wrapped pattern', () => {
      expect(one({ field: 'message', operator: 'include', values: ['err*'], wildcard: true })).toBe('message: *err**');
    });

    it('should wrap wildcard-flagged values without markers', () => {
      expect(one({ field: 'message', operator: 'include', values: ['timeout'], wildcard: true })).toBe(
        'message: *timeout*'
      );
    });

    it('should negate not_include', () => {
      expect(one({ field: 'message', operator: 'not_include', values: ['debug'] })).toBe('NOT message: *debug*');
    });

    it('should build inclusive ranges for between', () => {
      expect(one({ field: 'age', operator: 'between', values: [18, 60] })).toBe('age: [18 TO 60]');
    });

    it('should escape a literal * bound so it does not open the range', () => {
      expect(one({ field: 'f', operator: 'between', values: ['*', 5] })).toBe('f: [\\* TO 5]');
    });

    it('should reject between with fewer than two values', () => {
      expect(() => one({ field: 'age', operator: 'between', values: [18] })).toThrow(InvalidConditionError);
      expect(() => one({ field: 'age', operator: 'between', values: [18] })).toThrow(
        'Invalid condition on "age" (between): between requires two values'
      );
    });

    it('should build one-sided ranges for comparisons', () => {
      expect(one({ field: 'age', operator: 'gt', values: [18] })).toBe('age: >18');
      expect(one({ field: 'age', operator: 'gte', values: [18] })).toBe('age: >=18');
      expect(one({ field: 'age', operator: 'lt', values: [60] })).toBe('age: <60');
      expect(one({ field: 'age', operator: 'lte', values: [60] })).toBe('age: <=60');
    });

    it('should build existence checks without values', () => {
      expect(one({ field: 'host', operator: 'exists', values: [] })).toBe('host: *');
      expect(one({ field: 'host', operator: 'not_exists', values: [] })).toBe('NOT host: *');
    });

    it('should build regex clauses', () => {
      expect(one({ field: 'name', operator: 'reg', values: ['jo.*n'] })).toBe('name: /jo.*n/');
      expect(one({ field: 'name', operator: 'nreg', values: ['a/b'] })).toBe('NOT name: /a\\/b/');
    });
  });

  describe('skipped and invalid conditions', () => {
    it('should skip conditions without values', () => {
      expect(
        build([
          { field: 'status', operator: 'equal', values: [] },
          { field: 'host', operator: 'exists', values: [] },
        ])
      ).toBe('host: *');
    });

    it('should return an empty string when nothing is built', () => {
      expect(build([])).toBe('');
      expect(buildQueryNode([{ field: 'status', operator: 'equal', values: [] }])).toBeUndefined();
    });

    it('should reject unknown operators', () => {
      expect(() => build([{ field: 'status', operator: 'fuzzy', values: ['x'] }])).toThrow(UnsupportedOperatorError);
      expect(() => build([{ field: 'status', operator: 'fuzzy', values: ['x'] }])).toThrow(
        'Unsupported operator: fuzzy'
      );
    });

    it('should reject fields that are not identifiers', () => {
      expect(() => build([{ field: 'bad field', operator: 'equal', values: ['x'] }])).toThrow(InvalidIdentifierError);
      expect(() => build([{ field: 'bad field', operator: 'equal', values: ['x'] }])).toThrow(
        'Invalid identifier "bad field" in condition "equal"'
      );
    });
  });

  describe('options', () => {
    it('should resolve operator aliases', () => {
      expect(build([{ field: 'status', operator: 'eq', values: ['ok'] }], { operatorMapping: { eq: 'equal' } })).toBe(
        'status: "ok"'
      );
    });

    it('should join conditions with the configured logic operator', () => {
      const conditions: Condition[] = [
        { field: 'a', operator: 'equal', values: ['x'] },
        { field: 'b', operator: 'equal', values: ['y'] },
      ];
      expect(build(conditions, { logicOperator: 'OR' })).toBe('a: "x" OR b: "y"');
    });

    it('should delegate custom operators to condition parsers', () => {
      const conditionParsers = {
        near: {
          parse: (condition: Condition) => raw(`${condition.field}: "${condition.values.join(' ')}"~5`),
        },
      };

      expect(build([{ field: 'body', operator: 'near', values: ['quick', 'fox'] }], { conditionParsers })).toBe(
        'body: "quick fox"~5'
      );
    });

    it('should drop a condition its parser declines', () => {
      const conditionParsers = { ignore: { parse: () => undefined } };
      expect(
        build(
          [
            { field: 'a', operator: 'ignore', values: ['x'] },
            { field: 'b', operator: 'exists', values: [] },
          ],
          { conditionParsers }
        )
      ).toBe('b: *');
    });
  });

  describe('chaining', () => {
    it('should collect filters and clear them', () => {
      const builder = new QueryStringBuilder()
        .addFilter('status', 'equal', ['error'])
        .addFilter('tags', 'include', ['db'], { groupRelation: 'AND' });

      expect(builder.buildNode()).toEqual({
        type: 'group',
        op: 'AND',
        children: [term('status', literal('error', true)), term('tags', literal('*db*'), true)],
      });
      expect(builder.build()).toBe('status: "error" AND tags: *db*');
      expect(builder.clear().build()).toBe('');
    });
  });

  describe('escaping', () => {
    const values = ['a:b', 'x"y', 'back\\slash', '(paren)', 'AND', 'with space', 'star*', 'slash/'];
    const reserved = '+-=&|><!(){}[]^"~*?:\\/';

    it.each(values)('should parse back to the original value: %s', (value) => {
      const text = build([{ field: 'f', operator: 'equal', values: [value] }]);
      expect(new QueryStringTransformer().parse(text)).toEqual(term('f', literal(value, true)));
    });

    it('should quote a value holding every reserved character and a space', () => {
      const value = `${reserved} x`;
      const text = build([{ field: 'f', operator: 'equal', values: [value] }]);

      expect(text).toBe('f: "+-=&|><!(){}[]^\\"~*?:\\\\/ x"');
      expect(parse(tokenize(text))).toEqual(term('f', literal(value, true)));
    });

    it('should backslash-escape every reserved character in a bare literal', () => {
      const text = serialize(term('f', literal(reserved)));

      expect(text).toBe(String.raw`f: \+\-\=\&\|\>\<\!\(\)\{\}\[\]\^\"\~\*\?\:\\\/`);
      expect(parse(tokenize(text))).toEqual(term('f', literal(reserved)));
    });
  });

  describe('round trip', () => {
    const cases: Array<[string, Condition]> = [
      ['equal', { field: 'status', operator: 'equal', values: ['error'] }],
      ['equal with several values', { field: 'status', operator: 'equal', values: ['a', 'b'] }],
      ['not_equal', { field: 'status', operator: 'not_equal', values: ['ok'] }],
      ['include', { field: 'message', operator: 'include', values: ['time out'] }],
      ['include with a literal *', { field: 'message', operator: 'include', values: ['50%*'] }],
      ['include with caller wildcards', { field: 'message', operator: 'include', values: ['err*'], wildcard: true }],
      ['not_include', { field: 'message', operator: 'not_include', values: ['debug'] }],
      ['between', { field: 'age', operator: 'between', values: [18, 60] }],
      ['between with a literal * bound', { field: 'f', operator: 'between', values: ['*', 5] }],
      ['gt', { field: 'age', operator: 'gt', values: [18] }],
      ['gte', { field: 'age', operator: 'gte', values: [18] }],
      ['lt', { field: 'age', operator: 'lt', values: [60] }],
      ['lte', { field: 'age', operator: 'lte', values: [60] }],
      ['exists', { field: 'host', operator: 'exists', values: [] }],
      ['not_exists', { field: 'host', operator: 'not_exists', values: [] }],
      ['reg', { field: 'name', operator: 'reg', values: ['jo.*n'] }],
      ['nreg', { field: 'name', operator: 'nreg', values: ['a/b'] }],
    ];

    it.each(cases)('should reserialize %s output unchanged', (_name, condition) => {
      const text = build([condition]);
      expect(serialize(parse(tokenize(text)))).toBe(text);
    });
  });
});
