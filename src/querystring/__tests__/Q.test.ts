import { describe, it, expect } from '@jest/globals';
import { InvalidIdentifierError, UnsupportedOperatorError } from '../errors.js';
import { tokenize } from '../Lexer.js';
import { parse } from '../Parser.js';
import { Q } from '../Q.js';
import { serialize } from '../Serializer.js';

describe('Q', () => {
  describe('lookups', () => {
    it('should default to equal', () => {
      expect(Q.lookup({ status: 'error' }).build()).toBe('status: "error"');
      expect(Q.lookup({ status__equal: 'error' }).build()).toBe('status: "error"');
    });

    it('should turn double underscores into nested field names', () => {
      expect(Q.lookup({ log__level__gte: 3 }).build()).toBe('log.level: >=3');
    });

    it('should join several lookups with AND', () => {
      expect(Q.lookup({ status__eq: 'error', level__gte: 3 }).build()).toBe('status: "error" AND level: >=3');
    });

    it('should resolve short operator names', () => {
      expect(Q.lookup({ message__contains: '*time*' }).build()).toBe('message: *time*');
      expect(Q.lookup({ status__neq: 'ok' }).build()).toBe('NOT status: "ok"');
      expect(Q.lookup({ name__regex: 'jo.*n' }).build()).toBe('name: /jo.*n/');
      expect(Q.lookup({ msg__NOT_CONTAINS: 'debug' }).build()).toBe('NOT msg: *debug*');
      expect(Q.lookup({ host__exists: true }).build()).toBe('host: *');
    });

    it('should keep an unknown suffix as part of the field name', () => {
      expect(Q.lookup({ status__fuzzy: 'x' }).build()).toBe('status.fuzzy: "x"');
    });

    it('should drop blank values', () => {
      expect(Q.lookup({ a: '  ', b: 'x' }).build()).toBe('b: "x"');
      expect(Q.lookup({ message__contains: '**' }).build()).toBe('');
      expect(Q.where('a', 'equal', null).build()).toBe('');
    });
  });

  describe('where', () => {
    it('should build multi-value and range conditions', () => {
      expect(Q.where('status', 'equal', ['a', 'b']).build()).toBe('status: ("a" OR "b")');
      expect(Q.where('age', 'between', [18, 60]).build()).toBe('age: [18 TO 60]');
    });

    it('should reject unknown operators when built', () => {
      const q = Q.where('a', 'fuzzy', 'x');
      expect(() => q.build()).toThrow(UnsupportedOperatorError);
      expect(() => q.build()).toThrow('Unsupported operator: fuzzy');
    });

    it('should reject fields that are not identifiers', () => {
      expect(() => Q.where('bad field', 'equal', 'x').build()).toThrow(InvalidIdentifierError);
    });
  });

  describe('composition', () => {
    it('should parenthesize an OR inside an AND', () => {
      const q = Q.lookup({ a: 1 }).or(Q.lookup({ b: 2 })).and(Q.lookup({ c: 3 }));
      expect(q.build()).toBe('(a: "1" OR b: "2") AND c: "3"');
    });

    it('should group OR-ed values of one field', () => {
      const q = Q.lookup({ status: 'error' })
        .or(Q.lookup({ status: 'warning' }))
        .and(Q.lookup({ log__level__gte: 3 }));
      expect(q.build()).toBe('status: ("error" OR "warning") AND log.level: >=3');
    });

    it('should negate single conditions and groups', () => {
      expect(Q.lookup({ status: 'ok' }).not().build()).toBe('NOT status: "ok"');

      const either = Q.lookup({ a: 'x' }).or(Q.lookup({ b: 'y' }));
      expect(either.not().build()).toBe('NOT (a: "x" OR b: "y")');
      expect(either.not().not().build()).toBe('a: "x" OR b: "y"');
    });

    it('should leave the original untouched', () => {
      const base = Q.lookup({ a: 'x' });
      base.not();
      base.or(Q.lookup({ b: 'y' }));
      expect(base.build()).toBe('a: "x"');
    });

    it('should ignore empty operands', () => {
      expect(Q.empty().build()).toBe('');
      expect(Q.empty().isEmpty()).toBe(true);
      expect(Q.empty().and(Q.lookup({ a: 'x' })).build()).toBe('a: "x"');
      expect(Q.lookup({ a: 'x' }).or(Q.empty()).build()).toBe('a: "x"');
    });

    it('should render through toString', () => {
      expect(`${Q.lookup({ a: 'x' })}`).toBe('a: "x"');
    });

    it('should produce text that parses back to the same query', () => {
      const text = Q.lookup({ a: 1 }).or(Q.lookup({ b: 2 })).and(Q.lookup({ c: 3 }).not()).build();

      expect(text).toBe('(a: "1" OR b: "2") AND NOT c: "3"');
      expect(serialize(parse(tokenize(text)))).toBe(text);
    });
  });
});
