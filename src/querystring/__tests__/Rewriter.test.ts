import { describe, it, expect } from '@jest/globals';
import { group, literal, not, range, term, type QueryNode } from '../ast.js';
import { tokenize } from '../Lexer.js';
import { parse } from '../Parser.js';
import { rewrite, type FieldMapping, type ValueTranslations } from '../Rewriter.js';
import { serialize } from '../Serializer.js';

const fieldMapping: FieldMapping = { level: 'severity', state: 'status' };
const valueTranslations: ValueTranslations = {
  severity: [
    ['1', 'fatal'],
    [2, 'warning'],
  ],
  status: [['ABNORMAL', 'abnormal']],
};

function parseText(text: string): QueryNode {
  return parse(tokenize(text));
}

function rewriteText(text: string, fm = fieldMapping, vt = valueTranslations): string {
  return serialize(rewrite(parseText(text), fm, vt));
}

describe('Rewriter', () => {
  describe('field mapping', () => {
    it('should rename mapped fields and translate their values', () => {
      expect(rewrite(parseText('level: fatal'), fieldMapping, valueTranslations)).toEqual(
        term('severity', literal('1'))
      );
    });

    it('should rename every mapped field at any depth', () => {
      expect(rewriteText('level: x OR (state: y AND NOT level: z)')).toBe(
        'severity: x OR (status: y AND NOT severity: z)'
      );
    });

    it('should leave unmapped fields untouched', () => {
      expect(rewriteText('host: web01')).toBe('host: web01');
    });

    it('should not look up inherited object properties', () => {
      expect(rewriteText('constructor: x')).toBe('constructor: x');
    });

    it('should translate range bounds', () => {
      expect(rewrite(parseText('level: [fatal TO warning]'), fieldMapping, valueTranslations)).toEqual(
        range('severity', { value: literal('1'), inclusive: true }, { value: literal('2'), inclusive: true })
      );
    });
  });

  describe('value translation', () => {
    it('should emit non-string canonical values as text', () => {
      expect(rewriteText('level: warning')).toBe('severity: 2');
    });

    it('should keep the quoted flag of a translated value', () => {
      expect(rewriteText('level: "fatal"')).toBe('severity: "1"');
    });

    it('should rename but not translate wildcard terms', () => {
      expect(rewriteText('level: fat*')).toBe('severity: fat*');
    });

    it('should translate inside negations and field groups', () => {
      expect(rewriteText('NOT level: (fatal OR warning)')).toBe('NOT severity: (1 OR 2)');
    });
  });

  describe('bare terms', () => {
    it('should broaden a bare display value with its canonical field', () => {
      const ast = parseText('fatal');
      expect(rewrite(ast, fieldMapping, valueTranslations)).toEqual(
        group('OR', [term(undefined, literal('fatal')), group('AND', [term('severity', literal('1'))])])
      );
    });

    it('should serialize a broadened term with the canonical clause grouped', () => {
      const vt: ValueTranslations = { severity: [[1, '致命']] };
      expect(rewriteText('致命', {}, vt)).toBe('致命 OR (severity: 1)');
    });

    it('should resolve a display value shared by several fields to the first field declared', () => {
      const vt: ValueTranslations = {
        severity: [[1, 'high']],
        priority: [['P1', 'high']],
      };
      expect(rewriteText('high', {}, vt)).toBe('high OR (severity: 1)');
    });

    it('should leave untranslated bare terms alone by default', () => {
      expect(rewriteText('timeout')).toBe('timeout');
    });

    it('should quote untranslated bare terms when asked to', () => {
      const ast = rewrite(parseText('timeout'), {}, {}, { quoteUntranslatedTerms: true });
      expect(ast).toEqual(term(undefined, literal('timeout', true)));
      expect(serialize(ast)).toBe('"timeout"');
    });

    it('should not broaden bare wildcard terms', () => {
      expect(rewriteText('fat*')).toBe('fat*');
    });
  });

  describe('structural sharing', () => {
    it('should return the same tree when nothing is mapped', () => {
      const ast = parseText('a: x AND (b: y OR NOT c: [1 TO 2])');
      expect(rewrite(ast, {}, {})).toBe(ast);
    });

    it('should reuse unchanged subtrees', () => {
      const untouched = term('host', literal('web01'));
      const ast = group('AND', [untouched, term('level', literal('fatal'))]);
      const result = rewrite(ast, fieldMapping, valueTranslations);

      expect(result).not.toBe(ast);
      expect(result.type === 'group' && result.children[0]).toBe(untouched);
    });

    it('should not modify the input tree', () => {
      const ast = not(term('level', literal('fatal')));
      rewrite(ast, fieldMapping, valueTranslations);
      expect(ast).toEqual(not(term('level', literal('fatal'))));
    });
  });

  it('should be idempotent when canonical values are not display values', () => {
    const once = rewriteText('level: fatal AND state: abnormal OR host: x');
    expect(once).toBe('(severity: 1 AND status: ABNORMAL) OR host: x');
    expect(rewriteText(once)).toBe(once);
  });
});
