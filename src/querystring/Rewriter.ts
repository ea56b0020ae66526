import {
  type Bound,
  type Literal,
  type QueryNode,
  type RangeNode,
  type TermNode,
  group,
  literal,
  not,
  range,
  term,
} from './ast.js';

/** Display identifier → canonical identifier. */
export type FieldMapping = Readonly<Record<string, string>>;

/** One `[canonical value, display value]` pair. */
export type ValueTranslation = readonly [canonical: string | number | boolean, display: string];

/** Canonical identifier → ordered translations; the first matching display value wins. */
export type ValueTranslations = Readonly<Record<string, readonly ValueTranslation[]>>;

export interface RewriteOptions {
  /**
   * Turn a field-less term that matches no translation into a quoted phrase,
   * so it only matches the exact text.
   */
  quoteUntranslatedTerms?: boolean;
}

interface TranslationHit {
  field: string;
  canonical: string;
}

/**
 * Renames fields and translates display values to their stored form.
 *
 * The input tree is never modified. Subtrees that need no change are returned
 * by reference, so rewriting an unmapped tree yields the very same object.
 */
export class Rewriter {
  constructor(
    private readonly fieldMapping: FieldMapping,
    private readonly valueTranslations: ValueTranslations,
    private readonly options: RewriteOptions = {}
  ) {}

  rewrite(node: QueryNode): QueryNode {
    switch (node.type) {
      case 'term':
        return this.rewriteTerm(node);
      case 'range':
        return this.rewriteRange(node);
      case 'not': {
        const inner = this.rewrite(node.inner);
        return inner === node.inner ? node : not(inner);
      }
      case 'group': {
        let changed = false;
        const children = node.children.map((child) => {
          const next = this.rewrite(child);
          if (next !== child) changed = true;
          return next;
        });
        return changed ? group(node.op, children) : node;
      }
      case 'raw':
        return node;
    }
  }

  private mapField(field: string): string {
    return Object.prototype.hasOwnProperty.call(this.fieldMapping, field)
      ? this.fieldMapping[field]
      : field;
  }

  private translate(field: string, value: Literal): Literal {
    const translations = this.translationsFor(field);
    if (!translations) return value;

    for (const [canonical, display] of translations) {
      if (display === value.text) {
        return literal(String(canonical), value.quoted);
      }
    }
    return value;
  }

  private translationsFor(field: string): readonly ValueTranslation[] | undefined {
    return Object.prototype.hasOwnProperty.call(this.valueTranslations, field)
      ? this.valueTranslations[field]
      : undefined;
  }

  /**
   * Search every field's table, in declaration order, for a display value.
   */
  private findAnyTranslation(text: string): TranslationHit | undefined {
    for (const [field, translations] of Object.entries(this.valueTranslations)) {
      for (const [canonical, display] of translations) {
        if (display === text) {
          return { field, canonical: String(canonical) };
        }
      }
    }
    return undefined;
  }

  private rewriteTerm(node: TermNode): QueryNode {
    if (node.field === undefined) {
      return this.rewriteBareTerm(node);
    }

    const field = this.mapField(node.field);
    const value = node.isWildcard ? node.value : this.translate(field, node.value);

    if (field === node.field && value === node.value) {
      return node;
    }
    return term(field, value, node.isWildcard);
  }

  /**
   * A term without a field is broadened, never narrowed: the literal text
   * stays searchable and the known field is OR-ed in with its stored value.
   */
  private rewriteBareTerm(node: TermNode): QueryNode {
    if (node.isWildcard) {
      return node;
    }

    const hit = this.findAnyTranslation(node.value.text);
    if (hit) {
      const canonicalTerm = term(hit.field, literal(hit.canonical));
      return group('OR', [node, group('AND', [canonicalTerm])]);
    }

    if (this.options.quoteUntranslatedTerms && !node.value.quoted) {
      return term(undefined, literal(node.value.text, true));
    }
    return node;
  }

  private rewriteRange(node: RangeNode): QueryNode {
    const field = this.mapField(node.field);
    const lower = this.rewriteBound(field, node.lower);
    const upper = this.rewriteBound(field, node.upper);

    if (field === node.field && lower === node.lower && upper === node.upper) {
      return node;
    }

    return range(field, lower, upper);
  }

  private rewriteBound(field: string, bound: Bound | undefined): Bound | undefined {
    if (!bound) return bound;
    const value = this.translate(field, bound.value);
    return value === bound.value ? bound : { value, inclusive: bound.inclusive };
  }
}

/**
 * Rewrite `ast` with the given tables. Never throws: unmapped fields and
 * untranslatable values are left as they are.
 */
export function rewrite(
  ast: QueryNode,
  fieldMapping: FieldMapping,
  valueTranslations: ValueTranslations,
  options?: RewriteOptions
): QueryNode {
  return new Rewriter(fieldMapping, valueTranslations, options).rewrite(ast);
}
