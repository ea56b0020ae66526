/**
 * Escaping and quoting helpers for query-string literals.
 *
 * `+ - = && || > < ! ( ) { } [ ] ^ " ~ * ? : \ /` have a meaning in the query
 * language and must be backslash-escaped to be matched literally. `&&` and
 * `||` are covered by escaping every `&` and `|`.
 */

export const RESERVED_CHARACTERS: ReadonlySet<string> = new Set([
  '+',
  '-',
  '=',
  '&',
  '|',
  '>',
  '<',
  '!',
  '(',
  ')',
  '{',
  '}',
  '[',
  ']',
  '^',
  '"',
  '~',
  '*',
  '?',
  ':',
  '\\',
  '/',
]);

export const WILDCARD_CHARACTERS: ReadonlySet<string> = new Set(['*', '?']);

export const BOOLEAN_KEYWORDS: ReadonlySet<string> = new Set(['AND', 'OR', 'NOT', 'TO']);

const WHITESPACE = /\s/;

export function isWhitespace(ch: string): boolean {
  return WHITESPACE.test(ch);
}

/**
 * Backslash-escape reserved characters and whitespace in a bare literal.
 *
 * With `preserveWildcards`, `text` is treated as a wildcard pattern: `*` and
 * `?` are emitted as-is and existing backslash escapes are passed through.
 */
export function escapeLiteral(text: string, options: { preserveWildcards?: boolean } = {}): string {
  let out = '';
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (options.preserveWildcards) {
      if (ch === '\\' && i + 1 < text.length) {
        out += ch + text[++i];
        continue;
      }
      if (WILDCARD_CHARACTERS.has(ch)) {
        out += ch;
        continue;
      }
    }
    out += RESERVED_CHARACTERS.has(ch) || isWhitespace(ch) ? `\\${ch}` : ch;
  }
  return out;
}

/**
 * Wrap a value in double quotes, escaping `"` and `\`.
 */
export function quote(text: string): string {
  return `"${text.replace(/[\\"]/g, (ch) => `\\${ch}`)}"`;
}

/**
 * Inverse of {@link quote}. Text that is not wrapped in quotes is returned unchanged.
 */
export function unquote(text: string): string {
  if (text.length < 2 || !text.startsWith('"') || !text.endsWith('"')) {
    return text;
  }
  return text.slice(1, -1).replace(/\\(.)/gs, '$1');
}

/**
 * Escape `\`, `*` and `?` so a plain value can be embedded in a wildcard pattern.
 */
export function escapeWildcardPattern(text: string): string {
  return text.replace(/[\\*?]/g, (ch) => `\\${ch}`);
}

/**
 * Regex literals have their own reserved set: only the `/` delimiter.
 */
export function escapeRegexLiteral(text: string): string {
  let out = '';
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '\\' && i + 1 < text.length) {
      out += ch + text[++i];
    } else {
      out += ch === '/' || ch === '\\' ? `\\${ch}` : ch;
    }
  }
  return out;
}

const SPECIAL_CHARS = /([+\-=&|><!(){}[\]^"~*?\\:/ ])/g;
const ESCAPED_SPECIAL_CHARS = /\\([+\-=&|><!(){}[\]^"~*?\\:/ ])/g;

function escapeOne(value: string): string {
  return value.replace(ESCAPED_SPECIAL_CHARS, '$1').replace(SPECIAL_CHARS, '\\$1');
}

/**
 * Escape every reserved character and space in free text.
 *
 * Existing escapes are removed first, so already-escaped input is not escaped
 * twice. Accepts a single string or a list and returns the same shape.
 *
 * @example
 * escapeQueryString('hello world')      // 'hello\\ world'
 * escapeQueryString(['a+b', 'c:d'])     // ['a\\+b', 'c\\:d']
 */
export function escapeQueryString(value: string): string;
export function escapeQueryString(value: readonly string[]): string[];
export function escapeQueryString(value: string | readonly string[]): string | string[] {
  if (typeof value === 'string') {
    return escapeOne(value);
  }
  return value.map(escapeOne);
}
