/**
 * Quote stripping and backslash-escape decoding for ARFF values and names.
 */

/** Escape tokens and their literal characters. `\\` must stay a candidate so a literal backslash is never mis-split. */
const ESCAPES: readonly (readonly [token: string, literal: string])[] = [
  ['\\\\', '\\'],
  ["\\'", "'"],
  ['\\t', '\t'],
  ['\\n', '\n'],
  ['\\r', '\r'],
  ['\\"', '"'],
];

export function hasEscapes(text: string): boolean {
  return ESCAPES.some(([token]) => text.includes(token));
}

/**
 * Decode backslash escapes in a single left-to-right pass.
 *
 * At each step the earliest occurring token wins; the prefix before it is
 * copied verbatim and scanning resumes after the token.
 */
export function unescape(text: string): string {
  let rest = text;
  let result = '';

  while (rest.length > 0) {
    let match: readonly [string, string] | undefined;
    let position = rest.length;

    for (const escape of ESCAPES) {
      const at = rest.indexOf(escape[0]);
      if (at > -1 && at < position) {
        match = escape;
        position = at;
      }
    }

    if (match === undefined) {
      result += rest;
      break;
    }

    result += rest.slice(0, position) + match[1];
    rest = rest.slice(position + match[0].length);
  }

  return result;
}

/**
 * Remove the surrounding `quoteChar`s, if present, and decode escapes in the interior.
 * Strings that are not wrapped in `quoteChar` come back unchanged.
 */
export function unquote(text: string, quoteChar = "'"): string {
  if (text.length < 2 || !text.startsWith(quoteChar) || !text.endsWith(quoteChar)) {
    return text;
  }

  const interior = text.slice(1, -1);
  return hasEscapes(interior) ? unescape(interior) : interior;
}

/** Unquote with single quotes, then with double quotes. */
export function unquoteAny(text: string): string {
  const single = unquote(text, "'");
  return single === text ? unquote(text, '"') : single;
}
