import { unquote } from './quoting.js';

export interface SplitOptions {
  /** Field delimiter. Default: `','`. */
  readonly delimiter: string;
  /** Pass every emitted field through `unquote()`. Default: `false`. */
  readonly unquote: boolean;
  /** Quote character that protects delimiters. Default: `"'"`. */
  readonly quoteChar: string;
  /** A quote preceded by a backslash does not open or close a quoted section. Default: `true`. */
  readonly escaped: boolean;
}

const DEFAULT_SPLIT_OPTIONS: SplitOptions = {
  delimiter: ',',
  unquote: false,
  quoteChar: "'",
  escaped: true,
};

/**
 * Quote-aware split of one line.
 *
 * Quote characters are kept in the fields. An empty buffer at the end of the
 * line is not emitted, so `"a,b,"` yields `["a", "b"]`.
 */
export function splitFields(line: string, options?: Partial<SplitOptions>): string[] {
  const { delimiter, unquote: strip, quoteChar, escaped } = { ...DEFAULT_SPLIT_OPTIONS, ...options };
  const fields: string[] = [];
  const emit = (field: string): void => {
    fields.push(strip ? unquote(field, quoteChar) : field);
  };

  let current = '';
  let quoted = false;
  let backslash = false;

  for (const c of line) {
    if (c === quoteChar) {
      if (!backslash) quoted = !quoted;
      current += c;
    } else if (c === delimiter) {
      if (quoted) {
        current += c;
      } else {
        emit(current);
        current = '';
      }
    } else {
      current += c;
    }

    if (escaped) backslash = c === '\\';
  }

  if (current.length > 0) emit(current);

  return fields;
}
