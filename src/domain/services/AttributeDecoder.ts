import type { Attribute } from '../model/Attribute.js';
import { AttributeType, assertNever } from '../model/AttributeType.js';
import { ArffKeywords } from '../model/Keywords.js';
import { FormatError } from '../errors.js';
import { DateFormat } from './DateFormat.js';
import { splitFields } from './FieldSplitter.js';
import { unquote } from './quoting.js';

/** An attribute declaration plus the compiled pattern of a `DATE` attribute. */
export interface DecodedAttribute {
  readonly attribute: Attribute;
  readonly dateFormat?: DateFormat;
}

export interface AttributeDecoderOptions {
  /** Pattern for `date` attributes that declare none. */
  readonly defaultDateFormat: string;
}

/** Type keywords, matched as prefixes of the lower-cased type text. First match wins. */
const TYPE_PREFIXES: readonly (readonly [prefix: string, type: AttributeType])[] = [
  ['numeric', AttributeType.NUMERIC],
  ['real', AttributeType.NUMERIC],
  ['integer', AttributeType.NUMERIC],
  ['string', AttributeType.STRING],
  ['date', AttributeType.DATE],
  ['{', AttributeType.NOMINAL],
];

/**
 * Decode one `@attribute` line into name, type and, for dates, the pattern.
 *
 * @throws FormatError `MALFORMED_ATTRIBUTE`, `UNSUPPORTED_ATTRIBUTE_TYPE` or `INVALID_DATE_FORMAT`.
 */
export function decodeAttribute(line: string, options: AttributeDecoderOptions): DecodedAttribute {
  const body = line.replace(/\t/g, ' ').slice(ArffKeywords.ATTRIBUTE.length).trim();
  const { name, rest } = splitName(body);

  const lower = rest.toLowerCase();
  const match = TYPE_PREFIXES.find(([prefix]) => lower.startsWith(prefix));
  if (!match) {
    throw new FormatError(`Unsupported attribute type: ${rest}`, 'UNSUPPORTED_ATTRIBUTE_TYPE');
  }
  const type = match[1];

  switch (type) {
    case AttributeType.NUMERIC:
    case AttributeType.STRING:
      return { attribute: { name, type } };
    case AttributeType.NOMINAL:
      return { attribute: { name, type, values: nominalValues(rest) } };
    case AttributeType.DATE: {
      const dateFormat = new DateFormat(datePattern(rest, options.defaultDateFormat));
      return { attribute: { name, type, dateFormat: dateFormat.pattern }, dateFormat };
    }
    default:
      return assertNever(type, 'attribute type');
  }
}

function splitName(body: string): { name: string; rest: string } {
  const quote = body[0];
  if (quote === "'" || quote === '"') {
    const close = closingQuote(body, quote);
    if (close === -1) {
      throw new FormatError(`Unterminated attribute name: ${body}`, 'MALFORMED_ATTRIBUTE');
    }
    return { name: unquote(body.slice(0, close + 1), quote).trim(), rest: body.slice(close + 1).trim() };
  }

  const space = body.indexOf(' ');
  if (space < 1) {
    throw new FormatError(`Attribute declaration without a type: ${body}`, 'MALFORMED_ATTRIBUTE');
  }
  return { name: body.slice(0, space), rest: body.slice(space + 1).trim() };
}

/** Index of the first `quote` after position 0 that is not preceded by a backslash. */
function closingQuote(text: string, quote: string): number {
  for (let i = 1; i < text.length; i++) {
    if (text[i] === quote && text[i - 1] !== '\\') return i;
  }
  return -1;
}

function nominalValues(declaration: string): string[] {
  const close = declaration.lastIndexOf('}');
  const interior = declaration.slice(1, close === -1 ? undefined : close);
  return splitFields(interior, { delimiter: ',', unquote: false, quoteChar: "'", escaped: true })
    .map((value) => unquote(value.trim()))
    .filter((value) => value !== '');
}

function datePattern(declaration: string, fallback: string): string {
  const text = declaration.slice('date'.length).trim();
  let pattern: string;
  if (text.startsWith("'")) {
    pattern = unquote(text, "'");
  } else if (text.startsWith('"')) {
    pattern = unquote(text, '"');
  } else {
    pattern = text;
  }
  return pattern === '' ? fallback : pattern;
}
