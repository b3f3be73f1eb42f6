import type { ArffDocument, Cell, Row } from '../model/ArffDocument.js';
import type { Attribute } from '../model/Attribute.js';
import { AttributeType, assertNever } from '../model/AttributeType.js';
import { ArffKeywords, COMMENT_PREFIX, MISSING_VALUE } from '../model/Keywords.js';
import { ArffSchema } from '../model/Schema.js';
import type { DuplicateNamePolicy } from '../model/Schema.js';
import { ArffError, FormatError, IOError, errorMessage } from '../errors.js';
import { decodeAttribute } from './AttributeDecoder.js';
import { DEFAULT_DATE_FORMAT, DateFormat } from './DateFormat.js';
import { splitFields } from './FieldSplitter.js';
import { unquote, unquoteAny } from './quoting.js';

/** Parser configuration. */
export interface ArffParserOptions {
  /** Behaviour for a repeated attribute name. Default: `'overwrite'` (the later one wins the name lookup). */
  readonly duplicateAttributeNames: DuplicateNamePolicy;
  /** Pattern for `date` attributes that declare none. Default: {@link DEFAULT_DATE_FORMAT}. */
  readonly defaultDateFormat: string;
}

type ParseState = 'header' | 'data';

const NUMBER_LITERAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$|^[+-]?(?:NaN|Infinity)$/;

const MAX_CONTEXT_LENGTH = 200;

/**
 * Line-oriented ARFF parser.
 *
 * Runs a two-state machine: header lines (`@relation`, `@attribute`) until
 * `@data`, then data rows. A header-only run stops at `@data`. Every run
 * starts from a clean slate, so an instance can be reused but never
 * accumulates across runs. Any failure aborts the whole run.
 */
export class ArffParser {
  private readonly options: ArffParserOptions;
  private headerOnly = false;
  private state: ParseState = 'header';
  private lineNumber = 0;
  private relationName = '';
  private schema: ArffSchema;
  private rows: Row[] = [];
  private dateFormats = new Map<number, DateFormat>();

  constructor(options?: Partial<ArffParserOptions>) {
    this.options = {
      duplicateAttributeNames: options?.duplicateAttributeNames ?? 'overwrite',
      defaultDateFormat: options?.defaultDateFormat ?? DEFAULT_DATE_FORMAT,
    };
    this.schema = new ArffSchema(this.options.duplicateAttributeNames);
  }

  /** Parse header and data from text or pre-split lines. */
  parse(input: string | Iterable<string>): ArffDocument {
    return this.run(input, false);
  }

  /** Parse up to and including the `@data` marker only. */
  parseHeader(input: string | Iterable<string>): ArffDocument {
    return this.run(input, true);
  }

  /**
   * Parse lines delivered asynchronously (e.g. from a file or HTTP stream).
   * Errors thrown by the line iterator surface as `IOError` with the line the
   * reader had reached; a header-only run stops consuming at `@data`, which
   * lets the iterator release its resource.
   */
  async parseLines(lines: AsyncIterable<string>, location: string, headerOnly = false): Promise<ArffDocument> {
    this.begin(headerOnly);
    try {
      for await (const line of lines) {
        if (!this.consume(line)) break;
      }
    } catch (error) {
      if (error instanceof ArffError) throw error;
      throw IOError.fromSystemError(location, error, this.lineNumber + 1);
    }
    return this.finish();
  }

  private run(input: string | Iterable<string>, headerOnly: boolean): ArffDocument {
    this.begin(headerOnly);
    const lines = typeof input === 'string' ? input.split(/\r?\n|\r/) : input;
    for (const line of lines) {
      if (!this.consume(line)) break;
    }
    return this.finish();
  }

  private begin(headerOnly: boolean): void {
    this.headerOnly = headerOnly;
    this.state = 'header';
    this.lineNumber = 0;
    this.relationName = '';
    this.schema = new ArffSchema(this.options.duplicateAttributeNames);
    this.rows = [];
    this.dateFormats = new Map<number, DateFormat>();
  }

  private finish(): ArffDocument {
    return { relationName: this.relationName, schema: this.schema, rows: this.rows };
  }

  /** Feed one physical line. Returns `false` once the run is complete. */
  private consume(line: string): boolean {
    this.lineNumber++;
    try {
      return this.accept(line.trim());
    } catch (error) {
      const context = line.length > MAX_CONTEXT_LENGTH ? `${line.slice(0, MAX_CONTEXT_LENGTH)}...` : line;
      if (error instanceof FormatError) throw error.atLine(this.lineNumber, context);
      if (error instanceof ArffError) throw error;
      throw new FormatError(errorMessage(error), 'MALFORMED_ROW', this.lineNumber, context);
    }
  }

  private accept(line: string): boolean {
    if (line === '' || line.startsWith(COMMENT_PREFIX)) return true;

    if (this.state === 'data') {
      this.rows.push(this.decodeRow(line));
      return true;
    }

    const lower = line.toLowerCase();
    if (lower.startsWith(ArffKeywords.RELATION)) {
      this.relationName = unquoteAny(line.slice(ArffKeywords.RELATION.length).trim());
    } else if (lower.startsWith(ArffKeywords.ATTRIBUTE)) {
      const { attribute, dateFormat } = decodeAttribute(line, this.options);
      const index = this.schema.add(attribute);
      if (dateFormat) this.dateFormats.set(index, dateFormat);
    } else if (lower.startsWith(ArffKeywords.DATA)) {
      this.state = 'data';
      return !this.headerOnly;
    }
    return true;
  }

  private decodeRow(line: string): Row {
    const tokens = splitFields(line, { delimiter: ',', unquote: false, quoteChar: "'", escaped: true });
    const attributes = this.schema.attributes;
    const row: Cell[] = [];

    for (const [index, token] of tokens.entries()) {
      const attribute = attributes[index];
      if (!attribute) break;

      const value = token.trim();
      row.push(value === MISSING_VALUE ? null : this.coerce(unquote(value), attribute, index));
    }

    return row;
  }

  private coerce(value: string, attribute: Attribute, index: number): string {
    switch (attribute.type) {
      case AttributeType.NUMERIC:
        if (!NUMBER_LITERAL.test(value)) {
          throw new FormatError(`Malformed numeric value "${value}" for attribute ${attribute.name}`, 'MALFORMED_ROW');
        }
        return String(Number(value));
      case AttributeType.NOMINAL:
      case AttributeType.STRING:
        return value;
      case AttributeType.DATE:
        return String(this.dateFormatAt(index, attribute).parse(value));
      default:
        return assertNever(attribute.type, 'attribute type');
    }
  }

  private dateFormatAt(index: number, attribute: Attribute): DateFormat {
    let dateFormat = this.dateFormats.get(index);
    if (!dateFormat) {
      dateFormat = new DateFormat(attribute.dateFormat ?? this.options.defaultDateFormat);
      this.dateFormats.set(index, dateFormat);
    }
    return dateFormat;
  }
}
