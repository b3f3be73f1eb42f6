import type { ArffDocument } from '../../domain/model/ArffDocument.js';
import type { DataSource } from '../../domain/ports/DataSource.js';
import { ArffParser } from '../../domain/services/ArffParser.js';
import type { ArffParserOptions } from '../../domain/services/ArffParser.js';
import { readLines } from '../../infrastructure/readLines.js';

/** Use case: parse a source, in full or up to `@data`. Errors always propagate. */
export class ReadDocument {
  constructor(
    private readonly source: DataSource,
    private readonly parserOptions?: Partial<ArffParserOptions>,
  ) {}

  execute(headerOnly = false): Promise<ArffDocument> {
    const { location } = this.source.metadata();
    return new ArffParser(this.parserOptions).parseLines(readLines(this.source), location, headerOnly);
  }
}

/** Parse a whole source. */
export function parseSource(source: DataSource, options?: Partial<ArffParserOptions>): Promise<ArffDocument> {
  return new ReadDocument(source, options).execute();
}

/** Parse a source up to `@data`; the rest of the source is not read. */
export function parseSourceHeader(source: DataSource, options?: Partial<ArffParserOptions>): Promise<ArffDocument> {
  return new ReadDocument(source, options).execute(true);
}
