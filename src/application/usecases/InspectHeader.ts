import type { ArffDocument } from '../../domain/model/ArffDocument.js';
import type { DataSource } from '../../domain/ports/DataSource.js';
import type { ArffParserOptions } from '../../domain/services/ArffParser.js';
import { errorMessage } from '../../domain/errors.js';
import type { EventBus } from '../EventBus.js';
import { ReadDocument } from './ReadDocument.js';

/** What the builder knows about the columns of its source. */
export type HeaderState =
  | { readonly status: 'pending' }
  | { readonly status: 'available'; readonly document: ArffDocument }
  | { readonly status: 'unavailable'; readonly error: string };

/**
 * Use case: header-only probe of a source.
 *
 * Unlike the full parse this never throws: a failure yields an
 * `'unavailable'` state and a `header:unavailable` event.
 */
export class InspectHeader {
  constructor(
    private readonly source: DataSource,
    private readonly parserOptions: Partial<ArffParserOptions> | undefined,
    private readonly eventBus: EventBus,
  ) {}

  async execute(): Promise<HeaderState> {
    const { location } = this.source.metadata();

    try {
      const document = await new ReadDocument(this.source, this.parserOptions).execute(true);
      this.eventBus.emit({
        type: 'header:inspected',
        source: location,
        relationName: document.relationName,
        attributeCount: document.schema.size,
        timestamp: Date.now(),
      });
      return { status: 'available', document };
    } catch (error) {
      const message = errorMessage(error);
      this.eventBus.emit({
        type: 'header:unavailable',
        source: location,
        error: message,
        timestamp: Date.now(),
      });
      return { status: 'unavailable', error: message };
    }
  }
}
