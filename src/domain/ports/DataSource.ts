/** Metadata about the data source, used for addressing, gzip detection and events. */
export interface SourceMetadata {
  /** Path or URL the source reads from; a `.gz` suffix marks gzip-compressed content. */
  readonly location: string;
  readonly fileName: string;
  readonly fileSize?: number;
  readonly mimeType: string;
}

/**
 * Port for reading raw ARFF bytes from any origin (file, HTTP, memory).
 *
 * A dataset is usually read twice: once header-only while the builder is
 * configured and once in full by `prepare()`. Every `read()` call must
 * therefore open the underlying resource afresh. Stopping the iteration early
 * must release the resource.
 */
export interface DataSource {
  /** Yield the raw bytes in chunks. */
  read(): AsyncIterable<Buffer>;
  metadata(): SourceMetadata;
}
