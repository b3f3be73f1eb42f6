// Main entry points
export { ArffDataset } from './ArffDataset.js';
export type { ArffDatasetConfig, ColumnCell, EncodedRow } from './ArffDataset.js';
export { ArffDatasetBuilder } from './ArffDatasetBuilder.js';
export type { ArffDatasetBuilderOptions, ColumnPattern } from './ArffDatasetBuilder.js';

// Domain model
export { AttributeType } from './domain/model/AttributeType.js';
export type { Attribute } from './domain/model/Attribute.js';
export type { ArffDocument, Cell, Row } from './domain/model/ArffDocument.js';
export { ArffSchema } from './domain/model/Schema.js';
export type { DuplicateNamePolicy } from './domain/model/Schema.js';
export { ArffKeywords, COMMENT_PREFIX, MISSING_VALUE } from './domain/model/Keywords.js';
export { COMPATIBLE_TYPES } from './domain/model/Selection.js';
export type { ColumnRole, FeatureKind, SelectedColumn, ResolvedColumn } from './domain/model/Selection.js';
export { SchemaRecordSchema, parseSchemaRecord } from './domain/model/SchemaRecord.js';
export type { SchemaRecord, SchemaRecordColumn } from './domain/model/SchemaRecord.js';

// Errors
export { ArffError, ConfigurationError, FormatError, IOError, OutOfRangeError } from './domain/errors.js';
export type { ArffErrorCode, FormatErrorCode } from './domain/errors.js';

// Domain services (usable without a dataset)
export { ArffParser } from './domain/services/ArffParser.js';
export type { ArffParserOptions } from './domain/services/ArffParser.js';
export { decodeAttribute } from './domain/services/AttributeDecoder.js';
export type { DecodedAttribute, AttributeDecoderOptions } from './domain/services/AttributeDecoder.js';
export { DateFormat, DEFAULT_DATE_FORMAT } from './domain/services/DateFormat.js';
export { splitFields } from './domain/services/FieldSplitter.js';
export type { SplitOptions } from './domain/services/FieldSplitter.js';
export { unescape, unquote, unquoteAny } from './domain/services/quoting.js';

// Application internals
export { EventBus } from './application/EventBus.js';
export type { HeaderState } from './application/usecases/InspectHeader.js';
export { ReadDocument, parseSource, parseSourceHeader } from './application/usecases/ReadDocument.js';

// Ports (for custom implementations)
export type { DataSource, SourceMetadata } from './domain/ports/DataSource.js';
export type { FeatureEncoder, EncoderFactory } from './domain/ports/FeatureEncoder.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  HeaderInspectedEvent,
  HeaderUnavailableEvent,
  ColumnSelectedEvent,
  ColumnSkippedEvent,
  DatasetPreparedEvent,
  DatasetFailedEvent,
} from './domain/events/DomainEvents.js';
export { isEventOf } from './domain/events/DomainEvents.js';

// Infrastructure adapters (built-in)
export { BufferSource } from './infrastructure/sources/BufferSource.js';
export type { BufferSourceOptions } from './infrastructure/sources/BufferSource.js';
export { FilePathSource } from './infrastructure/sources/FilePathSource.js';
export type { FilePathSourceOptions } from './infrastructure/sources/FilePathSource.js';
export { UrlSource } from './infrastructure/sources/UrlSource.js';
export type { UrlSourceOptions } from './infrastructure/sources/UrlSource.js';
export { resolveSource } from './infrastructure/sources/resolveSource.js';
export { readLines, isGzipped } from './infrastructure/readLines.js';
export { detectMimeType } from './infrastructure/detectMimeType.js';
export { NumericEncoder } from './infrastructure/encoders/NumericEncoder.js';
export { CategoricalEncoder } from './infrastructure/encoders/CategoricalEncoder.js';
export { defaultEncoders } from './infrastructure/encoders/defaultEncoders.js';
