import type { AttributeType } from '../model/AttributeType.js';
import type { FeatureKind } from '../model/Selection.js';

/** Emitted when the builder's header-only probe succeeds. */
export interface HeaderInspectedEvent {
  readonly type: 'header:inspected';
  readonly source: string;
  readonly relationName: string;
  readonly attributeCount: number;
  readonly timestamp: number;
}

/**
 * Emitted when the header-only probe fails. The builder carries on without
 * column information; the full parse in `prepare()` will surface the error.
 */
export interface HeaderUnavailableEvent {
  readonly type: 'header:unavailable';
  readonly source: string;
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted for each column classified as feature or label. */
export interface ColumnSelectedEvent {
  readonly type: 'column:selected';
  readonly name: string;
  readonly role: 'feature' | 'label';
  readonly kind: FeatureKind;
  /** Absent for explicit selections made without consulting the header. */
  readonly attributeType?: AttributeType;
  readonly timestamp: number;
}

/** Emitted when a column is passed over: explicitly ignored, or its type is excluded by policy. */
export interface ColumnSkippedEvent {
  readonly type: 'column:skipped';
  readonly name: string;
  readonly attributeType: AttributeType;
  readonly reason: 'ignored' | 'policy';
  readonly timestamp: number;
}

/** Emitted when `prepare()` has parsed the full table. */
export interface DatasetPreparedEvent {
  readonly type: 'dataset:prepared';
  readonly source: string;
  readonly relationName: string;
  readonly rowCount: number;
  readonly featureCount: number;
  readonly labelCount: number;
  readonly timestamp: number;
}

/** Emitted when `prepare()` fails; the error is rethrown to the caller. */
export interface DatasetFailedEvent {
  readonly type: 'dataset:failed';
  readonly source: string;
  readonly error: string;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | HeaderInspectedEvent
  | HeaderUnavailableEvent
  | ColumnSelectedEvent
  | ColumnSkippedEvent
  | DatasetPreparedEvent
  | DatasetFailedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;

export function isEventOf<T extends EventType>(event: DomainEvent, type: T): event is EventPayload<T> {
  return event.type === type;
}
