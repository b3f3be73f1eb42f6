import type { Attribute } from './domain/model/Attribute.js';
import { AttributeType, assertNever } from './domain/model/AttributeType.js';
import type { ColumnRole, FeatureKind, SelectedColumn } from './domain/model/Selection.js';
import { parseSchemaRecord } from './domain/model/SchemaRecord.js';
import type { SchemaRecord } from './domain/model/SchemaRecord.js';
import type { DataSource } from './domain/ports/DataSource.js';
import type { EncoderFactory } from './domain/ports/FeatureEncoder.js';
import type { ArffParserOptions } from './domain/services/ArffParser.js';
import type { DomainEvent, EventPayload, EventType } from './domain/events/DomainEvents.js';
import { ConfigurationError, errorMessage } from './domain/errors.js';
import { EventBus } from './application/EventBus.js';
import { InspectHeader } from './application/usecases/InspectHeader.js';
import type { HeaderState } from './application/usecases/InspectHeader.js';
import { resolveSource } from './infrastructure/sources/resolveSource.js';
import { defaultEncoders } from './infrastructure/encoders/defaultEncoders.js';
import { ArffDataset } from './ArffDataset.js';

/** Configuration for an `ArffDatasetBuilder`. */
export interface ArffDatasetBuilderOptions {
  /** Options for both the header probe and the full parse. */
  readonly parser?: Partial<ArffParserOptions>;
  /** Encoder assignment for selected columns. Default: `defaultEncoders`. */
  readonly encoders?: EncoderFactory;
}

/** A column-name pattern: a string must match the whole name, a `RegExp` is tested without its `g` and `y` flags. */
export type ColumnPattern = string | RegExp;

/**
 * Chainable configuration of which columns of an ARFF source become features,
 * labels or stay ignored.
 *
 * Operations that need column names or types (`classColumn`, `classIndex*`,
 * `ignoreMatching`, `addAllFeatures`, `addMatchingFeatures`) work against a
 * header-only parse that `inspectHeader()` loads once per `setSource()`. The
 * probe never fails: an unreadable header just leaves no columns to resolve.
 * All operations are order-sensitive; ignoring a column or switching a type
 * policy only affects selections made afterwards.
 *
 * @example
 * ```typescript
 * const builder = ArffDataset.builder().setSource('data/iris.arff');
 * await builder.inspectHeader();
 * const dataset = builder.classIsLast().addAllFeatures().build();
 * await dataset.prepare();
 * ```
 */
export class ArffDatasetBuilder {
  private readonly eventBus = new EventBus();
  private readonly parserOptions: Partial<ArffParserOptions> | undefined;
  private readonly encoders: EncoderFactory;
  private source: DataSource | null = null;
  private header: HeaderState = { status: 'pending' };
  private inspection: Promise<HeaderState> | null = null;

  private readonly classColumns = new Set<string>();
  private readonly ignoredColumns = new Set<string>();
  private readonly matchedPatterns = new Set<string>();
  private allFeaturesAdded = false;
  private dateColumnsAsNumeric = false;
  private stringColumnsAsNominal = false;

  private readonly features: SelectedColumn[] = [];
  private readonly labels: SelectedColumn[] = [];

  constructor(options?: ArffDatasetBuilderOptions) {
    this.parserOptions = options?.parser;
    this.encoders = options?.encoders ?? defaultEncoders;
  }

  /**
   * Set the ARFF file path, URL or data source. Discards any inspected header.
   *
   * @throws ConfigurationError for an invalid path or URL.
   */
  setSource(source: string | DataSource): this {
    this.source = typeof source === 'string' ? resolveSource(source) : source;
    this.header = { status: 'pending' };
    this.inspection = null;
    return this;
  }

  /** Load the header of the current source, once. Never rejects on unreadable or malformed sources. */
  async inspectHeader(): Promise<this> {
    const source = this.requireSource();
    if (this.header.status !== 'pending') return this;

    this.inspection ??= new InspectHeader(source, this.parserOptions, this.eventBus).execute();
    const inspection = this.inspection;
    const state = await inspection;
    // A setSource() while the probe was running supersedes its result.
    if (this.inspection === inspection) this.header = state;
    return this;
  }

  /** Column names of the inspected header; empty when nothing could be read. */
  getColumnNames(): string[] {
    return this.header.status === 'available' ? this.header.document.schema.names() : [];
  }

  getColumnType(name: string): AttributeType | undefined {
    return this.header.status === 'available' ? this.header.document.schema.typeOf(name) : undefined;
  }

  /** Treat DATE columns as numeric (epoch milliseconds) in later selections. */
  dateAsNumeric(): this {
    this.dateColumnsAsNumeric = true;
    return this;
  }

  /** Treat STRING columns as categorical in later selections. */
  stringAsNominal(): this {
    this.stringColumnsAsNominal = true;
    return this;
  }

  ignoreColumn(...names: string[]): this {
    for (const name of names) this.ignoredColumns.add(name);
    return this;
  }

  /** Ignore every known column whose name matches one of the patterns. */
  ignoreMatching(...patterns: ColumnPattern[]): this {
    const attributes = this.requireHeader();
    for (const pattern of patterns) {
      for (const attribute of attributes) {
        if (matches(pattern, attribute.name)) this.ignoredColumns.add(attribute.name);
      }
    }
    return this;
  }

  /**
   * Use the named column(s) as labels.
   *
   * @throws ConfigurationError when a name is not in the header.
   */
  classColumn(...names: string[]): this {
    const attributes = this.requireHeader();
    for (const name of names) {
      if (this.classColumns.has(name)) continue;

      const attribute = findLast(attributes, name);
      if (!attribute) {
        throw new ConfigurationError(`Unknown class column: ${name}`, this.describeColumns());
      }
      this.classify(attribute, 'label');
      this.classColumns.add(name);
    }
    return this;
  }

  /**
   * Use the column at `index` (0-based, header order) as label.
   *
   * @throws ConfigurationError when `index` is outside `[0, columnCount)`.
   */
  classIndex(index: number): this {
    const attributes = this.requireHeader();
    const attribute = Number.isInteger(index) ? attributes[index] : undefined;
    if (!attribute) {
      throw new ConfigurationError(
        `Class index ${String(index)} is outside [0, ${String(attributes.length)})`,
        this.describeColumns(),
      );
    }
    return this.classColumn(attribute.name);
  }

  classIndexFirst(): this {
    return this.classIndex(0);
  }

  classIndexLast(): this {
    return this.classIndex(this.requireHeader().length - 1);
  }

  /** Alias of `classIndexFirst()`. */
  classIsFirst(): this {
    return this.classIndexFirst();
  }

  /** Alias of `classIndexLast()`. */
  classIsLast(): this {
    return this.classIndexLast();
  }

  /** Add every column that is neither ignored nor a class column. A second call does nothing. */
  addAllFeatures(): this {
    if (this.allFeaturesAdded) return this;
    const attributes = this.requireHeader();
    this.allFeaturesAdded = true;

    for (const attribute of attributes) {
      if (this.classColumns.has(attribute.name)) continue;
      this.classify(attribute, 'feature');
    }
    return this;
  }

  /** Add the non-class columns whose names match. Each distinct pattern is applied once. */
  addMatchingFeatures(...patterns: ColumnPattern[]): this {
    for (const pattern of patterns) {
      const key = patternKey(pattern);
      if (this.matchedPatterns.has(key)) continue;
      const attributes = this.requireHeader();
      this.matchedPatterns.add(key);

      for (const attribute of attributes) {
        if (this.classColumns.has(attribute.name)) continue;
        if (matches(pattern, attribute.name)) this.classify(attribute, 'feature');
      }
    }
    return this;
  }

  addNumericFeature(name: string): this {
    return this.select(name, 'numeric', 'feature');
  }

  addCategoricalFeature(name: string): this {
    return this.select(name, 'categorical', 'feature');
  }

  addNumericLabel(name: string): this {
    this.select(name, 'numeric', 'label');
    this.classColumns.add(name);
    return this;
  }

  addCategoricalLabel(name: string): this {
    this.select(name, 'categorical', 'label');
    this.classColumns.add(name);
    return this;
  }

  getRole(name: string): ColumnRole {
    if (this.features.some((f) => f.name === name)) return 'feature';
    if (this.labels.some((l) => l.name === name)) return 'label';
    return 'ignored';
  }

  getFeatures(): readonly SelectedColumn[] {
    return [...this.features];
  }

  getLabels(): readonly SelectedColumn[] {
    return [...this.labels];
  }

  /** Export the selection made so far, in call order. */
  toSchemaRecord(): SchemaRecord {
    return {
      source: this.source?.metadata().location ?? '',
      options: {
        dateAsNumeric: this.dateColumnsAsNumeric,
        stringAsNominal: this.stringColumnsAsNominal,
      },
      features: this.features.map(({ name, kind }) => ({ name, type: kind })),
      labels: this.labels.map(({ name, kind }) => ({ name, type: kind })),
    };
  }

  /**
   * Replay an exported selection. Sets the source from the record when none is
   * set yet; selections are applied by name and kind without consulting the
   * header, ignore sets or patterns.
   *
   * @throws ConfigurationError when the record is malformed.
   */
  fromSchemaRecord(value: unknown): this {
    const record = parseSchemaRecord(value);
    if (!this.source) this.setSource(record.source);

    this.dateColumnsAsNumeric = record.options.dateAsNumeric;
    this.stringColumnsAsNominal = record.options.stringAsNominal;

    for (const feature of record.features) {
      this.select(feature.name, feature.type, 'feature');
    }
    for (const label of record.labels) {
      this.select(label.name, label.type, 'label');
      this.classColumns.add(label.name);
    }
    return this;
  }

  /** Subscribe to a builder or dataset event. Returns `this` for chaining. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.eventBus.on(type, handler);
    return this;
  }

  /** Subscribe to all events regardless of type. Returns `this` for chaining. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.eventBus.onAny(handler);
    return this;
  }

  /** Snapshot the configuration into a dataset. The dataset still needs `prepare()`. */
  build(): ArffDataset {
    return new ArffDataset({
      source: this.requireSource(),
      features: this.getFeatures(),
      labels: this.getLabels(),
      parserOptions: this.parserOptions,
      encoders: this.encoders,
      eventBus: this.eventBus,
    });
  }

  private classify(attribute: Attribute, role: 'feature' | 'label'): void {
    if (this.ignoredColumns.has(attribute.name)) {
      this.emitSkipped(attribute, 'ignored');
      return;
    }

    const kind = this.kindOf(attribute.type);
    if (kind === null) {
      this.emitSkipped(attribute, 'policy');
      return;
    }

    this.select(attribute.name, kind, role, attribute.type);
  }

  private kindOf(type: AttributeType): FeatureKind | null {
    switch (type) {
      case AttributeType.NUMERIC:
        return 'numeric';
      case AttributeType.DATE:
        return this.dateColumnsAsNumeric ? 'numeric' : null;
      case AttributeType.NOMINAL:
        return 'categorical';
      case AttributeType.STRING:
        return this.stringColumnsAsNominal ? 'categorical' : null;
      default:
        return assertNever(type, 'attribute type');
    }
  }

  private select(name: string, kind: FeatureKind, role: 'feature' | 'label', attributeType?: AttributeType): this {
    const current = this.getRole(name);
    if (current === role) return this;
    if (current !== 'ignored') {
      throw new ConfigurationError(`Column ${name} is already selected as ${current}, cannot add it as ${role}`);
    }

    (role === 'feature' ? this.features : this.labels).push({ name, kind });
    this.eventBus.emit({ type: 'column:selected', name, role, kind, attributeType, timestamp: Date.now() });
    return this;
  }

  private emitSkipped(attribute: Attribute, reason: 'ignored' | 'policy'): void {
    this.eventBus.emit({
      type: 'column:skipped',
      name: attribute.name,
      attributeType: attribute.type,
      reason,
      timestamp: Date.now(),
    });
  }

  private requireSource(): DataSource {
    if (!this.source) {
      throw new ConfigurationError('No source configured. Call setSource() first.');
    }
    return this.source;
  }

  private requireHeader(): readonly Attribute[] {
    const source = this.requireSource();
    switch (this.header.status) {
      case 'pending':
        throw new ConfigurationError(
          `Header of ${source.metadata().location} has not been inspected. Await inspectHeader() first.`,
        );
      case 'unavailable':
        return [];
      case 'available':
        return this.header.document.schema.attributes;
      default:
        return assertNever(this.header, 'header state');
    }
  }

  private describeColumns(): string {
    if (this.header.status === 'unavailable') return `Header unavailable: ${this.header.error}`;
    return `Columns: ${this.getColumnNames().join(', ')}`;
  }
}

/** The attribute the name lookup resolves to: the last one declared under that name. */
function findLast(attributes: readonly Attribute[], name: string): Attribute | undefined {
  for (let i = attributes.length - 1; i >= 0; i--) {
    const attribute = attributes[i];
    if (attribute?.name === name) return attribute;
  }
  return undefined;
}

function patternKey(pattern: ColumnPattern): string {
  return typeof pattern === 'string' ? pattern : pattern.toString();
}

function matches(pattern: ColumnPattern, name: string): boolean {
  return toRegExp(pattern).test(name);
}

function toRegExp(pattern: ColumnPattern): RegExp {
  if (typeof pattern !== 'string') {
    // Stateful flags would make repeated tests depend on the previous match.
    return new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
  }
  try {
    return new RegExp(`^(?:${pattern})$`);
  } catch (error) {
    throw new ConfigurationError(`Invalid column pattern: ${pattern}`, errorMessage(error));
  }
}
