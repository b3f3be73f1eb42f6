import type { ArffDocument, Cell } from './domain/model/ArffDocument.js';
import type { Attribute } from './domain/model/Attribute.js';
import type { AttributeType } from './domain/model/AttributeType.js';
import { COMPATIBLE_TYPES } from './domain/model/Selection.js';
import type { ResolvedColumn, SelectedColumn } from './domain/model/Selection.js';
import type { DataSource } from './domain/ports/DataSource.js';
import type { EncoderFactory, FeatureEncoder } from './domain/ports/FeatureEncoder.js';
import type { ArffParserOptions } from './domain/services/ArffParser.js';
import { ConfigurationError, OutOfRangeError, errorMessage } from './domain/errors.js';
import type { EventBus } from './application/EventBus.js';
import { ReadDocument } from './application/usecases/ReadDocument.js';
import { ArffDatasetBuilder } from './ArffDatasetBuilder.js';
import type { ArffDatasetBuilderOptions } from './ArffDatasetBuilder.js';

/** Everything a dataset needs from its builder. */
export interface ArffDatasetConfig {
  readonly source: DataSource;
  readonly features: readonly SelectedColumn[];
  readonly labels: readonly SelectedColumn[];
  readonly parserOptions?: Partial<ArffParserOptions>;
  readonly encoders: EncoderFactory;
  readonly eventBus: EventBus;
}

/** One cell as handed to an encoder or training pipeline: column, declared type and raw decoded value. */
export interface ColumnCell {
  readonly name: string;
  readonly type: AttributeType;
  readonly value: Cell;
}

/** Encoded feature and label vectors of one row. */
export interface EncodedRow {
  readonly features: number[];
  readonly labels: number[];
}

interface PreparedState {
  readonly document: ArffDocument;
  readonly features: readonly ResolvedColumn[];
  readonly labels: readonly ResolvedColumn[];
  readonly encoders: ReadonlyMap<string, FeatureEncoder>;
}

/**
 * Read-only view over a parsed ARFF table and the selected feature and label
 * columns.
 *
 * Created by `ArffDatasetBuilder.build()`. `prepare()` reads the whole source
 * into memory; every accessor below requires it to have completed.
 */
export class ArffDataset {
  private prepared: PreparedState | null = null;

  constructor(private readonly config: ArffDatasetConfig) {}

  static builder(options?: ArffDatasetBuilderOptions): ArffDatasetBuilder {
    return new ArffDatasetBuilder(options);
  }

  /**
   * Parse the full source, check the selections against its header and fit the encoders.
   *
   * @throws FormatError, IOError or ConfigurationError; nothing is kept from a failed run.
   */
  async prepare(): Promise<void> {
    const { location } = this.config.source.metadata();

    try {
      const document = await new ReadDocument(this.config.source, this.config.parserOptions).execute();
      const encoders = new Map<string, FeatureEncoder>();
      const features = this.config.features.map((column) => this.resolve(document, column, encoders));
      const labels = this.config.labels.map((column) => this.resolve(document, column, encoders));

      this.prepared = { document, features, labels, encoders };
      this.config.eventBus.emit({
        type: 'dataset:prepared',
        source: location,
        relationName: document.relationName,
        rowCount: document.rows.length,
        featureCount: features.length,
        labelCount: labels.length,
        timestamp: Date.now(),
      });
    } catch (error) {
      this.prepared = null;
      this.config.eventBus.emit({
        type: 'dataset:failed',
        source: location,
        error: errorMessage(error),
        timestamp: Date.now(),
      });
      throw error;
    }
  }

  /** Number of data rows. */
  size(): number {
    return this.requirePrepared().document.rows.length;
  }

  /**
   * Decoded cell at `rowIndex` in the named column; `null` for a missing value.
   *
   * @throws OutOfRangeError for a row outside the table or a cell beyond a short row.
   * @throws ConfigurationError for an unknown column.
   */
  getCell(rowIndex: number, columnName: string): Cell {
    const { document } = this.requirePrepared();
    const row = Number.isInteger(rowIndex) ? document.rows[rowIndex] : undefined;
    if (!row) {
      throw new OutOfRangeError(`Row index ${String(rowIndex)} is outside [0, ${String(document.rows.length)})`);
    }

    const index = document.schema.indexOf(columnName);
    if (index === -1) {
      throw new ConfigurationError(`Unknown column: ${columnName}`);
    }

    const cell = row[index];
    if (cell === undefined) {
      throw new OutOfRangeError(
        `Row ${String(rowIndex)} has ${String(row.length)} cells, no value for column ${columnName}`,
      );
    }
    return cell;
  }

  getRelationName(): string {
    return this.requirePrepared().document.relationName;
  }

  getColumnNames(): string[] {
    return this.requirePrepared().document.schema.names();
  }

  getColumnType(name: string): AttributeType | undefined {
    return this.requirePrepared().document.schema.typeOf(name);
  }

  /** Attribute declarations in header order. */
  getHeader(): readonly Attribute[] {
    return this.requirePrepared().document.schema.attributes;
  }

  getFeatures(): readonly ResolvedColumn[] {
    return this.requirePrepared().features;
  }

  getLabels(): readonly ResolvedColumn[] {
    return this.requirePrepared().labels;
  }

  getFeatureCells(rowIndex: number): ColumnCell[] {
    return this.requirePrepared().features.map((column) => this.cellOf(rowIndex, column));
  }

  getLabelCells(rowIndex: number): ColumnCell[] {
    return this.requirePrepared().labels.map((column) => this.cellOf(rowIndex, column));
  }

  /** Concatenated encoder output for the features and for the labels of one row. */
  encodeRow(rowIndex: number): EncodedRow {
    const { features, labels } = this.requirePrepared();
    return {
      features: features.flatMap((column) => this.encode(rowIndex, column)),
      labels: labels.flatMap((column) => this.encode(rowIndex, column)),
    };
  }

  /** Summary of the relation and each feature and label as `name/TYPE/Encoder`. */
  toInfo(): string {
    const { document, features, labels } = this.requirePrepared();
    const lines = [`Relation: ${document.relationName}`, `Features: ${String(features.length)}`];
    for (const column of features) {
      lines.push(`- ${column.name}/${column.attributeType}/${column.encoder}`);
    }
    lines.push(`Labels: ${String(labels.length)}`);
    for (const column of labels) {
      lines.push(`- ${column.name}/${column.attributeType}/${column.encoder}`);
    }
    return lines.join('\n');
  }

  private resolve(
    document: ArffDocument,
    column: SelectedColumn,
    encoders: Map<string, FeatureEncoder>,
  ): ResolvedColumn {
    const index = document.schema.indexOf(column.name);
    const attribute = document.schema.at(index);
    if (!attribute) {
      throw new ConfigurationError(
        `Selected column ${column.name} is not in the header`,
        `Columns: ${document.schema.names().join(', ')}`,
      );
    }
    if (!COMPATIBLE_TYPES[column.kind].includes(attribute.type)) {
      throw new ConfigurationError(`Column ${column.name} of type ${attribute.type} cannot be used as ${column.kind}`);
    }

    const encoder = this.config.encoders(attribute, column.kind);
    encoder.fit(document.rows.map((row) => row[index] ?? null));
    encoders.set(column.name, encoder);

    return { ...column, index, attributeType: attribute.type, encoder: encoder.name };
  }

  private cellOf(rowIndex: number, column: ResolvedColumn): ColumnCell {
    return { name: column.name, type: column.attributeType, value: this.getCell(rowIndex, column.name) };
  }

  private encode(rowIndex: number, column: ResolvedColumn): number[] {
    const encoder = this.requirePrepared().encoders.get(column.name);
    if (!encoder) {
      throw new ConfigurationError(`No encoder assigned to column ${column.name}`);
    }
    return encoder.encode(this.getCell(rowIndex, column.name));
  }

  private requirePrepared(): PreparedState {
    if (!this.prepared) {
      throw new ConfigurationError('Dataset has not been prepared. Await prepare() first.');
    }
    return this.prepared;
  }
}
