import type { AttributeType } from './AttributeType.js';

/** Role of a column in the dataset. Columns start out `'ignored'`. */
export type ColumnRole = 'feature' | 'label' | 'ignored';

/** How the selected column is handed to the encoder. */
export type FeatureKind = 'numeric' | 'categorical';

/** A column selected as feature or label. */
export interface SelectedColumn {
  readonly name: string;
  readonly kind: FeatureKind;
}

/** A selected column resolved against a parsed header. */
export interface ResolvedColumn extends SelectedColumn {
  readonly index: number;
  readonly attributeType: AttributeType;
  /** Name of the encoder assigned to this column. */
  readonly encoder: string;
}

/** Attribute types a selection kind can be read from. */
export const COMPATIBLE_TYPES: Readonly<Record<FeatureKind, readonly AttributeType[]>> = {
  numeric: ['NUMERIC', 'DATE'],
  categorical: ['NOMINAL', 'STRING'],
};
