import type { Attribute } from '../model/Attribute.js';
import type { Cell } from '../model/ArffDocument.js';
import type { FeatureKind } from '../model/Selection.js';

/**
 * Port for turning decoded cells into numbers.
 *
 * The dataset only ever hands over the column's declared attribute and the raw
 * decoded cell; everything past that (normalization, batching, sampling)
 * belongs to the encoder and whatever consumes its output.
 */
export interface FeatureEncoder {
  /** Shown in `ArffDataset.toInfo()`. */
  readonly name: string;
  /** Called once by `prepare()` with every cell of the column, in row order. */
  fit(values: readonly Cell[]): void;
  encode(value: Cell): number[];
}

/** Chooses the encoder for a selected column. */
export type EncoderFactory = (attribute: Attribute, kind: FeatureKind) => FeatureEncoder;
