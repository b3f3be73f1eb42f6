import type { Attribute } from '../../domain/model/Attribute.js';
import type { FeatureKind } from '../../domain/model/Selection.js';
import type { EncoderFactory, FeatureEncoder } from '../../domain/ports/FeatureEncoder.js';
import { CategoricalEncoder } from './CategoricalEncoder.js';
import { NumericEncoder } from './NumericEncoder.js';

/** Numeric selections get a `NumericEncoder`, categorical ones a `CategoricalEncoder` seeded with the declared values. */
export const defaultEncoders: EncoderFactory = (attribute: Attribute, kind: FeatureKind): FeatureEncoder =>
  kind === 'numeric' ? new NumericEncoder() : new CategoricalEncoder(attribute.values);
