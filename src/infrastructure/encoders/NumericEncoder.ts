import type { Cell } from '../../domain/model/ArffDocument.js';
import type { FeatureEncoder } from '../../domain/ports/FeatureEncoder.js';

/** Passes the stored number through as a single value. Missing cells become `NaN`. */
export class NumericEncoder implements FeatureEncoder {
  readonly name = 'NumericEncoder';

  fit(): void {
    // Stateless.
  }

  encode(value: Cell): number[] {
    return [value === null ? Number.NaN : Number(value)];
  }
}
