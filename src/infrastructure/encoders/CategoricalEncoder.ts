import type { Cell } from '../../domain/model/ArffDocument.js';
import type { FeatureEncoder } from '../../domain/ports/FeatureEncoder.js';

/**
 * One-hot encoder. Categories are the declared nominal values, in declaration
 * order, followed by any other value seen during `fit()` in row order.
 * Missing and unknown values encode as all zeros.
 */
export class CategoricalEncoder implements FeatureEncoder {
  readonly name = 'CategoricalEncoder';
  private readonly index = new Map<string, number>();

  constructor(declared: readonly string[] = []) {
    for (const value of declared) this.register(value);
  }

  get categories(): string[] {
    return [...this.index.keys()];
  }

  fit(values: readonly Cell[]): void {
    for (const value of values) {
      if (value !== null) this.register(value);
    }
  }

  encode(value: Cell): number[] {
    const encoded = new Array<number>(this.index.size).fill(0);
    const position = value === null ? undefined : this.index.get(value);
    if (position !== undefined) encoded[position] = 1;
    return encoded;
  }

  private register(value: string): void {
    if (!this.index.has(value)) this.index.set(value, this.index.size);
  }
}
