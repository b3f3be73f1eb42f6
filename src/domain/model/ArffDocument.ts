import type { ArffSchema } from './Schema.js';

/** A decoded cell: the stored string, or `null` for the missing-value marker. */
export type Cell = string | null;

/**
 * One data row, aligned by position with the schema. A row shorter than the
 * schema simply lacks its trailing cells.
 */
export type Row = readonly Cell[];

/** Result of one parse run. `rows` is empty after a header-only run. */
export interface ArffDocument {
  readonly relationName: string;
  readonly schema: ArffSchema;
  readonly rows: readonly Row[];
}
