import type { AttributeType } from './AttributeType.js';

/** A named, typed column declared in the ARFF header. */
export interface Attribute {
  readonly name: string;
  readonly type: AttributeType;
  /** Date pattern, only for `DATE` attributes. */
  readonly dateFormat?: string;
  /** Declared value list, only for `NOMINAL` attributes. Never checked against the data. */
  readonly values?: readonly string[];
}
