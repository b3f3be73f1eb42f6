/** Attribute types supported in ARFF headers. */
export const AttributeType = {
  NUMERIC: 'NUMERIC',
  NOMINAL: 'NOMINAL',
  STRING: 'STRING',
  DATE: 'DATE',
} as const;

export type AttributeType = (typeof AttributeType)[keyof typeof AttributeType];

/** Exhaustiveness guard for switches over closed unions. */
export function assertNever(value: never, what: string): never {
  throw new Error(`Unhandled ${what}: ${String(value)}`);
}
