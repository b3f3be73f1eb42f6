import type { Attribute } from './Attribute.js';
import type { AttributeType } from './AttributeType.js';
import { FormatError } from '../errors.js';

/** What to do when a header declares the same attribute name twice. */
export type DuplicateNamePolicy = 'overwrite' | 'error';

/**
 * Ordered attribute list plus a name → index lookup.
 *
 * Both structures are only ever changed together in `add()`. With the
 * `'overwrite'` policy a repeated name points the lookup at the newest
 * attribute; the earlier one stays reachable by position only.
 */
export class ArffSchema {
  private readonly list: Attribute[] = [];
  private readonly lookup = new Map<string, number>();

  constructor(private readonly duplicates: DuplicateNamePolicy = 'overwrite') {}

  add(attribute: Attribute): number {
    if (this.duplicates === 'error' && this.lookup.has(attribute.name)) {
      throw new FormatError(`Duplicate attribute name: ${attribute.name}`, 'DUPLICATE_ATTRIBUTE_NAME');
    }
    const index = this.list.length;
    this.list.push(attribute);
    this.lookup.set(attribute.name, index);
    return index;
  }

  get attributes(): readonly Attribute[] {
    return this.list;
  }

  get size(): number {
    return this.list.length;
  }

  names(): string[] {
    return this.list.map((a) => a.name);
  }

  has(name: string): boolean {
    return this.lookup.has(name);
  }

  /** Index of the attribute registered under `name`, or `-1`. */
  indexOf(name: string): number {
    return this.lookup.get(name) ?? -1;
  }

  get(name: string): Attribute | undefined {
    const index = this.lookup.get(name);
    return index === undefined ? undefined : this.list[index];
  }

  at(index: number): Attribute | undefined {
    return this.list[index];
  }

  typeOf(name: string): AttributeType | undefined {
    return this.get(name)?.type;
  }
}
