import { describe, it, expect } from 'vitest';
import { ArffSchema } from '../../../src/domain/model/Schema.js';
import { FormatError } from '../../../src/domain/errors.js';

describe('ArffSchema', () => {
  it('should keep attributes in declaration order', () => {
    const schema = new ArffSchema();
    schema.add({ name: 'a', type: 'NUMERIC' });
    schema.add({ name: 'b', type: 'STRING' });

    expect(schema.size).toBe(2);
    expect(schema.names()).toEqual(['a', 'b']);
    expect(schema.at(1)).toEqual({ name: 'b', type: 'STRING' });
  });

  it('should look attributes up by name', () => {
    const schema = new ArffSchema();
    schema.add({ name: 'a', type: 'NUMERIC' });

    expect(schema.has('a')).toBe(true);
    expect(schema.indexOf('a')).toBe(0);
    expect(schema.get('a')).toEqual({ name: 'a', type: 'NUMERIC' });
    expect(schema.typeOf('a')).toBe('NUMERIC');
  });

  it('should report unknown names', () => {
    const schema = new ArffSchema();

    expect(schema.has('missing')).toBe(false);
    expect(schema.indexOf('missing')).toBe(-1);
    expect(schema.get('missing')).toBeUndefined();
    expect(schema.typeOf('missing')).toBeUndefined();
    expect(schema.at(0)).toBeUndefined();
  });

  it('should resolve a repeated name to the latest attribute under the overwrite policy', () => {
    const schema = new ArffSchema('overwrite');
    schema.add({ name: 'x', type: 'NUMERIC' });
    const index = schema.add({ name: 'x', type: 'DATE', dateFormat: 'yyyy' });

    expect(index).toBe(1);
    expect(schema.size).toBe(2);
    expect(schema.typeOf('x')).toBe('DATE');
    expect(schema.at(0)?.type).toBe('NUMERIC');
  });

  it('should reject a repeated name under the error policy', () => {
    const schema = new ArffSchema('error');
    schema.add({ name: 'x', type: 'NUMERIC' });

    expect(() => schema.add({ name: 'x', type: 'STRING' })).toThrow(FormatError);
    expect(schema.size).toBe(1);
  });
});
