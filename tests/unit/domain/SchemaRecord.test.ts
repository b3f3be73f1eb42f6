import { describe, it, expect } from 'vitest';
import { parseSchemaRecord } from '../../../src/domain/model/SchemaRecord.js';
import { ConfigurationError } from '../../../src/domain/errors.js';

const record = {
  source: 'data/weather.arff',
  options: { dateAsNumeric: true, stringAsNominal: false },
  features: [{ name: 'temperature', type: 'numeric' }],
  labels: [{ name: 'play', type: 'categorical' }],
};

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

describe('parseSchemaRecord()', () => {
  it('should accept a well-formed record', () => {
    expect(parseSchemaRecord(record)).toEqual(record);
  });

  it('should accept a record that went through JSON', () => {
    expect(parseSchemaRecord(JSON.parse(JSON.stringify(record)))).toEqual(record);
  });

  it('should reject an unknown column type and name the offending path', () => {
    const error = captureError(() =>
      parseSchemaRecord({ ...record, features: [{ name: 'temperature', type: 'text' }] }),
    );

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({ message: 'Invalid schema record', code: 'CONFIGURATION' });
    expect(error).toMatchObject({ context: expect.stringMatching(/^features\.0\.type: /) as string });
  });

  it('should reject a non-object', () => {
    const error = captureError(() => parseSchemaRecord(null));

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({ context: expect.stringMatching(/^<root>: /) as string });
  });

  it('should reject empty column names', () => {
    expect(() => parseSchemaRecord({ ...record, labels: [{ name: '', type: 'numeric' }] })).toThrow(ConfigurationError);
  });

  it('should reject missing options', () => {
    const { options: _options, ...withoutOptions } = record;
    expect(() => parseSchemaRecord(withoutOptions)).toThrow(ConfigurationError);
  });
});
