import { describe, it, expect } from 'vitest';
import {
  ArffError,
  ConfigurationError,
  FormatError,
  IOError,
  OutOfRangeError,
  errorMessage,
} from '../../../src/domain/errors.js';

describe('errors', () => {
  it('should share the ArffError base', () => {
    expect(new ConfigurationError('c')).toBeInstanceOf(ArffError);
    expect(new FormatError('f', 'MALFORMED_ROW')).toBeInstanceOf(ArffError);
    expect(new IOError('i')).toBeInstanceOf(ArffError);
    expect(new OutOfRangeError('o')).toBeInstanceOf(ArffError);
  });

  it('should set name and code per subclass', () => {
    expect(new ConfigurationError('c')).toMatchObject({ name: 'ConfigurationError', code: 'CONFIGURATION' });
    expect(new IOError('i')).toMatchObject({ name: 'IOError', code: 'IO' });
    expect(new OutOfRangeError('o')).toMatchObject({ name: 'OutOfRangeError', code: 'OUT_OF_RANGE' });
  });

  it('should include line and context in toString()', () => {
    const error = new FormatError('Bad value', 'MALFORMED_ROW', 3, 'x,y');
    expect(error.toString()).toBe('FormatError: Bad value (line 3)\nContext: x,y');
  });

  it('should omit absent line and context in toString()', () => {
    expect(new ConfigurationError('No source').toString()).toBe('ConfigurationError: No source');
  });

  describe('FormatError.atLine()', () => {
    it('should pin an error without a line', () => {
      const pinned = new FormatError('Bad', 'MALFORMED_ATTRIBUTE').atLine(7, '@attribute x');

      expect(pinned).toMatchObject({ code: 'MALFORMED_ATTRIBUTE', lineNumber: 7, context: '@attribute x' });
    });

    it('should keep an existing line', () => {
      const error = new FormatError('Bad', 'MALFORMED_ROW', 2);
      expect(error.atLine(9)).toBe(error);
    });
  });

  describe('IOError.fromSystemError()', () => {
    it('should name the location and keep the cause', () => {
      const cause = new Error('EACCES: permission denied');
      const error = IOError.fromSystemError('data.arff', cause, 4);

      expect(error.message).toBe('Failed to read ARFF data from data.arff: EACCES: permission denied');
      expect(error.lineNumber).toBe(4);
      expect(error.cause).toBe(cause);
    });
  });

  describe('errorMessage()', () => {
    it('should read the message of errors and stringify anything else', () => {
      expect(errorMessage(new Error('boom'))).toBe('boom');
      expect(errorMessage('plain')).toBe('plain');
      expect(errorMessage(42)).toBe('42');
    });
  });
});
