import { assertValidFileName, validateFileName } from '../file-name-validator';
import { FileKeeperError } from '../../errors';

describe('File Name Validator', () => {
  describe('validateFileName()', () => {
    describe('Valid names', () => {
      test('should accept a simple name with extension', () => {
        const result = validateFileName('notes.txt');
        expect(result.isValid).toBe(true);
        expect(result.error).toBeUndefined();
      });

      test('should accept names with spaces and several dots', () => {
        expect(validateFileName('my report.v2.md').isValid).toBe(true);
      });

      test('should accept dot files', () => {
        expect(validateFileName('.env').isValid).toBe(true);
      });
    });

    describe('Empty names', () => {
      test.each(['', '   '])('should reject %j', (name) => {
        const result = validateFileName(name);
        expect(result.isValid).toBe(false);
        expect(result.error).toBe('File name cannot be empty.');
      });

      test('should reject null and undefined', () => {
        expect(validateFileName(null).error).toBe('File name cannot be empty.');
        expect(validateFileName(undefined).error).toBe('File name cannot be empty.');
      });
    });

    describe('Illegal characters', () => {
      test.each(['<', '>', ':', '"', '/', '\\', '|', '?', '*'])('should reject a name containing %s', (char) => {
        const result = validateFileName(`bad${char}name.txt`);
        expect(result.isValid).toBe(false);
        expect(result.error).toBe(`File name contains illegal characters: ${char}`);
      });

      test('should list every offending character in order', () => {
        const result = validateFileName('a<b>c?.txt');
        expect(result.error).toBe('File name contains illegal characters: <>?');
      });
    });

    describe('Line breaks', () => {
      test.each(['a\nb.txt', 'a.txt\r'])('should reject %j', (name) => {
        const result = validateFileName(name);
        expect(result.isValid).toBe(false);
        expect(result.error).toBe('File name cannot contain line breaks.');
      });
    });

    describe('Extension', () => {
      test('should reject names without an extension separator', () => {
        const result = validateFileName('README');
        expect(result.isValid).toBe(false);
        expect(result.error).toBe('File name must include an extension (e.g. notes.txt).');
      });
    });
  });

  describe('assertValidFileName()', () => {
    test('should pass silently for a valid name', () => {
      expect(() => assertValidFileName('ok.txt')).not.toThrow();
    });

    test('should throw a validation error for an invalid name', () => {
      expect(() => assertValidFileName('README')).toThrow(FileKeeperError);
      try {
        assertValidFileName('README');
      } catch (error) {
        expect(error).toMatchObject({ kind: 'validation', applied: 'none' });
      }
    });
  });
});
