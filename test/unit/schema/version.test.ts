import { describe, test, expect } from '@jest/globals';
import { checkVersionCompatibility, parseSchemaVersion } from '../../../src/schema/version';

describe('schema version', () => {
  describe('parseSchemaVersion', () => {
    test('should parse major.minor and major.minor.patch', () => {
      expect(parseSchemaVersion('0.3')).toEqual({ major: 0, minor: 3, patch: 0 });
      expect(parseSchemaVersion('1.2.7')).toEqual({ major: 1, minor: 2, patch: 7 });
    });

    test('should reject malformed versions', () => {
      expect(parseSchemaVersion('')).toBeUndefined();
      expect(parseSchemaVersion('v0.3')).toBeUndefined();
      expect(parseSchemaVersion('0')).toBeUndefined();
    });
  });

  describe('checkVersionCompatibility', () => {
    test('should accept identical versions under the exact policy', () => {
      expect(checkVersionCompatibility('0.3', '0.3').compatible).toBe(true);
    });

    test('should flag 0.3 against 0.4 under both policies', () => {
      expect(checkVersionCompatibility('0.3', '0.4', 'exact').reason).toBe('versions differ');
      expect(checkVersionCompatibility('0.3', '0.4', 'same-major').reason).toBe('minor versions differ below 1.0');
    });

    test('should accept a newer minor within a major from 1.0 under same-major', () => {
      expect(checkVersionCompatibility('1.2', '1.4', 'same-major').compatible).toBe(true);
      expect(checkVersionCompatibility('1.2', '1.4', 'exact').compatible).toBe(false);
    });

    test('should flag different majors', () => {
      expect(checkVersionCompatibility('1.0', '2.0', 'same-major')).toEqual({
        compatible: false,
        expected: '1.0',
        actual: '2.0',
        policy: 'same-major',
        reason: 'major versions differ'
      });
    });

    test('should never accept a malformed version', () => {
      expect(checkVersionCompatibility('latest', '0.3').reason).toBe("malformed version 'latest'");
      expect(checkVersionCompatibility('0.3', 'x', 'same-major').reason).toBe("malformed version 'x'");
    });
  });
});
