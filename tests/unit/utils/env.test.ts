import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  getEnvWithDefault,
  getEnvOptional,
  hasEnv,
  getEnvNumber,
} from '../../../src/utils/env.js';

describe('Environment Variable Utilities', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  describe('getEnvWithDefault', () => {
    it('should return value when env var is set', () => {
      process.env.TEST_VAR = 'custom-value';
      expect(getEnvWithDefault('TEST_VAR', 'default')).toBe('custom-value');
    });

    it('should return default when env var is not set', () => {
      delete process.env.TEST_VAR;
      expect(getEnvWithDefault('TEST_VAR', 'default-value')).toBe('default-value');
    });

    it('should return default if set to empty', () => {
      process.env.TEST_VAR = '';
      // Empty string is falsy, so default is returned
      expect(getEnvWithDefault('TEST_VAR', 'default')).toBe('default');
    });
  });

  describe('getEnvOptional', () => {
    it('should return value when env var is set', () => {
      process.env.TEST_VAR = 'value';
      expect(getEnvOptional('TEST_VAR')).toBe('value');
    });

    it('should return undefined when env var is not set or empty', () => {
      delete process.env.TEST_VAR;
      expect(getEnvOptional('TEST_VAR')).toBeUndefined();

      process.env.TEST_VAR = '';
      expect(getEnvOptional('TEST_VAR')).toBeUndefined();
    });
  });

  describe('hasEnv', () => {
    it('should return true when env var is set', () => {
      process.env.TEST_VAR = 'value';
      expect(hasEnv('TEST_VAR')).toBe(true);
    });

    it('should return false when env var is not set', () => {
      delete process.env.TEST_VAR;
      expect(hasEnv('TEST_VAR')).toBe(false);
    });

    it('should return false when env var is empty string', () => {
      process.env.TEST_VAR = '';
      expect(hasEnv('TEST_VAR')).toBe(false);
    });
  });

  describe('getEnvNumber', () => {
    it('should return parsed number when valid', () => {
      process.env.TEST_VAR = '42';
      expect(getEnvNumber('TEST_VAR', 0)).toBe(42);
    });

    it('should return NaN for non-numeric value', () => {
      process.env.TEST_VAR = 'not-a-number';
      expect(getEnvNumber('TEST_VAR', 100)).toBeNaN();
    });

    it('should reject trailing garbage', () => {
      process.env.TEST_VAR = '12abc';
      expect(getEnvNumber('TEST_VAR', 100)).toBeNaN();
    });

    it('should return default when not set', () => {
      delete process.env.TEST_VAR;
      expect(getEnvNumber('TEST_VAR', 60000)).toBe(60000);
    });

    it('should handle negative numbers and surrounding whitespace', () => {
      process.env.TEST_VAR = ' -10 ';
      expect(getEnvNumber('TEST_VAR', 0)).toBe(-10);
    });
  });
});
