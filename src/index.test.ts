import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { BACKENDS, BACKEND_KEYS, VERSION, findBackend, isBackendKey } from './index.js';

describe('ifgen', () => {
  describe('VERSION', () => {
    it('should follow semver format', () => {
      expect(VERSION).toMatch(/^\d+\.\d+\.\d+$/);
    });

    it('should match package version', () => {
      expect(VERSION).toBe('0.1.0');
    });
  });

  describe('backend table', () => {
    it('should list every backend key exactly once, in key order', () => {
      expect(BACKENDS.map((backend) => backend.key)).toEqual([...BACKEND_KEYS]);
    });

    it('should be frozen', () => {
      expect(Object.isFrozen(BACKENDS)).toBe(true);
    });

    it('should find the descriptor for each key', () => {
      for (const key of BACKEND_KEYS) {
        expect(findBackend(key).key).toBe(key);
      }
    });
  });

  describe('property-based tests', () => {
    it('isBackendKey should accept exactly the registered keys', () => {
      fc.assert(
        fc.property(fc.string({ maxLength: 24 }), (text) => {
          return isBackendKey(text) === BACKEND_KEYS.some((key) => key === text);
        })
      );
    });
  });
});
