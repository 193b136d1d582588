import { describe, it, expect } from 'vitest';
import { DEFAULT_ANALYSIS_CONFIG, LOGGING, mergeConfig, resolveLogLevel } from '@/config/defaults.js';

describe('Default configuration', () => {
  describe('resolveLogLevel', () => {
    it('should default to info', () => {
      expect(resolveLogLevel({})).toBe('info');
    });

    it('should read the level from the environment', () => {
      expect(resolveLogLevel({ [LOGGING.LEVEL_ENV]: ' DEBUG ' })).toBe('debug');
    });

    it('should ignore unknown levels', () => {
      expect(resolveLogLevel({ [LOGGING.LEVEL_ENV]: 'verbose' })).toBe('info');
    });
  });

  describe('mergeConfig', () => {
    it('should return the defaults without an override', () => {
      expect(mergeConfig()).toEqual(DEFAULT_ANALYSIS_CONFIG);
    });

    it('should override individual keys and keep the rest of the section', () => {
      const merged = mergeConfig({ deming: { bootstrap: null } });
      expect(merged.deming).toEqual({
        confidence_level: 0.95,
        variance_ratio: 1,
        bootstrap: null,
        seed: 'method-agreement',
      });
      expect(merged.bland_altman).toEqual(DEFAULT_ANALYSIS_CONFIG.bland_altman);
    });

    it('should not modify the defaults', () => {
      mergeConfig({ mountain: { percentiles: 10 } });
      expect(DEFAULT_ANALYSIS_CONFIG.mountain.percentiles).toBe(100);
    });
  });
});
