import { describe, it, expect } from 'vitest';
import { parseProfile, resolveConfig, validateConfig } from '@/config/loader.js';
import { DEFAULT_ANALYSIS_CONFIG } from '@/config/defaults.js';
import { ComparisonError } from '@/api/errors.js';

describe('Configuration Loader', () => {
  describe('parseProfile', () => {
    it('should parse a YAML profile', () => {
      const profile = parseProfile(
        ['bland_altman:', '  mode: relative', '  z_multiplier: 2.58', 'logging:', '  level: warn'].join('\n')
      );
      expect(profile).toEqual({
        bland_altman: { mode: 'relative', z_multiplier: 2.58 },
        logging: { level: 'warn' },
      });
    });

    it('should treat an empty document as an empty profile', () => {
      expect(parseProfile('')).toEqual({});
    });

    it('should accept a null confidence level', () => {
      expect(parseProfile('bland_altman:\n  confidence_level: null\n')).toEqual({
        bland_altman: { confidence_level: null },
      });
    });

    it('should report malformed YAML', () => {
      expect(() => parseProfile('bland_altman: [unclosed')).toThrow(/^Failed to parse analysis profile: /);
    });

    it('should list every invalid key', () => {
      try {
        parseProfile('passing_bablok:\n  confidence_level: 1.5\nmountain:\n  percentiles: 1\n');
        expect.fail('expected an error');
      } catch (error) {
        expect(error).toBeInstanceOf(ComparisonError);
        if (!(error instanceof ComparisonError)) return;
        expect(error.code).toBe('InvalidParams');
        expect(error.details?.errors).toEqual([
          'passing_bablok.confidence_level Confidence level must be below 1',
          'mountain.percentiles must be >= 2',
        ]);
      }
    });

    it('should validate the Parkes grid type', () => {
      expect(parseProfile('parkes:\n  type: 2\n')).toEqual({ parkes: { type: 2 } });
      try {
        parseProfile('parkes:\n  type: 3\n');
        expect.fail('expected an error');
      } catch (error) {
        expect(error).toBeInstanceOf(ComparisonError);
        if (!(error instanceof ComparisonError)) return;
        expect(error.details?.errors).toEqual(['parkes.type Diabetes type must be 1 or 2']);
      }
    });

    it('should reject unknown sections', () => {
      expect(() => parseProfile('bland_altmann:\n  mode: relative\n')).toThrow(
        /^Analysis profile validation failed:/
      );
    });
  });

  describe('validateConfig', () => {
    it('should accept the defaults', () => {
      expect(() => validateConfig(DEFAULT_ANALYSIS_CONFIG)).not.toThrow();
    });

    it('should reject an empty seed', () => {
      expect(() =>
        validateConfig({ ...DEFAULT_ANALYSIS_CONFIG, deming: { ...DEFAULT_ANALYSIS_CONFIG.deming, seed: '' } })
      ).toThrow('Configuration validation failed:\ndeming.seed Seed cannot be empty');
    });
  });

  describe('resolveConfig', () => {
    it('should start from the defaults', () => {
      expect(resolveConfig({ env: {} })).toEqual(DEFAULT_ANALYSIS_CONFIG);
    });

    it('should take the log level from the environment', () => {
      const config = resolveConfig({ env: { METHOD_AGREEMENT_LOG_LEVEL: 'error' } });
      expect(config.logging.level).toBe('error');
    });

    it('should let the profile win over the environment', () => {
      const config = resolveConfig({
        env: { METHOD_AGREEMENT_LOG_LEVEL: 'error' },
        profile: 'logging:\n  level: silent\n',
      });
      expect(config.logging.level).toBe('silent');
    });

    it('should accept an already parsed profile', () => {
      const config = resolveConfig({ env: {}, profile: { clarke: { units: 'mmol' } } });
      expect(config.clarke.units).toBe('mmol');
      expect(config.mountain).toEqual(DEFAULT_ANALYSIS_CONFIG.mountain);
    });
  });
});
