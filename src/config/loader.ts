/**
 * Configuration Loader
 *
 * Parses analysis profiles written in YAML and merges them over the
 * built-in defaults. The caller supplies the profile text; nothing here
 * touches the filesystem.
 *
 * @example
 * ```yaml
 * bland_altman:
 *   mode: relative
 *   z_multiplier: 2.58
 * logging:
 *   level: warn
 * ```
 */

import * as yaml from 'js-yaml';
import {
  AnalysisConfigSchema,
  AnalysisProfileSchema,
  type AnalysisConfig,
  type AnalysisProfile,
} from '../types/schemas/config.js';
import { DEFAULT_ANALYSIS_CONFIG, mergeConfig, resolveLogLevel } from './defaults.js';
import { ComparisonError } from '../api/errors.js';

/**
 * Format zod issues with field paths, one per line
 */
function formatIssues(issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>): string[] {
  return issues.map((issue) => {
    const field = issue.path.length > 0 ? issue.path.join('.') : 'root';
    return `${field} ${issue.message}`;
  });
}

/**
 * Parse and validate an analysis profile from YAML text
 *
 * An empty document is an empty profile.
 *
 * @throws {ComparisonError} InvalidParams when the YAML is malformed or a key is invalid
 */
export function parseProfile(text: string): AnalysisProfile {
  let document: unknown;
  try {
    document = yaml.load(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ComparisonError('InvalidParams', `Failed to parse analysis profile: ${reason}`);
  }

  const parseResult = AnalysisProfileSchema.safeParse(document ?? {});
  if (!parseResult.success) {
    const errors = formatIssues(parseResult.error.issues);
    throw new ComparisonError(
      'InvalidParams',
      `Analysis profile validation failed:\n${errors.join('\n')}`,
      { errors }
    );
  }

  return parseResult.data;
}

/**
 * Validate a complete configuration
 *
 * @throws {ComparisonError} InvalidParams listing every failing field
 */
export function validateConfig(config: AnalysisConfig): void {
  const parseResult = AnalysisConfigSchema.safeParse(config);
  if (!parseResult.success) {
    const errors = formatIssues(parseResult.error.issues);
    throw new ComparisonError(
      'InvalidParams',
      `Configuration validation failed:\n${errors.join('\n')}`,
      { errors }
    );
  }
}

export interface ResolveConfigOptions {
  /** Profile already parsed, or YAML text to parse */
  profile?: AnalysisProfile | string;
  /** Environment consulted for the log level; defaults to process.env */
  env?: NodeJS.ProcessEnv;
}

/**
 * Build the effective configuration
 *
 * Precedence (lowest first): built-in defaults, log level from the
 * environment, then the profile.
 */
export function resolveConfig(options: ResolveConfigOptions = {}): AnalysisConfig {
  const base = mergeConfig({ logging: { level: resolveLogLevel(options.env) } }, DEFAULT_ANALYSIS_CONFIG);

  const profile =
    typeof options.profile === 'string' ? parseProfile(options.profile) : options.profile;

  const finalConfig = mergeConfig(profile, base);
  validateConfig(finalConfig);
  return finalConfig;
}
