/**
 * Environment configuration for the cleaning pipeline
 * Loads and validates the settings every run needs
 */

import { ConfigurationError } from '../utils/errors';
import { isLogLevel, type LogLevel } from '../utils/logger';

export interface EnvironmentConfig {
  paths: {
    input: string;
    output: string;
    report: string;
  };
  validation: {
    minContentLength: number;
    maxTitleLength: number | null;
    maxContentLength: number | null;
    disabledRules: string[];
  };
  report: {
    includeFailedDetails: boolean;
  };
  logging: {
    level: LogLevel;
  };
}

export const DEFAULT_MIN_CONTENT_LENGTH = 120;

/**
 * Parse a non-negative integer setting
 * @throws ConfigurationError if the value is not a whole number
 */
export function parseLengthSetting(name: string, raw: string): number {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new ConfigurationError(`${name} must be a non-negative integer (got "${raw}")`);
  }
  return parseInt(trimmed, 10);
}

function optionalLength(name: string, raw: string | undefined): number | null {
  if (raw === undefined || raw.trim() === '') return null;
  return parseLengthSetting(name, raw);
}

export function parseRuleList(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw
    .split(',')
    .map(code => code.trim())
    .filter(code => code.length > 0);
}

/**
 * Load and validate environment configuration
 * @throws ConfigurationError if a variable is set to something unusable
 */
export function loadEnvironmentConfig(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  const logLevel = env.LOG_LEVEL || 'info';
  if (!isLogLevel(logLevel)) {
    throw new ConfigurationError(`LOG_LEVEL must be one of debug, info, warn, error (got "${logLevel}")`);
  }

  return {
    paths: {
      input: env.CLEANING_INPUT_PATH || 'data/sample_articles.json',
      output: env.CLEANING_OUTPUT_PATH || 'output/cleaned_articles.json',
      report: env.CLEANING_REPORT_PATH || 'output/quality_report.txt'
    },
    validation: {
      minContentLength: env.MIN_CONTENT_LENGTH
        ? parseLengthSetting('MIN_CONTENT_LENGTH', env.MIN_CONTENT_LENGTH)
        : DEFAULT_MIN_CONTENT_LENGTH,
      maxTitleLength: optionalLength('MAX_TITLE_LENGTH', env.MAX_TITLE_LENGTH),
      maxContentLength: optionalLength('MAX_CONTENT_LENGTH', env.MAX_CONTENT_LENGTH),
      disabledRules: parseRuleList(env.VALIDATION_DISABLED_RULES)
    },
    report: {
      includeFailedDetails: env.REPORT_FAILED_DETAILS !== 'false' // Default to enabled
    },
    logging: {
      level: logLevel
    }
  };
}
