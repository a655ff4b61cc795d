/**
 * Command-line surface of the cleaning runner
 * Options override the environment configuration one field at a time
 */

import { Command } from 'commander';
import {
  parseLengthSetting,
  parseRuleList,
  type EnvironmentConfig
} from '../../src/config/environment';
import { ConfigurationError } from '../../src/utils/errors';
import { isLogLevel } from '../../src/utils/logger';

export type CliOptions = {
  input?: string;
  output?: string;
  report?: string;
  minContentLength?: string;
  maxTitleLength?: string;
  maxContentLength?: string;
  disableRules?: string;
  failedDetails?: boolean;
  logLevel?: string;
  printValidation?: boolean;
};

export function buildProgram(): Command {
  return new Command()
    .name('clean-articles')
    .description('Clean a batch of scraped articles, validate them and write a quality report')
    .option('-i, --input <path>', 'input JSON file (array or { "articles": [...] })')
    .option('-o, --output <path>', 'where to write the cleaned records')
    .option('-r, --report <path>', 'where to write the quality report')
    .option('--min-content-length <n>', 'minimum content length in characters')
    .option('--max-title-length <n>', 'enable the title length ceiling')
    .option('--max-content-length <n>', 'enable the content length ceiling')
    .option('--disable-rules <codes>', 'comma-separated reason codes to switch off')
    .option('--no-failed-details', 'leave the failed record listing out of the report')
    .option('--log-level <level>', 'debug, info, warn or error')
    .option('--print-validation', 'print the validation summary after the run');
}

/**
 * Merge parsed CLI options over the environment configuration
 * @throws ConfigurationError on unusable option values
 */
export function applyCliOptions(config: EnvironmentConfig, options: CliOptions): EnvironmentConfig {
  let level = config.logging.level;
  if (options.logLevel !== undefined) {
    if (!isLogLevel(options.logLevel)) {
      throw new ConfigurationError(`--log-level must be one of debug, info, warn, error (got "${options.logLevel}")`);
    }
    level = options.logLevel;
  }

  return {
    paths: {
      input: options.input ?? config.paths.input,
      output: options.output ?? config.paths.output,
      report: options.report ?? config.paths.report
    },
    validation: {
      minContentLength: options.minContentLength !== undefined
        ? parseLengthSetting('--min-content-length', options.minContentLength)
        : config.validation.minContentLength,
      maxTitleLength: options.maxTitleLength !== undefined
        ? parseLengthSetting('--max-title-length', options.maxTitleLength)
        : config.validation.maxTitleLength,
      maxContentLength: options.maxContentLength !== undefined
        ? parseLengthSetting('--max-content-length', options.maxContentLength)
        : config.validation.maxContentLength,
      disabledRules: options.disableRules !== undefined
        ? parseRuleList(options.disableRules)
        : config.validation.disabledRules
    },
    report: {
      includeFailedDetails: options.failedDetails === false ? false : config.report.includeFailedDetails
    },
    logging: {
      level
    }
  };
}
