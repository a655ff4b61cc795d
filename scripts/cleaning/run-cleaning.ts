#!/usr/bin/env node

/**
 * Runner for the cleaning pipeline
 * Loads environment variables, applies CLI options and executes the full run
 */

// Load environment variables from .env.local or .env
import dotenv from 'dotenv';
import path from 'path';

dotenv.config({ path: path.join(process.cwd(), '.env.local') });
dotenv.config({ path: path.join(process.cwd(), '.env') });

import { loadEnvironmentConfig } from '../../src/config/environment';
import { runCleaningPipeline } from '../../src/pipeline/cleaning-pipeline';
import { renderValidationReport } from '../../src/pipeline/validation/engine';
import { logger } from '../../src/utils/logger';
import { applyCliOptions, buildProgram, type CliOptions } from './cli';

async function main() {
  const program = buildProgram();
  program.parse(process.argv);
  const options = program.opts<CliOptions>();

  console.log('🧹 Starting Article Cleaning Pipeline\n');
  console.log('═'.repeat(60));

  try {
    const config = applyCliOptions(loadEnvironmentConfig(), options);
    logger.setLevel(config.logging.level);

    const { result, summary, engine, duration } = await runCleaningPipeline({ config });

    console.log('\n' + '═'.repeat(60));
    console.log('🎉 CLEANING PIPELINE COMPLETED');
    console.log('═'.repeat(60));
    console.log('📊 Final Results:');
    console.log(`   • Records loaded: ${result.funnel.loaded}`);
    console.log(`   • Incomplete records dropped: ${result.funnel.completenessDropped}`);
    console.log(`   • Duplicates dropped: ${result.funnel.duplicatesDropped}`);
    console.log(`   • Validated: ${result.funnel.validatedTotal} (${result.funnel.passed} passed, ${result.funnel.failed} failed)`);
    console.log(`   • Pass rate: ${summary.validation.passRate.toFixed(1)}%`);
    console.log(`   • Cleaned data: ${config.paths.output}`);
    console.log(`   • Quality report: ${config.paths.report}`);
    console.log(`   • Duration: ${duration}ms`);

    if (options.printValidation) {
      console.log('\n' + renderValidationReport(result.statistics, code => engine.labelFor(code)));
    }

    process.exit(0);
  } catch (error) {
    console.error('\n💥 CLEANING PIPELINE FAILED');
    console.error('═'.repeat(60));
    logger.error('Pipeline aborted', error);
    process.exit(1);
  }
}

void main();
