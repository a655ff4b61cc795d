/**
 * Main cleaning pipeline that coordinates the following workflow:
 * 1. Loads the scraped batch (array or { articles: [...] })
 * 2. Normalizes text and date fields
 * 3. Drops records missing title, content or url
 * 4. Removes duplicate (title, url) pairs, keeping the first
 * 5. Validates the survivors against the configured rule set
 * 6. Writes the passed records and a quality report
 *
 * Every stage consumes the previous stage's full output; counts are collected
 * at each boundary and must add up to the loaded total.
 */

import { loadEnvironmentConfig, type EnvironmentConfig } from '../config/environment';
import { PipelineInvariantError } from '../utils/errors';
import { logger } from '../utils/logger';
import type { ArticleRecord, NormalizedArticle } from '../types/article';
import {
  deduplicateRecords,
  dropIncompleteRecords,
  normalizeRecords,
  type DuplicateEntry
} from './tools/cleaning-helpers';
import { loadArticles, saveCleanData, saveReport } from './tools/io-helpers';
import { ValidationEngine, type ValidationStatistics, type ValidationVerdict } from './validation/engine';
import { createDefaultRules, withoutRules, type ValidationRule } from './validation/rules';
import { renderQualityReport, summarizeQuality, type QualitySummary } from './report/quality-report';

export interface FunnelCounts {
  loaded: number;
  completenessDropped: number;
  duplicatesDropped: number;
  validatedTotal: number;
  passed: number;
  failed: number;
}

export interface CleaningResult {
  /** Records that passed validation, in input order */
  cleaned: NormalizedArticle[];
  /** Records handed to the validation engine */
  validated: NormalizedArticle[];
  verdicts: ValidationVerdict[];
  statistics: ValidationStatistics;
  duplicates: DuplicateEntry[];
  funnel: FunnelCounts;
}

export interface PipelineRunResult {
  result: CleaningResult;
  summary: QualitySummary;
  report: string;
  engine: ValidationEngine;
  duration: number;
}

export interface PipelineRunOptions {
  config?: EnvironmentConfig;
  /** Appended after the configured rules */
  extraRules?: readonly ValidationRule[];
}

/**
 * Build the rule set for one run from configuration
 */
export function buildValidationEngine(
  validation: EnvironmentConfig['validation'],
  extraRules: readonly ValidationRule[] = []
): ValidationEngine {
  const rules = createDefaultRules({
    minContentLength: validation.minContentLength,
    maxTitleLength: validation.maxTitleLength,
    maxContentLength: validation.maxContentLength
  });
  return new ValidationEngine(withoutRules([...rules, ...extraRules], validation.disabledRules));
}

/**
 * @throws PipelineInvariantError when stage counts do not add up
 */
export function assertFunnelIdentity(funnel: FunnelCounts): void {
  const accounted = funnel.completenessDropped + funnel.duplicatesDropped + funnel.validatedTotal;
  if (funnel.loaded !== accounted) {
    throw new PipelineInvariantError(
      `Funnel mismatch: loaded ${funnel.loaded} but stages account for ${accounted}`
    );
  }
  if (funnel.validatedTotal !== funnel.passed + funnel.failed) {
    throw new PipelineInvariantError(
      `Validation mismatch: ${funnel.validatedTotal} validated but ${funnel.passed} passed + ${funnel.failed} failed`
    );
  }
}

/**
 * Run normalization, filtering, deduplication and validation in memory
 */
export function cleanArticles(raw: readonly ArticleRecord[], engine: ValidationEngine): CleaningResult {
  const normalized = normalizeRecords(raw);
  const complete = dropIncompleteRecords(normalized);
  const deduplicated = deduplicateRecords(complete.records);
  const validated = deduplicated.records;

  const { verdicts, statistics } = engine.batchValidate(validated);
  const cleaned = validated.filter((_, index) => verdicts[index].passed);

  const funnel: FunnelCounts = {
    loaded: raw.length,
    completenessDropped: complete.droppedCount,
    duplicatesDropped: deduplicated.duplicates.length,
    validatedTotal: statistics.total,
    passed: statistics.passedCount,
    failed: statistics.failedCount
  };
  assertFunnelIdentity(funnel);

  return { cleaned, validated, verdicts, statistics, duplicates: deduplicated.duplicates, funnel };
}

/**
 * Full run: load -> clean -> validate -> save cleaned data and quality report.
 * Load failures abort before anything is written.
 */
export async function runCleaningPipeline(options: PipelineRunOptions = {}): Promise<PipelineRunResult> {
  const config = options.config ?? loadEnvironmentConfig();
  const startTime = Date.now();

  const engine = buildValidationEngine(config.validation, options.extraRules);
  logger.info(`Active validation rules: ${engine.rules.map(rule => rule.reasonCode).join(', ') || '(none)'}`);

  const raw = await loadArticles(config.paths.input);
  const result = cleanArticles(raw, engine);

  for (const [reason, count] of Object.entries(result.statistics.failureReasonCounts)) {
    logger.info(`  ${count}x ${engine.labelFor(reason)}`);
  }

  const summary = summarizeQuality({
    loadedCount: result.funnel.loaded,
    completenessDropped: result.funnel.completenessDropped,
    duplicatesDropped: result.funnel.duplicatesDropped,
    duplicates: result.duplicates,
    validatedRecords: result.validated,
    statistics: result.statistics,
    labelFor: code => engine.labelFor(code)
  });
  const report = renderQualityReport(summary, { includeFailedDetails: config.report.includeFailedDetails });

  await saveCleanData(result.cleaned, config.paths.output);
  await saveReport(report, config.paths.report);

  const duration = Date.now() - startTime;
  logger.info(
    `Pipeline complete: ${result.funnel.loaded} loaded -> ${result.funnel.validatedTotal} after cleaning -> ${result.cleaned.length} valid (${duration}ms)`
  );
  return { result, summary, report, engine, duration };
}
