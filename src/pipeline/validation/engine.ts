/**
 * Validation engine
 * Evaluates records against an ordered, immutable rule set and aggregates
 * per-record verdicts into batch statistics
 */

import { logger } from '../../utils/logger';
import { ConfigurationError, getErrorMessage } from '../../utils/errors';
import type { ArticleRecord } from '../../types/article';
import { readText, type ValidationRule } from './rules';

export interface ValidationVerdict {
  passed: boolean;
  failedReasons: string[];
  messages: string[];
}

export interface FailedRecordDetail {
  index: number;          // Position in the validated batch
  label: string;          // Title-based label for reports
  reasons: string[];
  messages: string[];
}

export interface ValidationStatistics {
  readonly total: number;
  readonly passedCount: number;
  readonly failedCount: number;
  readonly failureReasonCounts: Readonly<Record<string, number>>;
  readonly failedRecordDetails: readonly FailedRecordDetail[];
}

export interface BatchValidationResult {
  verdicts: ValidationVerdict[];
  statistics: ValidationStatistics;
}

const LABEL_LENGTH = 60;

function isEmptyField(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

/**
 * Stable identifier for a record in failure listings
 */
export function recordLabel(record: ArticleRecord, index: number): string {
  const title = readText(record, 'title');
  if (!title) return `record #${index}`;
  return title.length > LABEL_LENGTH ? `${title.slice(0, LABEL_LENGTH)}...` : title;
}

export class ValidationEngine {
  readonly rules: readonly ValidationRule[];

  constructor(rules: readonly ValidationRule[]) {
    const codes = new Set<string>();
    for (const rule of rules) {
      if (codes.has(rule.reasonCode)) {
        throw new ConfigurationError(`Duplicate validation rule: ${rule.reasonCode}`);
      }
      codes.add(rule.reasonCode);
    }
    this.rules = Object.freeze(rules.map(rule => Object.freeze({ ...rule })));
  }

  /**
   * Run every rule against one record. Never short-circuits, so a record can
   * surface several reasons at once.
   */
  validateRow(record: ArticleRecord): ValidationVerdict {
    const failedReasons: string[] = [];
    const messages: string[] = [];

    for (const rule of this.rules) {
      if (rule.onlyIfPresent && isEmptyField(record[rule.field])) {
        continue;
      }

      let passed: boolean;
      try {
        passed = rule.predicate(record);
      } catch (error) {
        logger.debug(`Rule ${rule.reasonCode} threw; counting it as failed`, getErrorMessage(error));
        passed = false;
      }

      if (!passed) {
        failedReasons.push(rule.reasonCode);
        messages.push(this.renderMessage(rule, record));
      }
    }

    return { passed: failedReasons.length === 0, failedReasons, messages };
  }

  /**
   * Validate a whole batch in input order and aggregate the statistics
   */
  batchValidate(records: readonly ArticleRecord[]): BatchValidationResult {
    const verdicts: ValidationVerdict[] = [];
    // Map keeps reason codes such as "constructor" clear of Object.prototype
    const reasonCounts = new Map<string, number>();
    const failedRecordDetails: FailedRecordDetail[] = [];
    let passedCount = 0;

    records.forEach((record, index) => {
      const verdict = this.validateRow(record);
      verdicts.push(verdict);

      if (verdict.passed) {
        passedCount++;
        return;
      }

      for (const reason of verdict.failedReasons) {
        reasonCounts.set(reason, (reasonCounts.get(reason) ?? 0) + 1);
      }
      failedRecordDetails.push(Object.freeze({
        index,
        label: recordLabel(record, index),
        reasons: [...verdict.failedReasons],
        messages: [...verdict.messages]
      }));
    });

    const statistics: ValidationStatistics = Object.freeze({
      total: records.length,
      passedCount,
      failedCount: records.length - passedCount,
      failureReasonCounts: Object.freeze(Object.fromEntries(reasonCounts)),
      failedRecordDetails: Object.freeze(failedRecordDetails)
    });

    logger.info(`Validated ${statistics.total} records: ${statistics.passedCount} passed, ${statistics.failedCount} failed`);
    return { verdicts, statistics };
  }

  /** Static label for a reason code, falling back to the code itself */
  labelFor(reasonCode: string): string {
    return this.rules.find(rule => rule.reasonCode === reasonCode)?.label ?? reasonCode;
  }

  private renderMessage(rule: ValidationRule, record: ArticleRecord): string {
    try {
      return rule.message(record);
    } catch (error) {
      logger.debug(`Message for ${rule.reasonCode} could not be rendered`, getErrorMessage(error));
      return rule.label;
    }
  }
}

/**
 * Render a standalone validation summary
 */
export function renderValidationReport(
  statistics: ValidationStatistics,
  labelFor: (reasonCode: string) => string = code => code,
  includeFailedDetails = true
): string {
  const lines = [
    'Validation Report',
    '='.repeat(50),
    `Total records:  ${statistics.total}`,
    `Passed:         ${statistics.passedCount}`,
    `Failed:         ${statistics.failedCount}`,
    '',
    'Failure reason distribution:',
    '-'.repeat(50)
  ];

  const distribution = sortReasonCounts(statistics.failureReasonCounts);
  if (distribution.length === 0) {
    lines.push('  (none)');
  }
  for (const [reason, count] of distribution) {
    lines.push(`  ${String(count).padStart(4)}  ${labelFor(reason)}`);
  }
  lines.push('');

  if (includeFailedDetails && statistics.failedRecordDetails.length > 0) {
    lines.push('Failed record details:');
    lines.push('-'.repeat(50));
    for (const detail of statistics.failedRecordDetails) {
      lines.push(`  Index:  ${detail.index}`);
      lines.push(`  Reason: ${detail.messages.join(' ')}`);
      lines.push('');
    }
  }
  return lines.join('\n');
}

/**
 * Reason counts by count descending; ties keep first-seen order
 */
export function sortReasonCounts(counts: Readonly<Record<string, number>>): [string, number][] {
  return Object.entries(counts).sort(([, a], [, b]) => b - a);
}
