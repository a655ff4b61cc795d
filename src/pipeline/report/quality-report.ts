/**
 * Quality report aggregation and rendering
 * Turns funnel counts and validation statistics into the text report written next to the cleaned data
 */

import { TRACKED_FIELDS, type ArticleRecord, type TrackedField } from '../../types/article';
import { isMissing, type DuplicateEntry } from '../tools/cleaning-helpers';
import {
  sortReasonCounts,
  type FailedRecordDetail,
  type ValidationStatistics
} from '../validation/engine';

export interface QualityReportInput {
  loadedCount: number;
  completenessDropped: number;
  duplicatesDropped: number;
  /** Dropped duplicates, positions relative to the deduplication input */
  duplicates?: readonly DuplicateEntry[];
  /** Records that went through validation (after completeness and dedup) */
  validatedRecords: readonly ArticleRecord[];
  statistics: ValidationStatistics;
  labelFor?: (reasonCode: string) => string;
}

export interface FieldCompleteness {
  field: TrackedField;
  present: number;
  total: number;
  percent: number;
}

export interface FailureShare {
  reasonCode: string;
  label: string;
  count: number;
  /** Share of failed records carrying this reason */
  percentOfFailed: number;
}

export interface DateCoverage {
  earliest: string | null;
  latest: string | null;
  withDate: number;
  withoutDate: number;
}

export interface QualitySummary {
  counts: {
    loaded: number;
    cleaned: number;
    dropped: number;
    incomplete: number;
    duplicates: number;
    failedValidation: number;
  };
  completeness: FieldCompleteness[];
  validation: {
    total: number;
    passed: number;
    failed: number;
    passRate: number;
  };
  failureDistribution: FailureShare[];
  dates: DateCoverage;
  duplicateEntries: readonly DuplicateEntry[];
  failedRecords: readonly FailedRecordDetail[];
  endToEndRetention: number;
  topFailure: FailureShare | null;
}

export interface RenderOptions {
  includeFailedDetails?: boolean;
}

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/;
const RULE = '-'.repeat(60);
const KEY_PREVIEW_LENGTH = 12;
const BANNER = '='.repeat(60);

export function percentage(part: number, whole: number): number {
  return whole === 0 ? 0 : (part / whole) * 100;
}

export function formatPercent(value: number): string {
  return `${value.toFixed(1)}%`;
}

function fieldCompleteness(records: readonly ArticleRecord[]): FieldCompleteness[] {
  return TRACKED_FIELDS.map(field => {
    const present = records.filter(record => !isMissing(record[field])).length;
    return { field, present, total: records.length, percent: percentage(present, records.length) };
  });
}

function dateCoverage(records: readonly ArticleRecord[]): DateCoverage {
  // Fixed-width UTC timestamps order lexicographically
  const dates = records
    .map(record => record.published_date)
    .filter((value): value is string => typeof value === 'string' && ISO_DATE_PATTERN.test(value))
    .sort();

  return {
    earliest: dates[0] ?? null,
    latest: dates[dates.length - 1] ?? null,
    withDate: dates.length,
    withoutDate: records.length - dates.length
  };
}

/**
 * Compute every figure the report shows. Throws nothing; the funnel identity
 * is enforced by the orchestrator before this runs.
 */
export function summarizeQuality(input: QualityReportInput): QualitySummary {
  const { statistics } = input;
  const labelFor = input.labelFor ?? ((code: string) => code);

  const failureDistribution = sortReasonCounts(statistics.failureReasonCounts).map(([reasonCode, count]) => ({
    reasonCode,
    label: labelFor(reasonCode),
    count,
    percentOfFailed: percentage(count, statistics.failedCount)
  }));

  return {
    counts: {
      loaded: input.loadedCount,
      cleaned: statistics.passedCount,
      dropped: input.loadedCount - statistics.passedCount,
      incomplete: input.completenessDropped,
      duplicates: input.duplicatesDropped,
      failedValidation: statistics.failedCount
    },
    completeness: fieldCompleteness(input.validatedRecords),
    validation: {
      total: statistics.total,
      passed: statistics.passedCount,
      failed: statistics.failedCount,
      passRate: percentage(statistics.passedCount, statistics.total)
    },
    failureDistribution,
    dates: dateCoverage(input.validatedRecords),
    duplicateEntries: input.duplicates ?? [],
    failedRecords: statistics.failedRecordDetails,
    endToEndRetention: percentage(statistics.passedCount, input.loadedCount),
    topFailure: failureDistribution[0] ?? null
  };
}

function row(label: string, value: string | number): string {
  return `  ${label.padEnd(28)}${value}`;
}

function subRow(label: string, value: number): string {
  return `    - ${label.padEnd(24)}${value}`;
}

function section(title: string): string[] {
  return [title, RULE];
}

/**
 * Render the human-readable quality report
 */
export function renderQualityReport(summary: QualitySummary, options: RenderOptions = {}): string {
  const includeFailedDetails = options.includeFailedDetails ?? true;
  const { counts, validation, dates } = summary;
  const lines: string[] = ['ARTICLE QUALITY REPORT', BANNER, ''];

  lines.push(...section('1. RECORD PROCESSING STATISTICS'));
  lines.push(row('Total records loaded:', counts.loaded));
  lines.push(row('Cleaned record count:', counts.cleaned));
  lines.push(row('Dropped record count:', counts.dropped));
  lines.push(subRow('Incomplete:', counts.incomplete));
  lines.push(subRow('Duplicates:', counts.duplicates));
  lines.push(subRow('Failed validation:', counts.failedValidation));
  lines.push('');

  const total = summary.completeness[0]?.total ?? 0;
  lines.push(...section(`2. FIELD COMPLETENESS (validated records, n=${total})`));
  for (const entry of summary.completeness) {
    lines.push(`  ${entry.field.padEnd(20)}${formatPercent(entry.percent).padStart(7)}  (${entry.present}/${entry.total})`);
  }
  lines.push('');

  lines.push(...section('3. VALIDATION RESULT STATISTICS'));
  lines.push(row('Validated records:', validation.total));
  lines.push(row('Passed:', validation.passed));
  lines.push(row('Failed:', validation.failed));
  lines.push(row('Pass rate:', formatPercent(validation.passRate)));
  lines.push('');

  lines.push(...section('4. VALIDATION FAILURE DISTRIBUTION'));
  if (summary.failureDistribution.length === 0) {
    lines.push('  (none)');
  }
  for (const share of summary.failureDistribution) {
    lines.push(
      `  ${String(share.count).padStart(4)}  ${formatPercent(share.percentOfFailed).padStart(6)}  ${share.label} [${share.reasonCode}]`
    );
  }
  lines.push('');

  lines.push(...section('5. DATE COVERAGE RANGE (published_date)'));
  if (dates.earliest && dates.latest) {
    lines.push(row('Earliest:', dates.earliest));
    lines.push(row('Latest:', dates.latest));
  } else {
    lines.push('  No valid dates found.');
  }
  lines.push(row('Records with date:', `${dates.withDate}/${dates.withDate + dates.withoutDate}`));
  lines.push(row('Records without date:', dates.withoutDate));
  lines.push('');

  lines.push(...section('6. DUPLICATE RECORD STATISTICS'));
  lines.push(row('Duplicates removed:', counts.duplicates));
  for (const entry of summary.duplicateEntries) {
    lines.push(`    - #${entry.index} duplicate of #${entry.keptIndex} (key ${entry.key.slice(0, KEY_PREVIEW_LENGTH)})`);
  }
  lines.push('');

  if (includeFailedDetails && summary.failedRecords.length > 0) {
    lines.push(...section('FAILED RECORD DETAILS'));
    for (const detail of summary.failedRecords) {
      lines.push(`  [#${detail.index}] ${detail.label}`);
      lines.push(`       Reasons: ${detail.reasons.join(', ')}`);
      for (const message of detail.messages) {
        lines.push(`       - ${message}`);
      }
      lines.push('');
    }
  }

  lines.push(...section('SUMMARY'));
  lines.push(row('End-to-end retention:', `${formatPercent(summary.endToEndRetention)} (${counts.cleaned}/${counts.loaded} records saved)`));
  lines.push(row('Validation pass rate:', `${formatPercent(validation.passRate)} (${validation.passed}/${validation.total} validated records)`));
  if (summary.topFailure) {
    lines.push(row('Top failure reason:', `${summary.topFailure.label} (n=${summary.topFailure.count})`));
  }
  lines.push('');
  lines.push(BANNER);
  lines.push('End of report');

  return lines.join('\n') + '\n';
}
