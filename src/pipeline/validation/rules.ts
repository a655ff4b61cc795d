/**
 * Validation rule descriptors
 *
 * A rule is data: the field it reads, a predicate, a stable reason code and a
 * message renderer. The engine walks an ordered list of these, so rules can be
 * added or removed without touching the evaluation loop.
 */

import { z } from 'zod';
import { DEFAULT_MIN_CONTENT_LENGTH } from '../../config/environment';
import { logger } from '../../utils/logger';
import type { ArticleRecord } from '../../types/article';

export interface ValidationRule {
  readonly field: string;
  readonly reasonCode: string;
  /** Static description of the reason code, used in failure distributions */
  readonly label: string;
  /** Skip the rule (treat as passed) when the field is absent, null or empty */
  readonly onlyIfPresent: boolean;
  readonly predicate: (record: ArticleRecord) => boolean;
  /** Render the failure message with the observed values */
  readonly message: (record: ArticleRecord) => string;
}

export interface RuleSetOptions {
  minContentLength?: number;
  maxTitleLength?: number | null;
  maxContentLength?: number | null;
}

const URL_PREVIEW_LENGTH = 50;
const urlSchema = z.string().url();

/**
 * Read a field as trimmed text; null when it is not a string
 */
export function readText(record: ArticleRecord, field: string): string | null {
  const value = record[field];
  return typeof value === 'string' ? value.trim() : null;
}

// Length in code points so astral characters count once
function textLength(text: string): number {
  return Array.from(text).length;
}

function describeValue(value: unknown): string {
  if (value === null || value === undefined) return 'nothing';
  if (typeof value === 'string') return `${textLength(value.trim())} characters`;
  return `a ${Array.isArray(value) ? 'list' : typeof value}`;
}

function previewUrl(value: unknown): string {
  const text = typeof value === 'string' ? value : String(value);
  return text.length > URL_PREVIEW_LENGTH ? `${text.slice(0, URL_PREVIEW_LENGTH)}...` : text;
}

export function hasScheme(url: string): boolean {
  return url.startsWith('http://') || url.startsWith('https://');
}

/**
 * Scheme check plus a minimal shape check: something after the scheme that parses as a URL
 */
export function isHttpUrl(url: string): boolean {
  return hasScheme(url) && /^https?:\/\/.+/.test(url) && urlSchema.safeParse(url).success;
}

export function missingTitleRule(): ValidationRule {
  return {
    field: 'title',
    reasonCode: 'missing_title',
    label: 'Title is missing or empty.',
    onlyIfPresent: false,
    predicate: record => {
      const title = readText(record, 'title');
      return title !== null && title.length > 0;
    },
    message: () => 'Title is missing or empty.'
  };
}

export function shortContentRule(minLength: number = DEFAULT_MIN_CONTENT_LENGTH): ValidationRule {
  return {
    field: 'content',
    reasonCode: 'short_content',
    label: `Content is too short (minimum ${minLength} characters).`,
    onlyIfPresent: false,
    predicate: record => {
      const content = readText(record, 'content');
      return content !== null && textLength(content) >= minLength;
    },
    message: record =>
      `Content is too short: ${describeValue(record.content)} (minimum ${minLength} required).`
  };
}

export function invalidUrlRule(): ValidationRule {
  return {
    field: 'url',
    reasonCode: 'invalid_url',
    label: 'URL must start with http:// or https:// and have valid format.',
    onlyIfPresent: false,
    predicate: record => {
      const url = readText(record, 'url');
      return url !== null && isHttpUrl(url);
    },
    message: record => {
      const url = readText(record, 'url');
      if (url === null || url.length === 0) {
        return `URL is missing or not text (got ${describeValue(record.url)}).`;
      }
      if (!hasScheme(url)) {
        return `URL must start with http:// or https:// (got: ${previewUrl(url)}).`;
      }
      return `URL has invalid format after scheme (got: ${previewUrl(url)}).`;
    }
  };
}

export function missingPublishedRule(): ValidationRule {
  const present = (value: unknown) =>
    value !== null && value !== undefined && !(typeof value === 'string' && value.trim() === '');

  return {
    field: 'published_date',
    reasonCode: 'missing_published',
    label: 'Published date is missing or empty.',
    onlyIfPresent: false,
    predicate: record => present(record.published_date) || present(record.published),
    message: () => 'Published date is missing or empty.'
  };
}

export function titleTooLongRule(maxLength: number): ValidationRule {
  return {
    field: 'title',
    reasonCode: 'title_too_long',
    label: `Title exceeds maximum length (${maxLength} characters).`,
    onlyIfPresent: true,
    predicate: record => {
      const title = readText(record, 'title');
      return title !== null && textLength(title) <= maxLength;
    },
    message: record => `Title is too long: ${describeValue(record.title)} (maximum ${maxLength}).`
  };
}

export function contentTooLongRule(maxLength: number): ValidationRule {
  return {
    field: 'content',
    reasonCode: 'content_too_long',
    label: `Content exceeds maximum length (${maxLength} characters).`,
    onlyIfPresent: true,
    predicate: record => {
      const content = readText(record, 'content');
      return content !== null && textLength(content) <= maxLength;
    },
    message: record => `Content is too long: ${describeValue(record.content)} (maximum ${maxLength}).`
  };
}

/**
 * Built-in rule set: title, content length, url, publication date.
 * Length ceilings are appended only when configured.
 */
export function createDefaultRules(options: RuleSetOptions = {}): ValidationRule[] {
  const rules = [
    missingTitleRule(),
    shortContentRule(options.minContentLength ?? DEFAULT_MIN_CONTENT_LENGTH),
    invalidUrlRule(),
    missingPublishedRule()
  ];

  if (options.maxTitleLength != null) {
    rules.push(titleTooLongRule(options.maxTitleLength));
  }
  if (options.maxContentLength != null) {
    rules.push(contentTooLongRule(options.maxContentLength));
  }
  return rules;
}

/**
 * Remove rules by reason code
 */
export function withoutRules(rules: readonly ValidationRule[], reasonCodes: readonly string[]): ValidationRule[] {
  const known = new Set(rules.map(rule => rule.reasonCode));
  const unknown = reasonCodes.filter(code => !known.has(code));
  if (unknown.length > 0) {
    logger.warn(`Ignoring unknown validation rules: ${unknown.join(', ')}`);
  }

  const disabled = new Set(reasonCodes);
  return rules.filter(rule => !disabled.has(rule.reasonCode));
}
