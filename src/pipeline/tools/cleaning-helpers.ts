/**
 * Cleaning Helper Functions
 * Pure record-level transformations that run before validation:
 * text/date normalization, completeness filtering and deduplication
 */

import CryptoJS from 'crypto-js';
import { isValid, parse, parseISO } from 'date-fns';
import { decodeHTML } from 'entities';
import { logger } from '../../utils/logger';
import {
  REQUIRED_FIELDS,
  TEXT_FIELDS,
  type ArticleRecord,
  type NormalizedArticle,
  type TextField
} from '../../types/article';

// Regex for merging multiple whitespace
const WHITESPACE_PATTERN = /\s+/g;

const ISO_PATTERN = /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(Z|[+-]\d{2}(?::?\d{2})?)?)?$/i;
// RFC 2822 style: optional weekday, day, month name, year, time and a named zone or offset
const RFC_2822_PATTERN = /^(?:[a-z]{3},\s*)?\d{1,2}\s+[a-z]{3}\s+\d{4}\s+\d{2}:\d{2}(?::\d{2})?\s+(?:GMT|UTC|UT|Z|[+-]\d{2}:?\d{2})$/i;
const NULL_LITERALS = new Set(['none', 'null', 'nan', 'undefined']);

// Zone-less layouts seen in scraped feeds, tried in order
const NAIVE_DATE_FORMATS = [
  'yyyy/MM/dd',
  'yyyy/MM/dd HH:mm',
  'yyyy/MM/dd HH:mm:ss',
  'MM/dd/yyyy',
  'MM/dd/yyyy HH:mm',
  'MM/dd/yyyy HH:mm:ss',
  'dd.MM.yyyy',
  'MMMM d, yyyy',
  'MMMM d, yyyy h:mm a',
  'MMM d, yyyy',
  'MMM d, yyyy h:mm a',
  'EEEE, MMMM d, yyyy',
  'd MMMM yyyy',
  'd MMM yyyy',
  'EEE, dd MMM yyyy HH:mm:ss'
];

const PARSE_REFERENCE_DATE = new Date(2000, 0, 1);

// Text normalization

function decodeHtml(text: string): string {
  // Entities only; a literal "<" in article text is kept as is
  return text.includes('&') ? decodeHTML(text) : text;
}

/**
 * Decode HTML entities, merge whitespace runs into one space and trim
 */
export function cleanText(text: string): string {
  return decodeHtml(text).replace(WHITESPACE_PATTERN, ' ').trim();
}

/**
 * Normalize one text field value. Null stays null, scalars are stringified,
 * objects and arrays carry no usable text and become "".
 */
export function normalizeTextValue(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string') return cleanText(value);
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return cleanText(String(value));
  }
  return '';
}

function isTextField(field: string): field is TextField {
  return (TEXT_FIELDS as readonly string[]).includes(field);
}

/**
 * Clean every text field present on the record; other fields are carried over
 */
export function normalizeTextFields(record: ArticleRecord): ArticleRecord {
  const normalized: ArticleRecord = {};
  for (const [field, value] of Object.entries(record)) {
    normalized[field] = isTextField(field) ? normalizeTextValue(value) : value;
  }
  return normalized;
}

// Date normalization

function toIsoSeconds(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

// Zone-less dates are read as UTC wall-clock time
function wallClockAsUtc(date: Date): Date {
  const utc = new Date(Date.UTC(
    2000,
    date.getMonth(),
    date.getDate(),
    date.getHours(),
    date.getMinutes(),
    date.getSeconds()
  ));
  // Date.UTC maps years 0-99 onto 1900-1999
  utc.setUTCFullYear(date.getFullYear());
  return utc;
}

/**
 * Parse a scraped date string into "YYYY-MM-DDTHH:MM:SSZ" (UTC).
 * Returns null for anything that is not a recognizable date.
 */
export function parseIsoDate(value: unknown): string | null {
  if (typeof value !== 'string') return null;

  const text = value.trim();
  if (!text || NULL_LITERALS.has(text.toLowerCase())) return null;

  const isoMatch = ISO_PATTERN.exec(text);
  if (isoMatch) {
    const parsed = parseISO(text.toUpperCase());
    if (!isValid(parsed)) return null;
    return toIsoSeconds(isoMatch[1] ? parsed : wallClockAsUtc(parsed));
  }

  for (const format of NAIVE_DATE_FORMATS) {
    const parsed = parse(text, format, PARSE_REFERENCE_DATE);
    if (isValid(parsed)) {
      return toIsoSeconds(wallClockAsUtc(parsed));
    }
  }

  if (RFC_2822_PATTERN.test(text)) {
    const parsed = new Date(text);
    if (isValid(parsed)) return toIsoSeconds(parsed);
  }

  return null;
}

/**
 * Resolve the normalized publication date of a record.
 * published_date wins when it carries a value; otherwise the raw published field is used.
 */
export function normalizeDateFields(record: ArticleRecord): string | null {
  const source = isMissing(record.published_date) ? record.published : record.published_date;
  return parseIsoDate(source);
}

/**
 * Run text and date normalization for one record
 */
export function normalizeRecord(record: ArticleRecord): NormalizedArticle {
  return {
    ...normalizeTextFields(record),
    published_date: normalizeDateFields(record)
  };
}

export function normalizeRecords(records: readonly ArticleRecord[]): NormalizedArticle[] {
  const normalized = records.map(normalizeRecord);
  const withDate = normalized.filter(record => record.published_date !== null).length;
  logger.info(`Normalized ${normalized.length} records; ${withDate} with a parseable publication date`);
  return normalized;
}

// Completeness

/**
 * True if value is missing: null, undefined, empty string, or whitespace only
 */
export function isMissing(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === 'string') return value.trim().length === 0;
  return false;
}

export function missingRequiredFields(record: ArticleRecord): string[] {
  return REQUIRED_FIELDS.filter(field => isMissing(record[field]));
}

export interface CompletenessResult<T extends ArticleRecord> {
  records: T[];
  droppedCount: number;
}

/**
 * Drop records missing title, content, or url
 */
export function dropIncompleteRecords<T extends ArticleRecord>(records: readonly T[]): CompletenessResult<T> {
  const kept: T[] = [];
  records.forEach((record, index) => {
    const missing = missingRequiredFields(record);
    if (missing.length > 0) {
      logger.debug(`Dropping incomplete record at index ${index}: missing ${missing.join(', ')}`);
      return;
    }
    kept.push(record);
  });

  const droppedCount = records.length - kept.length;
  logger.info(`Completeness filter removed ${droppedCount} records; ${kept.length} remaining`);
  return { records: kept, droppedCount };
}

// Deduplication

function keyPart(value: unknown): string {
  if (value === null || value === undefined) return '';
  return String(value).replace(WHITESPACE_PATTERN, ' ').trim().toLowerCase();
}

/**
 * Generate deterministic hash of the normalized (title, url) pair
 */
export function generateRecordKey(record: ArticleRecord): string {
  return CryptoJS.SHA256(`${keyPart(record.title)}\u0000${keyPart(record.url)}`).toString();
}

export interface DuplicateEntry {
  index: number;        // Position of the dropped record in the deduplication input
  keptIndex: number;    // Position of the first record with the same key
  key: string;
}

export interface DeduplicationResult<T extends ArticleRecord> {
  records: T[];
  duplicates: DuplicateEntry[];
}

/**
 * Deduplicate by normalized title and url; keep first occurrence
 */
export function deduplicateRecords<T extends ArticleRecord>(records: readonly T[]): DeduplicationResult<T> {
  const firstSeen = new Map<string, number>();
  const kept: T[] = [];
  const duplicates: DuplicateEntry[] = [];

  records.forEach((record, index) => {
    const key = generateRecordKey(record);
    const keptIndex = firstSeen.get(key);
    if (keptIndex !== undefined) {
      duplicates.push({ index, keptIndex, key });
      return;
    }
    firstSeen.set(key, index);
    kept.push(record);
  });

  logger.info(`Deduplication removed ${duplicates.length} duplicates; ${kept.length} remaining`);
  return { records: kept, duplicates };
}
