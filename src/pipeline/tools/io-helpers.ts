/**
 * File helpers for the cleaning pipeline
 * Loading the scraped batch and writing cleaned output and reports
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { LoadError, WriteError, getErrorMessage } from '../../utils/errors';
import { logger } from '../../utils/logger';
import type { ArticleRecord } from '../../types/article';

// Either a bare array of articles or a wrapper exposing `articles`
const articleBatchSchema = z.union([
  z.array(z.unknown()),
  z.object({ articles: z.array(z.unknown()) })
]);

export function isArticleRecord(value: unknown): value is ArticleRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Accept a parsed JSON document and return its article list
 * @throws LoadError for any other top-level shape
 */
export function extractArticles(data: unknown, source = '<memory>'): ArticleRecord[] {
  const parsed = articleBatchSchema.safeParse(data);
  if (!parsed.success) {
    throw new LoadError(source, 'expected an array of articles or an object with an "articles" array');
  }

  const entries = Array.isArray(parsed.data) ? parsed.data : parsed.data.articles;
  return entries.map((entry, index) => {
    if (isArticleRecord(entry)) return entry;
    // Kept as an empty record so the completeness filter drops and counts it
    logger.warn(`Entry ${index} in ${source} is not an object; treating it as an empty record`);
    return {};
  });
}

/**
 * Load the scraped batch from a JSON file
 * @throws LoadError if the file is missing, unparseable or wrongly shaped
 */
export async function loadArticles(filePath: string): Promise<ArticleRecord[]> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new LoadError(filePath, getErrorMessage(error), { cause: error });
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new LoadError(filePath, `invalid JSON (${getErrorMessage(error)})`, { cause: error });
  }

  const articles = extractArticles(data, filePath);
  logger.info(`Loaded ${articles.length} records from ${filePath}`);
  return articles;
}

async function writeTextFile(filePath: string, contents: string): Promise<void> {
  try {
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, contents, 'utf-8');
  } catch (error) {
    throw new WriteError(filePath, { cause: error });
  }
}

/**
 * Save cleaned records as a pretty-printed JSON array; creates parent directories
 */
export async function saveCleanData(records: readonly ArticleRecord[], filePath: string): Promise<void> {
  await writeTextFile(filePath, JSON.stringify(records, null, 2) + '\n');
  logger.info(`Cleaned data written to ${filePath} (${records.length} records)`);
}

export async function saveReport(report: string, filePath: string): Promise<void> {
  await writeTextFile(filePath, report);
  logger.info(`Quality report written to ${filePath}`);
}
