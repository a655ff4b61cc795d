// Article record shapes shared by every pipeline stage

/** Text fields cleaned by the normalizer */
export const TEXT_FIELDS = ['title', 'content', 'author', 'source', 'url', 'category'] as const;

/** Fields a record must carry to survive the completeness filter */
export const REQUIRED_FIELDS = ['title', 'content', 'url'] as const;

/** Fields whose completeness is listed in the quality report */
export const TRACKED_FIELDS = ['title', 'content', 'author', 'source', 'url', 'published_date', 'category'] as const;

export type TextField = typeof TEXT_FIELDS[number];
export type RequiredField = typeof REQUIRED_FIELDS[number];
export type TrackedField = typeof TRACKED_FIELDS[number];

/**
 * One scraped article. Values come straight from the input file, so anything
 * may show up in a field until the normalizer has run.
 */
export interface ArticleRecord {
  title?: unknown;
  content?: unknown;
  author?: unknown;
  source?: unknown;
  url?: unknown;
  published?: unknown;          // Raw date string as scraped
  published_date?: unknown;     // "YYYY-MM-DDTHH:MM:SSZ" or null once normalized
  category?: unknown;
  scraped_timestamp?: unknown;
  [field: string]: unknown;
}

/**
 * Record after text and date normalization. Text fields hold cleaned strings
 * (or null), but the validation engine still reads them defensively.
 */
export interface NormalizedArticle extends ArticleRecord {
  published_date: string | null;
}
