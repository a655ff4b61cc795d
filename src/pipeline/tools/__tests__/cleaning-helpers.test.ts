/**
 * Tests for the pre-validation cleaning helpers
 */

import {
  cleanText,
  deduplicateRecords,
  dropIncompleteRecords,
  generateRecordKey,
  isMissing,
  missingRequiredFields,
  normalizeDateFields,
  normalizeRecord,
  normalizeTextValue,
  parseIsoDate
} from '../cleaning-helpers';
import { createArticle } from '../../../__tests__/setup';

describe('Cleaning Helpers', () => {

  describe('cleanText', () => {
    it('should decode HTML entities and merge whitespace', () => {
      expect(cleanText('  Tom &amp; Jerry\n\n   show ')).toBe('Tom & Jerry show');
    });

    it('should treat non-breaking space entities as whitespace', () => {
      expect(cleanText('Rust&nbsp;&nbsp;and WebAssembly')).toBe('Rust and WebAssembly');
    });

    it('should keep literal angle brackets in plain text', () => {
      expect(cleanText('If x<y and y>z then & so on')).toBe('If x<y and y>z then & so on');
      expect(cleanText('Compare a<b')).toBe('Compare a<b');
    });

    it('should decode escaped markup to text without stripping it', () => {
      expect(cleanText('Use &lt;em class="highlighted-term"&gt;ok')).toBe('Use <em class="highlighted-term">ok');
      expect(cleanText('Use <em class="highlighted-term">ok')).toBe('Use <em class="highlighted-term">ok');
    });

    it('should leave plain text untouched apart from trimming', () => {
      expect(cleanText('\tAlready clean ')).toBe('Already clean');
      expect(cleanText('   ')).toBe('');
    });
  });

  describe('normalizeTextValue', () => {
    it('should keep null as null', () => {
      expect(normalizeTextValue(null)).toBeNull();
      expect(normalizeTextValue(undefined)).toBeNull();
    });

    it('should stringify scalars', () => {
      expect(normalizeTextValue(42)).toBe('42');
      expect(normalizeTextValue(false)).toBe('false');
    });

    it('should blank out objects and arrays', () => {
      expect(normalizeTextValue({ nested: 'value' })).toBe('');
      expect(normalizeTextValue(['a', 'b'])).toBe('');
    });
  });

  describe('parseIsoDate', () => {
    it.each([
      ['2024-01-15T10:30:00Z', '2024-01-15T10:30:00Z'],
      ['2024-01-15T10:30:00.123Z', '2024-01-15T10:30:00Z'],
      ['2024-01-15T12:30:00+02:00', '2024-01-15T10:30:00Z'],
      ['2024-01-15', '2024-01-15T00:00:00Z'],
      ['2024-03-06 14:30:00', '2024-03-06T14:30:00Z'],
      ['2024/03/02', '2024-03-02T00:00:00Z'],
      ['March 5, 2024', '2024-03-05T00:00:00Z'],
      ['Mar 8, 2024', '2024-03-08T00:00:00Z'],
      ['Mon, 11 Mar 2024 08:00:00 GMT', '2024-03-11T08:00:00Z'],
      ['Mon, 11 Mar 2024 10:00:00 +0200', '2024-03-11T08:00:00Z'],
      ['11 Mar 2024 08:00 UTC', '2024-03-11T08:00:00Z'],
      ['01/15/0024', '0024-01-15T00:00:00Z']
    ])('should parse %s', (input, expected) => {
      expect(parseIsoDate(input)).toBe(expected);
    });

    it.each(['', '   ', 'null', 'None', 'NaN', 'not a date', '2024-13-45', '1 UTC', 'Released 2024 GMT'])(
      'should return null for %j',
      input => {
        expect(parseIsoDate(input)).toBeNull();
      }
    );

    it('should return null for non-string values', () => {
      expect(parseIsoDate(20240115)).toBeNull();
      expect(parseIsoDate(null)).toBeNull();
      expect(parseIsoDate({ date: '2024-01-15' })).toBeNull();
    });
  });

  describe('normalizeDateFields', () => {
    it('should fall back to published when published_date is absent', () => {
      expect(normalizeDateFields({ published: 'March 5, 2024' })).toBe('2024-03-05T00:00:00Z');
    });

    it('should fall back to published when published_date is null or blank', () => {
      expect(normalizeDateFields({ published_date: null, published: '2024-01-02' })).toBe('2024-01-02T00:00:00Z');
      expect(normalizeDateFields({ published_date: ' ', published: '2024-01-02' })).toBe('2024-01-02T00:00:00Z');
    });

    it('should prefer published_date when both are present', () => {
      expect(normalizeDateFields({
        published_date: '2024-03-07T07:00:00Z',
        published: '2020-01-01'
      })).toBe('2024-03-07T07:00:00Z');
    });

    it('should yield null instead of failing on unparseable dates', () => {
      expect(normalizeDateFields({ published: 'sometime last week' })).toBeNull();
      expect(normalizeDateFields({})).toBeNull();
    });
  });

  describe('normalizeRecord', () => {
    it('should clean text fields and carry other fields over', () => {
      const record = normalizeRecord({
        id: 7,
        title: ' Rust &amp; WebAssembly   Tooling ',
        content: 'Body\n\ntext',
        author: null,
        url: ' https://news.example.com/a ',
        published: 'March 5, 2024',
        scraped_timestamp: '2024-03-05T10:00:00Z'
      });

      expect(record).toEqual({
        id: 7,
        title: 'Rust & WebAssembly Tooling',
        content: 'Body text',
        author: null,
        url: 'https://news.example.com/a',
        published: 'March 5, 2024',
        scraped_timestamp: '2024-03-05T10:00:00Z',
        published_date: '2024-03-05T00:00:00Z'
      });
    });

    it('should not add text fields that were absent', () => {
      const record = normalizeRecord({ title: 'Only a title' });
      expect(Object.keys(record)).toEqual(['title', 'published_date']);
    });

    it('should not mutate its input', () => {
      const input = createArticle({ title: '  Spaced  ' });
      normalizeRecord(input);
      expect(input.title).toBe('  Spaced  ');
    });
  });

  describe('completeness', () => {
    it('should treat null, empty and whitespace-only values as missing', () => {
      expect(isMissing(null)).toBe(true);
      expect(isMissing(undefined)).toBe(true);
      expect(isMissing('')).toBe(true);
      expect(isMissing(' \n\t ')).toBe(true);
      expect(isMissing('x')).toBe(false);
      expect(isMissing(0)).toBe(false);
    });

    it('should list every missing required field', () => {
      expect(missingRequiredFields({ content: 'body' })).toEqual(['title', 'url']);
    });

    it('should drop incomplete records and count them', () => {
      const records = [
        createArticle(),
        createArticle({ title: '' }),
        createArticle({ content: '   ' }),
        createArticle({ url: null }),
        createArticle({ title: 'Second' })
      ];

      const result = dropIncompleteRecords(records);

      expect(result.droppedCount).toBe(3);
      expect(result.records.map(record => record.title)).toEqual([
        'Sample Project Documents Its Release Process',
        'Second'
      ]);
    });

    it('should handle an empty batch', () => {
      expect(dropIncompleteRecords([])).toEqual({ records: [], droppedCount: 0 });
    });
  });

  describe('deduplication', () => {
    it('should build the same key regardless of case and surrounding whitespace', () => {
      const a = generateRecordKey({ title: 'Hello World', url: 'https://example.com/a' });
      const b = generateRecordKey({ title: '  hello   WORLD ', url: 'HTTPS://EXAMPLE.COM/A ' });
      expect(a).toBe(b);
      expect(a).toMatch(/^[0-9a-f]{64}$/);
    });

    it('should not confuse title and url boundaries', () => {
      const a = generateRecordKey({ title: 'ab', url: 'c' });
      const b = generateRecordKey({ title: 'a', url: 'bc' });
      expect(a).not.toBe(b);
    });

    it('should keep the first record per key', () => {
      const first = createArticle({ author: 'First Author' });
      const second = createArticle({ author: 'Second Author', title: '  SAMPLE project documents its release process' });
      const other = createArticle({ url: 'https://news.example.com/articles/other' });

      const result = deduplicateRecords([first, other, second]);

      expect(result.records).toEqual([first, other]);
      expect(result.duplicates).toEqual([
        { index: 2, keptIndex: 0, key: generateRecordKey(first) }
      ]);
    });

    it('should keep records that share only a title or only a url', () => {
      const records = [
        createArticle(),
        createArticle({ url: 'https://news.example.com/articles/elsewhere' }),
        createArticle({ title: 'A Different Headline' })
      ];

      expect(deduplicateRecords(records).records).toHaveLength(3);
    });
  });
});
