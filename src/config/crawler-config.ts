/**
 * Crawler configuration schemas
 * Options are validated when a crawler is constructed; conflicting or
 * malformed options raise InvalidConfigurationError before any fetch.
 */

import * as cheerio from 'cheerio';
import { z } from 'zod';
import { InvalidConfigurationError } from '../utils/errors';
import { idnToAscii } from '../utils/url';

export const DEFAULT_READ_MORE = '記事全文を読む';
export const DEFAULT_READ_NEXT = '次へ';
export const DEFAULT_ARCHIVE_ARTICLE_SELECTOR = 'main li:not([class=" pr"]) h2.title a';
export const DEFAULT_ARCHIVE_NEXT_SELECTOR = 'div[class*="pagination"] a:contains("次へ")';

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(idnToAscii(value));
    return (url.protocol === 'http:' || url.protocol === 'https:') && url.hostname !== '';
  } catch {
    return false;
  }
}

function isSelector(value: string): boolean {
  try {
    cheerio.load('').root().find(value);
    return true;
  } catch {
    return false;
  }
}

function isRegExp(value: string): boolean {
  try {
    new RegExp(value);
    return true;
  } catch {
    return false;
  }
}

export const httpUrlSchema = z.string().refine(isHttpUrl, { message: 'must be an absolute http(s) URL' });

export const selectorSchema = z.string().min(1).refine(isSelector, { message: 'must be a valid CSS selector' });

export const regExpSchema = z.string().min(1).refine(isRegExp, { message: 'must be a valid regular expression' });

/**
 * A comma-separated string or a list of URLs. Entries are trimmed,
 * full-width spaces included.
 */
export const urlListSchema = z
  .union([z.string(), z.array(z.string())])
  .transform(value => (typeof value === 'string' ? value.split(',') : value).map(url => url.trim()))
  .pipe(z.array(httpUrlSchema));

const readMoreOptions = z.object({
  urls: urlListSchema,
  readMore: z.string().default(DEFAULT_READ_MORE),
  readMoreSelector: selectorSchema.optional(),
  readNext: z.string().default(DEFAULT_READ_NEXT),
  readNextContains: z.string().min(1).optional(),
  sourceContains: z.string().min(1).optional(),
  sourceParentContains: z.string().min(1).optional(),
  concurrency: z.coerce.number().int().min(1).optional(),
  lang: z.string().min(2).optional()
});

function sourceOptionsAreExclusive(
  config: { sourceContains?: string; sourceParentContains?: string },
  ctx: z.RefinementCtx
) {
  if (config.sourceContains && config.sourceParentContains) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['sourceParentContains'],
      message: 'sourceContains and sourceParentContains are mutually exclusive'
    });
  }
}

export const readMoreConfigSchema = readMoreOptions.superRefine(sourceOptionsAreExclusive);

export const archiveConfigSchema = readMoreOptions
  .extend({
    archiveArticleSelector: selectorSchema.default(DEFAULT_ARCHIVE_ARTICLE_SELECTOR),
    archiveNextSelector: selectorSchema.default(DEFAULT_ARCHIVE_NEXT_SELECTOR)
  })
  .superRefine(sourceOptionsAreExclusive);

export const feedPageSchema = z.object({
  fileName: z.string().min(1),
  hrefSelector: selectorSchema,
  titleSelector: selectorSchema,
  feedType: z.enum(['atom', 'rss']).default('atom')
});

export const feedConfigSchema = z.object({
  feedConfig: z.record(httpUrlSchema, feedPageSchema)
});

export const crawlerNameSchema = z.enum(['read-more', 'archive']);

export const routeSchema = z.object({
  name: z.string().optional(),
  patterns: z.array(regExpSchema).min(1),
  crawler: crawlerNameSchema.default('read-more'),
  args: z.record(z.string(), z.string()).default({})
});

export const feedReaderConfigSchema = z.object({
  feedUrls: z.array(httpUrlSchema).default([]),
  routes: z.array(routeSchema).default([])
});

export type ReadMoreConfig = z.output<typeof readMoreConfigSchema>;
export type ArchiveConfig = z.output<typeof archiveConfigSchema>;
export type FeedPageConfig = z.output<typeof feedPageSchema>;
export type CrawlerName = z.output<typeof crawlerNameSchema>;
export type Route = z.output<typeof routeSchema>;

/**
 * Validate `input` against `schema`.
 * @throws InvalidConfigurationError listing every issue
 */
export function parseConfig<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new InvalidConfigurationError(
      result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return result.data;
}
