/**
 * Shared fixtures: in-process fetchers and a predictable extractor
 */

import * as cheerio from 'cheerio';
import { createPage } from '../agents/tools/fetch-page';
import { ExtractionError, FetchError } from '../utils/errors';
import type { ExtractedArticle, Page } from '../types/article';

export const FIXED_NOW = new Date('2024-05-01T09:30:00.000Z');

export function html(body: string, { title = 'Test page', lang = 'ja' } = {}): string {
  return `<!DOCTYPE html><html lang="${lang}"><head><title>${title}</title></head><body>${body}</body></html>`;
}

function escapeXml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/**
 * Extractor whose body is every `article p` of the page, in order. Pages
 * without an <article> have no content.
 */
export function fakeExtract(text: string, url: string): ExtractedArticle {
  const $ = cheerio.load(text);
  const paragraphs = $('article p').toArray().map(element => $(element).text());
  if (paragraphs.length === 0) {
    throw new ExtractionError(url, 'no extractable content');
  }
  return {
    url,
    title: $('title').text() || undefined,
    lang: 'ja',
    body_xml: `<main>${paragraphs.map(p => `<p>${escapeXml(p)}</p>`).join('')}</main>`
  };
}

/**
 * A fetcher serving `pages` by URL. Unknown URLs fail with HTTP 404; URLs
 * mapped to an Error fail with that error.
 */
export function fakeFetcher(pages: Record<string, string | Error>) {
  return vi.fn(async (url: string): Promise<Page> => {
    const entry = pages[url];
    if (entry === undefined) {
      throw new FetchError(url, 'HTTP 404', { status: 404 });
    }
    if (entry instanceof Error) {
      throw entry;
    }
    return createPage(url, entry);
  });
}

/**
 * Run `fn` and return the error it throws, which must be a `type`.
 */
export function catchError<E extends Error>(fn: () => unknown, type: new (...args: never[]) => E): E {
  try {
    fn();
  } catch (error) {
    if (error instanceof type) {
      return error;
    }
    throw error;
  }
  throw new Error(`expected ${type.name} to be thrown`);
}
