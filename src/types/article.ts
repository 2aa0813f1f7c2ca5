import type { CheerioAPI } from 'cheerio';

// ArticleItem: one resolved article, possibly assembled from several pages
export interface ArticleItem {
  url: string;               // Canonical URL of the first article page
  body: string;              // XML with a single <main> root element
  lang: string;              // Two-letter language code, or "und"
  title?: string;
  author?: string;
  description?: string;
  site_name?: string;
  kind?: string;             // og:type
  published_time?: string;   // ISO 8601
  modified_time?: string;    // ISO 8601
  acquired_time: string;     // ISO 8601, set once when the item is assembled
  character_count: number;   // Non-whitespace characters in body
  sources: ArticleItem[];    // Source articles; their own sources stay empty
}

// Output of a metadata extractor for one page
export interface ExtractedArticle {
  url: string;
  title?: string;
  lang: string;
  author?: string;
  site_name?: string;
  description?: string;
  kind?: string;
  published_time?: string;
  modified_time?: string;
  body_xml: string;
}

export type MetadataExtractor = (text: string, url: string, langHint?: string) => ExtractedArticle;

// FeedItem: a generated Atom or RSS document for a listing page
export interface FeedItem {
  url: string;
  file_name: string;
  content: string;
  generated_at: string;
}

// A fetched HTML page with a queryable DOM
export interface Page {
  url: string;               // Final URL after redirects
  text: string;
  status: number;
  $: CheerioAPI;
}

export type FetchPage = (url: string) => Promise<Page>;
