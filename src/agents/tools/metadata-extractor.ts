/**
 * Metadata and main-content extraction
 * Uses Readability for the article body and Open Graph, <meta> and JSON-LD
 * for metadata. The body is returned as XML with a single <main> root.
 */

import { Readability } from '@mozilla/readability';
import { JSDOM } from 'jsdom';
import { ExtractionError, errorMessage } from '../../utils/errors';
import { BODY_ROOT, characterCount, isElement, isText, parseXml } from '../../utils/xml';
import type { ExtractedArticle } from '../../types/article';

// Attributes that survive the copy into the XML body
const KEPT_ATTRIBUTES = ['href', 'src', 'alt', 'title', 'datetime', 'lang'];

const DROPPED_ELEMENTS = new Set([
  'script', 'style', 'noscript', 'template', 'iframe', 'form', 'button', 'input', 'select', 'svg'
]);

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function metaContent(document: Document, key: string): string | undefined {
  const element = document.querySelector(`meta[property="${key}"]`)
    ?? document.querySelector(`meta[name="${key}"]`);
  return element?.getAttribute('content')?.trim() || undefined;
}

function readJsonLd(document: Document): JsonObject {
  const raw = document.querySelector('script[type="application/ld+json"]')?.textContent;
  if (!raw) return {};

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    // Malformed JSON-LD carries no usable metadata
    return {};
  }
  const first: unknown = Array.isArray(data) ? data[0] : data;
  return isJsonObject(first) ? first : {};
}

function jsonLdAuthor(ld: JsonObject): string | undefined {
  const author = Array.isArray(ld.author) && ld.author.length === 1 ? ld.author[0] : ld.author;
  if (isJsonObject(author) && typeof author.name === 'string') {
    return author.name.trim() || undefined;
  }
  return undefined;
}

function jsonLdString(ld: JsonObject, key: string): string | undefined {
  const value = ld[key];
  return typeof value === 'string' ? value : undefined;
}

export function toIsoTimestamp(value: string | undefined): string | undefined {
  if (!value) return undefined;
  const time = Date.parse(value.trim());
  return Number.isNaN(time) ? undefined : new Date(time).toISOString();
}

export function normalizeLang(value: string | null | undefined): string {
  const primary = (value ?? '').trim().split(/[-_]/)[0].toLowerCase();
  return /^[a-z]{2}$/.test(primary) ? primary : 'und';
}

function copyChildren(source: Node, target: Element, document: Document) {
  source.childNodes.forEach(child => {
    if (isText(child)) {
      target.appendChild(document.createTextNode(child.data));
      return;
    }
    if (!isElement(child) || DROPPED_ELEMENTS.has(child.localName)) {
      return;
    }
    const copy = document.createElement(child.localName);
    for (const name of KEPT_ATTRIBUTES) {
      const value = child.getAttribute(name);
      if (value !== null) {
        copy.setAttribute(name, value);
      }
    }
    copyChildren(child, copy, document);
    target.appendChild(copy);
  });
}

/**
 * Convert Readability's HTML into an XML document rooted at <main>.
 */
export function htmlToBodyXml(html: string): string {
  const source = JSDOM.fragment(html);
  const body = parseXml(`<${BODY_ROOT}/>`);
  copyChildren(source, body.root, body.document);
  return body.serialize(body.root);
}

/**
 * Extract metadata and the main content of an HTML page.
 * @throws ExtractionError when the page has no extractable content
 */
export function extractMetadataAndBody(text: string, url: string, langHint?: string): ExtractedArticle {
  let document: Document;
  try {
    document = new JSDOM(text, { url }).window.document;
  } catch (error) {
    throw new ExtractionError(url, `cannot parse HTML: ${errorMessage(error)}`, { cause: error });
  }

  // Readability mutates the document, so read metadata first
  const ld = readJsonLd(document);
  const lang = normalizeLang(document.documentElement.getAttribute('lang') || langHint);
  const meta = {
    title: metaContent(document, 'og:title'),
    siteName: metaContent(document, 'og:site_name'),
    description: metaContent(document, 'og:description') ?? metaContent(document, 'description'),
    kind: metaContent(document, 'og:type'),
    author: metaContent(document, 'article:author') ?? metaContent(document, 'author'),
    publishedTime: metaContent(document, 'article:published_time'),
    modifiedTime: metaContent(document, 'article:modified_time')
  };
  const documentTitle = document.title.trim() || undefined;

  let article: ReturnType<Readability['parse']>;
  try {
    article = new Readability(document).parse();
  } catch (error) {
    throw new ExtractionError(url, `readability failed: ${errorMessage(error)}`, { cause: error });
  }
  if (!article?.content) {
    throw new ExtractionError(url, 'no extractable content');
  }

  const bodyXml = htmlToBodyXml(article.content);
  if (characterCount(bodyXml) === 0) {
    throw new ExtractionError(url, 'extracted body is empty');
  }

  return {
    url,
    title: meta.title ?? (article.title?.trim() || documentTitle),
    lang,
    author: article.byline?.trim() || meta.author || jsonLdAuthor(ld),
    site_name: article.siteName?.trim() || meta.siteName,
    description: meta.description ?? (article.excerpt?.trim() || undefined),
    kind: meta.kind,
    published_time: toIsoTimestamp(meta.publishedTime ?? jsonLdString(ld, 'datePublished')),
    modified_time: toIsoTimestamp(meta.modifiedTime ?? jsonLdString(ld, 'dateModified')),
    body_xml: bodyXml
  };
}
