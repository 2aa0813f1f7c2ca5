/**
 * Link locators
 * Pure queries over a parsed page that find the "read more" link, the link
 * to the next page of an article, and links to source articles.
 */

import { absolute, uniqueUrls } from '../../utils/url';
import { InvalidURLError } from '../../utils/errors';
import type { Logger } from '../../utils/logger';
import type { Page } from '../../types/article';

export interface LinkLocatorOptions {
  readMore: string;
  readMoreSelector?: string;
  readNext: string;
  readNextContains?: string;
  sourceContains?: string;
  sourceParentContains?: string;
}

interface Anchor {
  href: string;
  text: string;          // all descendant text
  ownText: string[];     // direct text children, trimmed
  ancestorText: string[]; // direct text of parent and grandparent
}

function anchorsOf(page: Page): Anchor[] {
  const { $ } = page;
  return $('a[href]').toArray().map(element => {
    const anchor = $(element);
    const ownTextOf = (nodes: ReturnType<typeof anchor.contents>) =>
      nodes
        .toArray()
        .filter(node => node.nodeType === 3)
        .map(node => ('data' in node ? node.data : ''));

    return {
      href: (anchor.attr('href') ?? '').trim(),
      text: anchor.text(),
      ownText: ownTextOf(anchor.contents()).map(text => text.trim()),
      ancestorText: anchor
        .parents()
        .slice(0, 2)
        .toArray()
        .map(parent => ownTextOf($(parent).contents()).join(''))
    };
  });
}

function firstHref(page: Page, predicate: (anchor: Anchor) => boolean): string | undefined {
  return anchorsOf(page).find(anchor => anchor.href !== '' && predicate(anchor))?.href;
}

const hasExactText = (text: string) => (anchor: Anchor) => anchor.ownText.includes(text);
const containsText = (text: string) => (anchor: Anchor) => anchor.text.includes(text);

/**
 * The href of the link to the full article, if the page is a summary.
 * A configured selector wins over the link text.
 */
export function findReadMoreLink(page: Page, options: LinkLocatorOptions): string | undefined {
  if (options.readMoreSelector) {
    const { $ } = page;
    return $.root()
      .find(options.readMoreSelector)
      .toArray()
      .map(element => ($(element).attr('href') ?? '').trim())
      .find(href => href !== '');
  }
  return firstHref(page, hasExactText(options.readMore));
}

/**
 * The href of the link to the next page of the article. `readNextContains`
 * wins over the exact `readNext` text.
 */
export function findNextPageLink(page: Page, options: LinkLocatorOptions): string | undefined {
  if (options.readNextContains) {
    return firstHref(page, containsText(options.readNextContains));
  }
  if (options.readNext) {
    return firstHref(page, hasExactText(options.readNext));
  }
  return undefined;
}

/**
 * Absolute, fragment-less and deduplicated URLs of source articles, in
 * document order. Empty when no source option is configured.
 */
export function findSourceLinks(page: Page, options: LinkLocatorOptions, log?: Logger): string[] {
  let predicate: ((anchor: Anchor) => boolean) | undefined;
  if (options.sourceContains) {
    predicate = containsText(options.sourceContains);
  } else if (options.sourceParentContains) {
    const text = options.sourceParentContains;
    predicate = anchor => anchor.ancestorText.some(ancestor => ancestor.includes(text));
  }
  if (!predicate) {
    return [];
  }

  const resolved: string[] = [];
  for (const anchor of anchorsOf(page)) {
    if (anchor.href === '' || !predicate(anchor)) continue;
    try {
      resolved.push(absolute(page.url, anchor.href));
    } catch (error) {
      if (!(error instanceof InvalidURLError)) throw error;
      log?.debug(`Skipping unresolvable source href on ${page.url}: ${error.message}`);
    }
  }
  return uniqueUrls(page.url, resolved);
}
