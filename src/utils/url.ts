/**
 * URL helpers used for deduplication and domain matching
 */

import { domainToASCII } from 'node:url';
import { InvalidURLError } from './errors';

// scheme://authority rest
const AUTHORITY_PATTERN = /^([a-zA-Z][a-zA-Z\d+.-]*:\/\/)([^/?#]*)(.*)$/s;
const NON_ASCII = /[^\u0000-\u007f]/;

/**
 * Resolve `href` against `baseUrl`.
 * @throws InvalidURLError when href is empty or cannot be parsed
 */
export function absolute(baseUrl: string, href: string): string {
  const trimmed = href.trim();
  if (trimmed === '') {
    throw new InvalidURLError(href, 'empty href');
  }
  try {
    return new URL(trimmed, baseUrl).toString();
  } catch (error) {
    throw new InvalidURLError(href, `cannot resolve against ${baseUrl}`, { cause: error });
  }
}

export function withoutFragment(url: string): string {
  const index = url.indexOf('#');
  return index === -1 ? url : url.slice(0, index);
}

/**
 * Replace a Unicode host with its Punycode form. Only the host changes; the
 * rest of the string is returned as given.
 */
export function idnToAscii(url: string): string {
  const trimmed = url.trim();
  const match = AUTHORITY_PATTERN.exec(trimmed);
  if (!match) {
    return trimmed;
  }

  const [, scheme, authority, rest] = match;
  const at = authority.lastIndexOf('@');
  const userinfo = authority.slice(0, at + 1);
  const hostAndPort = authority.slice(at + 1);

  // IPv6 literals are ASCII already
  if (hostAndPort.startsWith('[')) {
    return trimmed;
  }

  const colon = hostAndPort.lastIndexOf(':');
  const host = colon === -1 ? hostAndPort : hostAndPort.slice(0, colon);
  const port = colon === -1 ? '' : hostAndPort.slice(colon);

  if (!NON_ASCII.test(host)) {
    return trimmed;
  }

  const asciiHost = domainToASCII(host);
  if (asciiHost === '') {
    throw new InvalidURLError(url, 'invalid internationalized host');
  }
  return `${scheme}${userinfo}${asciiHost}${port}${rest}`;
}

/**
 * Resolve and deduplicate hrefs, keeping the first occurrence of each
 * fragment-less URL.
 */
export function uniqueUrls(baseUrl: string, hrefs: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const href of hrefs) {
    const url = withoutFragment(absolute(baseUrl, href));
    if (!seen.has(url)) {
      seen.add(url);
      result.push(url);
    }
  }
  return result;
}

/**
 * ASCII host names of the given URLs, deduplicated in input order.
 */
export function allowedDomainsFor(urls: readonly string[]): string[] {
  const domains: string[] = [];
  for (const url of urls) {
    let hostname: string;
    try {
      hostname = new URL(idnToAscii(url)).hostname;
    } catch (error) {
      throw new InvalidURLError(url, 'cannot derive a domain', { cause: error });
    }
    if (hostname && !domains.includes(hostname)) {
      domains.push(hostname);
    }
  }
  return domains;
}

/**
 * True when the URL's host is one of `domains` or a subdomain of one. An
 * empty list allows every host.
 */
export function isAllowedUrl(url: string, domains: readonly string[]): boolean {
  if (domains.length === 0) {
    return true;
  }
  let hostname: string;
  try {
    hostname = new URL(url).hostname;
  } catch {
    return false;
  }
  return domains.some(domain => hostname === domain || hostname.endsWith(`.${domain}`));
}
