/**
 * Tests for URL resolution, deduplication and domain matching
 */

import { absolute, allowedDomainsFor, idnToAscii, isAllowedUrl, uniqueUrls, withoutFragment } from '../url';
import { InvalidURLError } from '../errors';

describe('absolute', () => {
  it('resolves a relative href against the base URL', () => {
    expect(absolute('https://example.org/news/1', '../a?page=2')).toBe('https://example.org/a?page=2');
  });

  it('keeps absolute hrefs', () => {
    expect(absolute('https://example.org/', 'https://other.example.com/x')).toBe('https://other.example.com/x');
  });

  it('trims surrounding whitespace', () => {
    expect(absolute('https://example.org/news/', '  b  ')).toBe('https://example.org/news/b');
  });

  it('rejects empty and blank hrefs', () => {
    expect(() => absolute('https://example.org/', '')).toThrow(InvalidURLError);
    expect(() => absolute('https://example.org/', '   ')).toThrow(InvalidURLError);
  });

  it('rejects hrefs that cannot be resolved', () => {
    expect(() => absolute('not a base', 'relative')).toThrow(InvalidURLError);
  });
});

describe('withoutFragment', () => {
  it('strips the fragment and keeps the query', () => {
    expect(withoutFragment('https://example.org/p?q=1#top')).toBe('https://example.org/p?q=1');
  });

  it('returns URLs without a fragment unchanged', () => {
    expect(withoutFragment('https://example.org/p')).toBe('https://example.org/p');
  });

  it('returns an empty string for an empty string', () => {
    expect(withoutFragment('')).toBe('');
  });
});

describe('idnToAscii', () => {
  it('converts a Unicode host to punycode', () => {
    expect(idnToAscii('https://例え.テスト/path?q=1')).toBe('https://xn--r8jz45g.xn--zckzah/path?q=1');
  });

  it('keeps userinfo and port around the converted host', () => {
    expect(idnToAscii('http://user@例え.テスト:8080/')).toBe('http://user@xn--r8jz45g.xn--zckzah:8080/');
  });

  it('passes ASCII hosts through unchanged', () => {
    expect(idnToAscii('https://example.org:8080/記事')).toBe('https://example.org:8080/記事');
  });

  it('passes IPv6 literals through unchanged', () => {
    expect(idnToAscii('http://[::1]:8080/')).toBe('http://[::1]:8080/');
  });
});

describe('uniqueUrls', () => {
  it('deduplicates by fragment-less absolute URL in first-seen order', () => {
    expect(uniqueUrls('https://example.org/news/', ['/a#x', '/a#y', '/b'])).toEqual([
      'https://example.org/a',
      'https://example.org/b'
    ]);
  });

  it('keeps the first occurrence when a later href repeats it', () => {
    expect(uniqueUrls('https://example.org/', ['/c', '/b', '/c#again', '/a'])).toEqual([
      'https://example.org/c',
      'https://example.org/b',
      'https://example.org/a'
    ]);
  });
});

describe('allowedDomainsFor', () => {
  it('derives deduplicated ASCII host names', () => {
    expect(
      allowedDomainsFor(['https://例え.テスト/a', 'https://www.example.org/b', 'https://www.example.org/c'])
    ).toEqual(['xn--r8jz45g.xn--zckzah', 'www.example.org']);
  });

  it('drops the port', () => {
    expect(allowedDomainsFor(['http://example.org:8080/'])).toEqual(['example.org']);
  });
});

describe('isAllowedUrl', () => {
  it('accepts the host and its subdomains', () => {
    expect(isAllowedUrl('https://example.org/x', ['example.org'])).toBe(true);
    expect(isAllowedUrl('https://sub.example.org/x', ['example.org'])).toBe(true);
  });

  it('rejects hosts that only share a suffix', () => {
    expect(isAllowedUrl('https://badexample.org/', ['example.org'])).toBe(false);
  });

  it('accepts everything when no domains are configured', () => {
    expect(isAllowedUrl('https://anywhere.example.net/', [])).toBe(true);
  });

  it('rejects strings that are not URLs', () => {
    expect(isAllowedUrl('not a url', ['example.org'])).toBe(false);
  });
});
