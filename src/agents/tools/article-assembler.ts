/**
 * Article assembly
 * Builds ArticleItems from pages and merges continuation pages into them
 */

import { ExtractionError, MergeError, errorMessage } from '../../utils/errors';
import { BODY_ROOT, characterCount, parseXml } from '../../utils/xml';
import { extractMetadataAndBody } from './metadata-extractor';
import type { ArticleItem, MetadataExtractor, Page } from '../../types/article';

export { characterCount };

export interface ArticleAssemblerOptions {
  extract?: MetadataExtractor;
  langHint?: string;
  now?: () => Date;
}

export class ArticleAssembler {
  private readonly extract: MetadataExtractor;
  private readonly langHint?: string;
  private readonly now: () => Date;

  constructor(options: ArticleAssemblerOptions = {}) {
    this.extract = options.extract ?? extractMetadataAndBody;
    this.langHint = options.langHint;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Build an ArticleItem from a page.
   * @throws ExtractionError when nothing can be extracted or the body is not
   * a single <main> element
   */
  assemble(page: Page): ArticleItem {
    const extracted = this.extract(page.text, page.url, this.langHint);

    let count: number;
    try {
      const { root } = parseXml(extracted.body_xml);
      if (root.localName !== BODY_ROOT) {
        throw new Error(`root element is <${root.localName}>`);
      }
      count = characterCount(extracted.body_xml);
    } catch (error) {
      throw new ExtractionError(page.url, `body is not a single <${BODY_ROOT}> element: ${errorMessage(error)}`, {
        cause: error
      });
    }

    return {
      url: extracted.url,
      body: extracted.body_xml,
      lang: extracted.lang || 'und',
      title: extracted.title,
      author: extracted.author,
      description: extracted.description,
      site_name: extracted.site_name,
      kind: extracted.kind,
      published_time: extracted.published_time,
      modified_time: extracted.modified_time,
      acquired_time: this.now().toISOString(),
      character_count: count,
      sources: []
    };
  }

  /**
   * Append the body of `page` to `base`. The children of the page's <main>
   * follow the children of base's <main>; base is mutated and returned.
   * @throws ExtractionError when the page has no content
   * @throws MergeError when either body is not well-formed
   */
  merge(base: ArticleItem, page: Page): ArticleItem {
    const next = this.assemble(page);

    let merged: string;
    try {
      const target = parseXml(base.body);
      if (target.root.localName !== BODY_ROOT) {
        throw new Error(`base body has no <${BODY_ROOT}> root`);
      }
      const source = parseXml(next.body);
      for (const child of Array.from(source.root.childNodes)) {
        target.root.appendChild(target.document.importNode(child, true));
      }
      merged = target.serialize(target.root);
    } catch (error) {
      throw new MergeError(page.url, errorMessage(error), { cause: error });
    }

    base.body = merged;
    base.character_count = characterCount(merged);
    return base;
  }
}
