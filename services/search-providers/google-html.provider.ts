import { EvidenceRecord, SearchProvider } from '../../types/evidence.types.js';
import { PageClient } from '../web-scraper.service.js';
import { describeError } from '../../lib/errors.js';
import { selectFirstAttribute, selectFirstText } from '../../utils/selector.utils.js';

const GOOGLE_SEARCH_URL = 'https://www.google.com/search';

export const GOOGLE_RESULT_SELECTORS = {
  block: 'div.g, div.tF2Cxc, div.kvH3mc',
  title: ['h3', 'h3.LC20lb', 'h3.r'],
  link: ['a'],
  snippet: ['div.VwiC3b', 'span.aCOpRe', 'div.s', 'div.st'],
} as const;

export function parseGoogleResults(document: Document, query: string, limit: number): EvidenceRecord[] {
  const results: EvidenceRecord[] = [];
  const seenLinks = new Set<string>();

  for (const block of Array.from(document.querySelectorAll(GOOGLE_RESULT_SELECTORS.block))) {
    if (results.length >= limit) break;

    const title = selectFirstText(block, GOOGLE_RESULT_SELECTORS.title);
    if (!title) continue;

    const link = selectFirstAttribute(block, GOOGLE_RESULT_SELECTORS.link, 'href') ?? '';
    // Result containers nest (div.g > div.tF2Cxc), so the same hit can match twice
    if (!link.includes('http') || seenLinks.has(link)) continue;

    const snippet = selectFirstText(block, GOOGLE_RESULT_SELECTORS.snippet);
    seenLinks.add(link);
    results.push({
      title,
      link,
      snippet: snippet || `Information related to ${query}`,
    });
  }

  return results;
}

export class GoogleHtmlSearchProvider implements SearchProvider {
  readonly name = 'google-html' as const;

  constructor(private client: PageClient) {}

  async search(query: string, limit: number): Promise<EvidenceRecord[]> {
    try {
      const url = `${GOOGLE_SEARCH_URL}?${new URLSearchParams({ q: query }).toString()}`;
      const { html } = await this.client.fetchPage(url);
      return parseGoogleResults(this.client.parseDocument(html, url), query, limit);
    } catch (error) {
      console.warn(`[google-html] Search failed: ${describeError(error)}`);
      return [];
    }
  }
}
