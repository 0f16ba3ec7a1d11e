import { EvidenceRecord, SearchProvider } from '../../types/evidence.types.js';
import { PageClient } from '../web-scraper.service.js';
import { describeError } from '../../lib/errors.js';
import { normalizeText, selectFirstText } from '../../utils/selector.utils.js';

const DUCKDUCKGO_HTML_URL = 'https://html.duckduckgo.com/html/';

export const DUCKDUCKGO_RESULT_SELECTORS = {
  block: 'div.result',
  anchor: 'a.result__a',
  snippet: ['a.result__snippet'],
} as const;

export function parseDuckDuckGoResults(document: Document, query: string, limit: number): EvidenceRecord[] {
  const results: EvidenceRecord[] = [];

  for (const block of Array.from(document.querySelectorAll(DUCKDUCKGO_RESULT_SELECTORS.block))) {
    if (results.length >= limit) break;

    const anchor = block.querySelector(DUCKDUCKGO_RESULT_SELECTORS.anchor);
    if (!anchor) continue;

    const title = normalizeText(anchor.textContent);
    const link = anchor.getAttribute('href') ?? '';
    if (!title || !link) continue;

    const snippet = selectFirstText(block, DUCKDUCKGO_RESULT_SELECTORS.snippet);
    results.push({
      title,
      link,
      snippet: snippet || `Information about ${query}`,
    });
  }

  return results;
}

/** DuckDuckGo's JavaScript-free endpoint; it only answers form POSTs reliably. */
export class DuckDuckGoHtmlSearchProvider implements SearchProvider {
  readonly name = 'duckduckgo-html' as const;

  constructor(private client: PageClient) {}

  async search(query: string, limit: number): Promise<EvidenceRecord[]> {
    try {
      const { html } = await this.client.submitForm(DUCKDUCKGO_HTML_URL, { q: query });
      return parseDuckDuckGoResults(this.client.parseDocument(html, DUCKDUCKGO_HTML_URL), query, limit);
    } catch (error) {
      console.warn(`[duckduckgo-html] Search failed: ${describeError(error)}`);
      return [];
    }
  }
}
