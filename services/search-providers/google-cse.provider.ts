import { z } from 'zod';
import { EvidenceRecord, SearchProvider } from '../../types/evidence.types.js';
import { PageClient } from '../web-scraper.service.js';
import { describeError } from '../../lib/errors.js';

const GOOGLE_CSE_BASE = 'https://www.googleapis.com/customsearch/v1';
// The JSON API rejects `num` above 10.
const MAX_PAGE_SIZE = 10;

const cseResponseSchema = z.object({
  items: z
    .array(
      z.object({
        title: z.string().optional(),
        link: z.string().optional(),
        snippet: z.string().optional(),
      })
    )
    .optional(),
});

/**
 * Google Custom Search JSON API. Needs both an API key and a
 * search-engine id; the free tier allows 100 queries a day.
 */
export class GoogleCustomSearchProvider implements SearchProvider {
  readonly name = 'google-cse' as const;

  constructor(
    private client: PageClient,
    private apiKey: string,
    private searchEngineId: string
  ) {}

  async search(query: string, limit: number): Promise<EvidenceRecord[]> {
    const params = new URLSearchParams({
      key: this.apiKey,
      cx: this.searchEngineId,
      q: query,
      num: String(Math.min(limit, MAX_PAGE_SIZE)),
    });

    try {
      const data = cseResponseSchema.parse(await this.client.fetchJson(`${GOOGLE_CSE_BASE}?${params.toString()}`));
      const results: EvidenceRecord[] = [];

      for (const item of data.items ?? []) {
        if (results.length >= limit) break;
        if (!item.title || !item.link) continue;
        results.push({ title: item.title, link: item.link, snippet: item.snippet ?? '' });
      }

      return results;
    } catch (error) {
      console.warn(`[google-cse] Search failed: ${describeError(error)}`);
      return [];
    }
  }
}
