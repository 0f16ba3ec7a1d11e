import { EvidenceGatherResult, EvidenceRecord, SearchProvider } from '../types/evidence.types.js';
import { AppConfig } from '../lib/config.js';
import { describeError } from '../lib/errors.js';
import { PageClient, WebScraperService } from './web-scraper.service.js';
import { GoogleCustomSearchProvider } from './search-providers/google-cse.provider.js';
import { GoogleHtmlSearchProvider } from './search-providers/google-html.provider.js';
import { DuckDuckGoHtmlSearchProvider } from './search-providers/duckduckgo-html.provider.js';
import { PlaceholderEvidenceProvider } from './search-providers/placeholder.provider.js';

/**
 * Tries each provider in order and keeps the first non-empty answer.
 * Results are never merged across providers, and the placeholder provider
 * closes the chain so callers always get evidence back.
 */
export class EvidenceGathererService {
  constructor(
    private providers: SearchProvider[],
    private fallback: SearchProvider = new PlaceholderEvidenceProvider()
  ) {}

  static fromConfig(config: AppConfig, client?: PageClient): EvidenceGathererService {
    const scraper = client ?? new WebScraperService(config.userAgent, config.searchTimeoutSeconds * 1000);
    const providers: SearchProvider[] = [];

    if (config.googleApiKey && config.googleCseId) {
      providers.push(new GoogleCustomSearchProvider(scraper, config.googleApiKey, config.googleCseId));
    }
    providers.push(new GoogleHtmlSearchProvider(scraper), new DuckDuckGoHtmlSearchProvider(scraper));

    return new EvidenceGathererService(providers);
  }

  get providerNames(): string[] {
    return [...this.providers, this.fallback].map((provider) => provider.name);
  }

  async search(query: string, limit: number = 5): Promise<EvidenceRecord[]> {
    const { evidence } = await this.gather(query, limit);
    return evidence;
  }

  async gather(query: string, limit: number = 5): Promise<EvidenceGatherResult> {
    for (const provider of this.providers) {
      const evidence = await this.trySearch(provider, query, limit);
      if (evidence.length > 0) {
        return { provider: provider.name, evidence };
      }
    }

    console.warn(`[evidence] No search provider answered for "${query}", using placeholder evidence`);
    return { provider: this.fallback.name, evidence: await this.fallback.search(query, limit) };
  }

  private async trySearch(provider: SearchProvider, query: string, limit: number): Promise<EvidenceRecord[]> {
    try {
      return await provider.search(query, limit);
    } catch (error) {
      console.warn(`[evidence] ${provider.name} failed: ${describeError(error)}`);
      return [];
    }
  }
}
