import { EvidenceRecord, SearchProvider } from '../../types/evidence.types.js';

export function buildPlaceholderEvidence(query: string): EvidenceRecord[] {
  return [
    {
      title: `Search result 1 for: ${query}`,
      link: 'https://example.com/1',
      snippet: `This would contain information about ${query}. The actual search service is currently unavailable, but the analysis will still work based on the query.`,
    },
    {
      title: `Fact-check article about: ${query}`,
      link: 'https://example.com/2',
      snippet: `Various sources discuss ${query}. Unable to retrieve actual search results at this time.`,
    },
    {
      title: `News article related to: ${query}`,
      link: 'https://example.com/3',
      snippet: `Recent developments regarding ${query}. Search functionality limited but analysis can proceed.`,
    },
  ];
}

/** Terminal strategy: always answers, so analysis never waits on search. */
export class PlaceholderEvidenceProvider implements SearchProvider {
  readonly name = 'placeholder' as const;

  async search(query: string): Promise<EvidenceRecord[]> {
    return buildPlaceholderEvidence(query);
  }
}
