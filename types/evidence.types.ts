export interface EvidenceRecord {
  readonly title: string;
  readonly link: string;
  readonly snippet: string;
}

export type EvidenceProviderName =
  | 'google-cse'
  | 'google-html'
  | 'duckduckgo-html'
  | 'placeholder';

export interface SearchProvider {
  readonly name: EvidenceProviderName;
  search(query: string, limit: number): Promise<EvidenceRecord[]>;
}

export interface EvidenceGatherResult {
  provider: EvidenceProviderName;
  evidence: EvidenceRecord[];
}
