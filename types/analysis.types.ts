import { EvidenceProviderName, EvidenceRecord } from './evidence.types.js';

export const CONFIDENCE_LEVELS = ['High', 'Medium', 'Low'] as const;

export type Confidence = (typeof CONFIDENCE_LEVELS)[number];

export type KnownVerdict =
  | 'Likely True'
  | 'Likely False'
  | 'Uncertain'
  | 'Mixed Evidence'
  | 'Analysis Failed';

// Models occasionally answer with their own wording, so the set stays open.
export type Verdict = KnownVerdict | (string & {});

export interface AnalysisRecord {
  credibility_score: number;
  verdict: Verdict;
  confidence: Confidence;
  explanation: string;
  key_findings: string[];
  red_flags: string[];
  supporting_evidence: string[];
}

export interface InvestigationRequest {
  claim: string;
  maxResults?: number;
}

export interface CompletedInvestigation {
  status: 'completed';
  id: string;
  claim: string;
  provider: EvidenceProviderName;
  evidence: EvidenceRecord[];
  analysis: AnalysisRecord;
}

export interface RejectedInvestigation {
  status: 'rejected';
  claim: string;
  reason: string;
}

export type InvestigationResult = CompletedInvestigation | RejectedInvestigation;
