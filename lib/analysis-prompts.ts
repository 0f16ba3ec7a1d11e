import { EvidenceRecord } from '../types/evidence.types.js';

export const SYSTEM_PROMPT = `You are a fact-checking assistant that analyzes news claims for credibility.
Your task is to evaluate claims based on available evidence and provide a structured analysis.
Be objective, thorough, and base your assessment on the information provided.
Always respond with a JSON object containing the analysis.`;

export function buildEvidenceContext(evidence: readonly EvidenceRecord[]): string {
  return evidence
    .map((item, index) => `Source ${index + 1}: ${item.title}\nURL: ${item.link}\nSummary: ${item.snippet}\n`)
    .join('\n');
}

export function buildAnalysisPrompt(claim: string, context: string): string {
  return `Analyze the following claim for credibility based on the search results provided.

CLAIM: ${claim}

SEARCH RESULTS:
${context}

Please provide your analysis as a JSON object with the following structure:
{
    "credibility_score": <integer from 0-10>,
    "verdict": "<Likely True/Likely False/Uncertain/Mixed Evidence>",
    "confidence": "<High/Medium/Low>",
    "explanation": "<detailed explanation of your analysis>",
    "key_findings": ["<finding 1>", "<finding 2>", ...],
    "red_flags": ["<red flag 1>", "<red flag 2>", ...],
    "supporting_evidence": ["<evidence 1>", "<evidence 2>", ...]
}

Consider:
- Consistency across sources
- Source credibility
- Presence of factual information vs opinion
- Any obvious signs of misinformation
- Date and relevance of information`;
}
