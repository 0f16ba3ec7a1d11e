import { CompletedInvestigation } from '../types/analysis.types.js';

export type ScoreBand = 'high' | 'moderate' | 'low';
export type VerdictTone = 'positive' | 'neutral' | 'negative';

export function scoreBand(score: number): ScoreBand {
  if (score >= 7) return 'high';
  if (score >= 4) return 'moderate';
  return 'low';
}

export function verdictTone(verdict: string): VerdictTone {
  const lower = verdict.toLowerCase();
  if (lower.includes('likely true') || lower.includes('credible')) return 'positive';
  if (lower.includes('uncertain') || lower.includes('mixed')) return 'neutral';
  return 'negative';
}

function bulletSection(heading: string, items: string[]): string[] {
  if (items.length === 0) return [];
  return ['', `**${heading}:**`, ...items.map((item) => `- ${item}`)];
}

/** Markdown summary for clients that only render text content. */
export function formatInvestigationReport(investigation: CompletedInvestigation): string {
  const { analysis, evidence } = investigation;

  const lines = [
    `## Claim: ${investigation.claim}`,
    '',
    `- Credibility score: ${analysis.credibility_score}/10 (${scoreBand(analysis.credibility_score)})`,
    `- Verdict: ${analysis.verdict} (${verdictTone(analysis.verdict)})`,
    `- Confidence: ${analysis.confidence}`,
    ...bulletSection('Key Findings', analysis.key_findings),
    '',
    '**Analysis:**',
    analysis.explanation,
    ...bulletSection('Red Flags', analysis.red_flags),
    ...bulletSection('Supporting Evidence', analysis.supporting_evidence),
    '',
    `**Sources (${investigation.provider}):**`,
    ...evidence.map((item, index) => `${index + 1}. [${item.title}](${item.link})`),
  ];

  return lines.join('\n');
}
