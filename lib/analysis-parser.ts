/**
 * Turns free-form model output into an AnalysisRecord.
 *
 * Models wrap their JSON in Markdown fences, prepend prose, or skip the
 * JSON entirely. Extraction and normalization are kept apart so the
 * normalizer can be fed any decoded value.
 */

import { z } from 'zod';
import { AnalysisRecord, CONFIDENCE_LEVELS } from '../types/analysis.types.js';

const DEFAULT_SCORE = 5;
export const MIN_SCORE = 0;
export const MAX_SCORE = 10;

export const ANALYSIS_DEFAULTS: Readonly<AnalysisRecord> = Object.freeze({
  credibility_score: DEFAULT_SCORE,
  verdict: 'Uncertain',
  confidence: 'Medium',
  explanation: 'Analysis could not be completed',
  key_findings: [],
  red_flags: [],
  supporting_evidence: [],
});

const JSON_FENCE = '```json';
const FENCE = '```';

export function extractJsonCandidate(text: string): string {
  const fenceStart = text.indexOf(JSON_FENCE);
  if (fenceStart >= 0) {
    const start = fenceStart + JSON_FENCE.length;
    const end = text.indexOf(FENCE, start);
    return text.slice(start, end >= 0 ? end : undefined).trim();
  }

  if (text.includes('{') && text.includes('}')) {
    return text.slice(text.indexOf('{'), text.lastIndexOf('}') + 1);
  }

  return text;
}

export function clampScore(score: number): number {
  return Math.max(MIN_SCORE, Math.min(MAX_SCORE, Math.round(score)));
}

const scoreSchema = z
  .union([
    z.number().finite(),
    z
      .string()
      .regex(/^\s*[+-]?\d+\s*$/)
      .transform((value) => Number.parseInt(value, 10)),
  ])
  .transform(clampScore)
  .catch(DEFAULT_SCORE);

const confidenceSchema = z
  .preprocess(
    (value) =>
      typeof value === 'string'
        ? CONFIDENCE_LEVELS.find((level) => level.toLowerCase() === value.trim().toLowerCase())
        : value,
    z.enum(CONFIDENCE_LEVELS)
  )
  .catch(ANALYSIS_DEFAULTS.confidence);

const textField = (fallback: string) => z.string().catch(fallback);

const stringList = z
  .array(z.unknown())
  .transform((items) => items.filter((item): item is string => typeof item === 'string'))
  .catch(() => []);

const analysisSchema = z.object({
  credibility_score: scoreSchema,
  verdict: textField(ANALYSIS_DEFAULTS.verdict),
  confidence: confidenceSchema,
  explanation: textField(ANALYSIS_DEFAULTS.explanation),
  key_findings: stringList,
  red_flags: stringList,
  supporting_evidence: stringList,
});

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Fills every missing or malformed field with its default. */
export function normalizeAnalysis(raw: Record<string, unknown>): AnalysisRecord {
  return analysisSchema.parse(raw);
}

export function buildUnparsedAnalysis(text: string): AnalysisRecord {
  return {
    credibility_score: DEFAULT_SCORE,
    verdict: 'Uncertain',
    confidence: 'Medium',
    explanation: text,
    key_findings: [],
    red_flags: [],
    supporting_evidence: [],
  };
}

export function buildFailedAnalysis(reason: string): AnalysisRecord {
  return {
    credibility_score: 0,
    verdict: 'Analysis Failed',
    confidence: 'Low',
    explanation: `Could not complete analysis: ${reason}`,
    key_findings: [],
    red_flags: [],
    supporting_evidence: [],
  };
}

export function parseAnalysis(text: string): AnalysisRecord {
  let decoded: unknown;
  try {
    decoded = JSON.parse(extractJsonCandidate(text));
  } catch {
    return buildUnparsedAnalysis(text);
  }

  // Bare JSON scalars or arrays carry no fields to keep; treat them like prose.
  if (!isPlainObject(decoded)) {
    return buildUnparsedAnalysis(text);
  }

  return normalizeAnalysis(decoded);
}
