import { AnalysisRecord } from '../types/analysis.types.js';
import { EvidenceRecord } from '../types/evidence.types.js';
import { AppConfig } from '../lib/config.js';
import { describeError } from '../lib/errors.js';
import { LlmClient, OpenAiLlmClient } from '../lib/llm-client.js';
import { SYSTEM_PROMPT, buildAnalysisPrompt, buildEvidenceContext } from '../lib/analysis-prompts.js';
import { buildFailedAnalysis, parseAnalysis } from '../lib/analysis-parser.js';

export interface ClaimAnalyzerOptions {
  maxTokens: number;
  temperature: number;
}

export class ClaimAnalyzerService {
  constructor(
    private llm: LlmClient,
    private options: ClaimAnalyzerOptions
  ) {}

  static fromConfig(config: AppConfig, llm?: LlmClient): ClaimAnalyzerService {
    return new ClaimAnalyzerService(llm ?? OpenAiLlmClient.fromConfig(config), {
      maxTokens: config.maxTokens,
      temperature: config.temperature,
    });
  }

  async analyze(claim: string, evidence: readonly EvidenceRecord[]): Promise<AnalysisRecord> {
    try {
      const prompt = buildAnalysisPrompt(claim, buildEvidenceContext(evidence));
      const text = await this.llm.complete(
        [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: prompt },
        ],
        { maxOutputTokens: this.options.maxTokens, temperature: this.options.temperature }
      );
      return parseAnalysis(text);
    } catch (error) {
      console.error(`[analyzer] Analysis with ${this.llm.modelName} failed:`, error);
      return buildFailedAnalysis(describeError(error));
    }
  }
}
