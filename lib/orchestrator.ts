import {
  CompletedInvestigation,
  InvestigationRequest,
  InvestigationResult,
} from '../types/analysis.types.js';
import { EvidenceGathererService } from '../services/evidence-gatherer.service.js';
import { ClaimAnalyzerService } from '../services/claim-analyzer.service.js';
import { ValidationUtils, INVALID_CLAIM_MESSAGE } from '../utils/validation.utils.js';
import { CryptoUtils } from '../utils/crypto.utils.js';
import { AppConfig, requireOpenAiApiKey } from './config.js';
import { LlmClient } from './llm-client.js';
import { PageClient } from '../services/web-scraper.service.js';

export interface OrchestratorDependencies {
  llm?: LlmClient;
  pageClient?: PageClient;
}

/**
 * Runs one claim through validate → gather evidence → analyze.
 * Nothing here is retried; each stage has its own fallback.
 */
export class InvestigationOrchestrator {
  constructor(
    private gatherer: EvidenceGathererService,
    private analyzer: ClaimAnalyzerService,
    private defaultMaxResults: number = 5
  ) {}

  /** Throws ConfigurationError before any request is made when the model key is missing. */
  static fromConfig(config: AppConfig, deps: OrchestratorDependencies = {}): InvestigationOrchestrator {
    if (!deps.llm) requireOpenAiApiKey(config);

    return new InvestigationOrchestrator(
      EvidenceGathererService.fromConfig(config, deps.pageClient),
      ClaimAnalyzerService.fromConfig(config, deps.llm),
      config.maxSearchResults
    );
  }

  validate(claim: unknown): boolean {
    return ValidationUtils.validateClaim(claim);
  }

  get maxResults(): number {
    return this.defaultMaxResults;
  }

  get evidenceGatherer(): EvidenceGathererService {
    return this.gatherer;
  }

  get claimAnalyzer(): ClaimAnalyzerService {
    return this.analyzer;
  }

  async investigate(request: InvestigationRequest): Promise<InvestigationResult> {
    const { claim } = request;

    if (!this.validate(claim)) {
      return { status: 'rejected', claim, reason: INVALID_CLAIM_MESSAGE };
    }

    const id = CryptoUtils.generateInvestigationId();
    const normalizedClaim = claim.trim();
    const maxResults = request.maxResults ?? this.defaultMaxResults;

    console.error(`[${id}] Searching for evidence (up to ${maxResults} results)...`);
    const { provider, evidence } = await this.gatherer.gather(normalizedClaim, maxResults);
    console.error(`[${id}] ${evidence.length} evidence records from ${provider}`);

    console.error(`[${id}] Analyzing credibility...`);
    const analysis = await this.analyzer.analyze(normalizedClaim, evidence);
    console.error(`[${id}] Verdict: ${analysis.verdict} (${analysis.credibility_score}/10)`);

    const result: CompletedInvestigation = {
      status: 'completed',
      id,
      claim: normalizedClaim,
      provider,
      evidence,
      analysis,
    };
    return result;
  }
}
