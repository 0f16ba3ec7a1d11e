import { z } from 'zod';
import { CallToolResult, ErrorCode, Tool } from "@modelcontextprotocol/sdk/types.js";
import { BaseServer, ToolArguments } from '../../base/BaseServer.js';
import { InvestigationOrchestrator } from '../../lib/orchestrator.js';
import { formatInvestigationReport } from '../../lib/report.js';

const maxResultsSchema = z.number().int().min(1).max(10).optional();

const checkClaimArgs = z.object({
  claim: z.string(),
  max_results: maxResultsSchema,
});

const searchEvidenceArgs = z.object({
  query: z.string().trim().min(1),
  max_results: maxResultsSchema,
});

const analyzeClaimArgs = z.object({
  claim: z.string().trim().min(1),
  evidence: z.array(
    z.object({
      title: z.string(),
      link: z.string(),
      snippet: z.string(),
    })
  ),
});

const validateClaimArgs = z.object({
  claim: z.string(),
});

const maxResultsProperty = {
  type: "integer",
  description: "Maximum number of evidence records to gather (1-10)",
  minimum: 1,
  maximum: 10,
};

export class FactCheckServer extends BaseServer {
  constructor(private orchestrator: InvestigationOrchestrator) {
    super(
      "claim-credibility-mcp",
      "1.0.0",
      "Checks the credibility of factual claims against web evidence. Use check_claim for the full pipeline."
    );
  }

  protected getTools(): Tool[] {
    return [
      {
        name: "check_claim",
        description: "Gather web evidence about a claim and return an AI credibility analysis",
        inputSchema: {
          type: "object",
          properties: {
            claim: {
              type: "string",
              description: "The news headline or claim to verify",
            },
            max_results: maxResultsProperty,
          },
          required: ["claim"],
        },
      },
      {
        name: "search_evidence",
        description: "Search the web for evidence about a query, falling back through several providers",
        inputSchema: {
          type: "object",
          properties: {
            query: {
              type: "string",
              description: "Search query",
            },
            max_results: maxResultsProperty,
          },
          required: ["query"],
        },
      },
      {
        name: "analyze_claim",
        description: "Analyze a claim against evidence you already have",
        inputSchema: {
          type: "object",
          properties: {
            claim: {
              type: "string",
              description: "The claim to analyze",
            },
            evidence: {
              type: "array",
              description: "Evidence records in priority order",
              items: {
                type: "object",
                properties: {
                  title: { type: "string" },
                  link: { type: "string" },
                  snippet: { type: "string" },
                },
                required: ["title", "link", "snippet"],
              },
            },
          },
          required: ["claim", "evidence"],
        },
      },
      {
        name: "validate_claim",
        description: "Check whether a claim is long and meaningful enough to analyze",
        inputSchema: {
          type: "object",
          properties: {
            claim: {
              type: "string",
              description: "The claim to check",
            },
          },
          required: ["claim"],
        },
      },
    ];
  }

  protected async handleToolCall(name: string, args: ToolArguments): Promise<CallToolResult> {
    switch (name) {
      case "check_claim":
        return await this.handleCheckClaim(args);
      case "search_evidence":
        return await this.handleSearchEvidence(args);
      case "analyze_claim":
        return await this.handleAnalyzeClaim(args);
      case "validate_claim":
        return this.handleValidateClaim(args);
      default:
        this.throwMcpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
    }
  }

  private parseArgs<S extends z.ZodTypeAny>(schema: S, args: ToolArguments, tool: string): z.infer<S> {
    const parsed = schema.safeParse(args ?? {});
    if (!parsed.success) {
      const details = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'arguments'}: ${issue.message}`);
      this.throwMcpError(ErrorCode.InvalidParams, `Invalid arguments for ${tool}: ${details.join('; ')}`);
    }
    return parsed.data;
  }

  private async handleCheckClaim(args: ToolArguments): Promise<CallToolResult> {
    const { claim, max_results } = this.parseArgs(checkClaimArgs, args, "check_claim");

    const result = await this.orchestrator.investigate({ claim, maxResults: max_results });
    if (result.status === 'rejected') {
      return this.textResult([result.reason], true);
    }

    return this.textResult([formatInvestigationReport(result), JSON.stringify(result, null, 2)]);
  }

  private async handleSearchEvidence(args: ToolArguments): Promise<CallToolResult> {
    const { query, max_results } = this.parseArgs(searchEvidenceArgs, args, "search_evidence");

    const { provider, evidence } = await this.orchestrator.evidenceGatherer.gather(
      query,
      max_results ?? this.orchestrator.maxResults
    );
    return this.textResult([JSON.stringify({ query, provider, results: evidence }, null, 2)]);
  }

  private async handleAnalyzeClaim(args: ToolArguments): Promise<CallToolResult> {
    const { claim, evidence } = this.parseArgs(analyzeClaimArgs, args, "analyze_claim");

    const analysis = await this.orchestrator.claimAnalyzer.analyze(claim, evidence);
    return this.textResult([JSON.stringify(analysis, null, 2)]);
  }

  private handleValidateClaim(args: ToolArguments): CallToolResult {
    const { claim } = this.parseArgs(validateClaimArgs, args, "validate_claim");
    return this.textResult([JSON.stringify({ claim, valid: this.orchestrator.validate(claim) })]);
  }
}
