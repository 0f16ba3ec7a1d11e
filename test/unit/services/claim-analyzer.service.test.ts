import { beforeEach, describe, expect, it, vi } from "vitest";
import { ClaimAnalyzerService } from "../../../services/claim-analyzer.service.js";
import { SYSTEM_PROMPT } from "../../../lib/analysis-prompts.js";
import { createLlm, sampleEvidence } from "../../helpers/fakes.js";

const CLAIM = "Water boils at 100 degrees Celsius at sea level";
const OPTIONS = { maxTokens: 1000, temperature: 0.3 };

describe("ClaimAnalyzerService", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  it("sends one system and one user message with the configured limits", async () => {
    const llm = createLlm(async () => '{"credibility_score": 9}');
    await new ClaimAnalyzerService(llm, OPTIONS).analyze(CLAIM, sampleEvidence);

    expect(llm.complete).toHaveBeenCalledTimes(1);
    const [messages, options] = llm.complete.mock.calls[0];
    expect(options).toEqual({ maxOutputTokens: 1000, temperature: 0.3 });
    expect(messages).toHaveLength(2);
    expect(messages[0]).toEqual({ role: "system", content: SYSTEM_PROMPT });
    expect(messages[1].role).toBe("user");
    expect(messages[1].content).toContain(`CLAIM: ${CLAIM}`);
    expect(messages[1].content).toContain(
      "Source 2: Altitude and cooking\nURL: https://example.org/altitude\nSummary: Water boils at lower temperatures at high altitude.\n"
    );
  });

  it("parses a fenced JSON answer", async () => {
    const llm = createLlm(
      async () =>
        '```json\n{"credibility_score": 8, "verdict": "Likely True", "confidence": "High", "explanation": "Textbook physics.", "key_findings": ["Pressure dependent"]}\n```'
    );

    const analysis = await new ClaimAnalyzerService(llm, OPTIONS).analyze(CLAIM, sampleEvidence);

    expect(analysis).toEqual({
      credibility_score: 8,
      verdict: "Likely True",
      confidence: "High",
      explanation: "Textbook physics.",
      key_findings: ["Pressure dependent"],
      red_flags: [],
      supporting_evidence: [],
    });
  });

  it("keeps prose answers as the explanation", async () => {
    const text = "I think this is probably true because...";
    const analysis = await new ClaimAnalyzerService(createLlm(async () => text), OPTIONS).analyze(CLAIM, sampleEvidence);

    expect(analysis.credibility_score).toBe(5);
    expect(analysis.verdict).toBe("Uncertain");
    expect(analysis.confidence).toBe("Medium");
    expect(analysis.explanation).toBe(text);
  });

  it("returns a failed analysis when the model call throws", async () => {
    const llm = createLlm(async () => {
      throw new Error("401 Incorrect API key provided");
    });

    const analysis = await new ClaimAnalyzerService(llm, OPTIONS).analyze(CLAIM, sampleEvidence);

    expect(analysis).toEqual({
      credibility_score: 0,
      verdict: "Analysis Failed",
      confidence: "Low",
      explanation: "Could not complete analysis: 401 Incorrect API key provided",
      key_findings: [],
      red_flags: [],
      supporting_evidence: [],
    });
  });

  it("returns every field even without evidence", async () => {
    const analysis = await new ClaimAnalyzerService(createLlm(async () => "{}"), OPTIONS).analyze(CLAIM, []);

    expect(Object.keys(analysis).sort()).toEqual([
      "confidence",
      "credibility_score",
      "explanation",
      "key_findings",
      "red_flags",
      "supporting_evidence",
      "verdict",
    ]);
  });
});
