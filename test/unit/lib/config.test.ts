import { describe, expect, it } from "vitest";
import {
  DEFAULT_USER_AGENT,
  hasCustomSearch,
  loadConfig,
  requireOpenAiApiKey,
} from "../../../lib/config.js";
import { ConfigurationError } from "../../../lib/errors.js";

describe("loadConfig", () => {
  it("applies defaults when nothing is set", () => {
    const config = loadConfig({});

    expect(config).toEqual({
      openAiApiKey: undefined,
      openAiBaseUrl: undefined,
      modelName: "gpt-5-nano",
      maxTokens: 1000,
      temperature: 0.3,
      googleApiKey: undefined,
      googleCseId: undefined,
      maxSearchResults: 5,
      searchTimeoutSeconds: 10,
      userAgent: DEFAULT_USER_AGENT,
    });
    expect(hasCustomSearch(config)).toBe(false);
  });

  it("reads values from the environment", () => {
    const config = loadConfig({
      OPENAI_API_KEY: "test-key",
      MODEL_NAME: "gpt-4o-mini",
      MAX_TOKENS: "1500",
      TEMPERATURE: "0.8",
      GOOGLE_API_KEY: "test-google",
      GOOGLE_CSE_ID: "test-cx",
      MAX_SEARCH_RESULTS: "3",
      SEARCH_TIMEOUT: "5",
    });

    expect(config.openAiApiKey).toBe("test-key");
    expect(config.modelName).toBe("gpt-4o-mini");
    expect(config.maxTokens).toBe(1500);
    expect(config.temperature).toBe(0.8);
    expect(config.maxSearchResults).toBe(3);
    expect(config.searchTimeoutSeconds).toBe(5);
    expect(hasCustomSearch(config)).toBe(true);
  });

  it("treats blank variables as unset", () => {
    const config = loadConfig({ OPENAI_API_KEY: "  ", MAX_TOKENS: "", GOOGLE_CSE_ID: "" });

    expect(config.openAiApiKey).toBeUndefined();
    expect(config.maxTokens).toBe(1000);
    expect(config.googleCseId).toBeUndefined();
  });

  it("needs both search credentials for custom search", () => {
    expect(hasCustomSearch(loadConfig({ GOOGLE_API_KEY: "test-google" }))).toBe(false);
  });

  it("reports every invalid variable", () => {
    try {
      loadConfig({ MAX_TOKENS: "lots", TEMPERATURE: "3" });
      expect.fail("loadConfig should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.variables).toEqual(["MAX_TOKENS", "TEMPERATURE"]);
        expect(error.message).toBe("Invalid configuration: MAX_TOKENS, TEMPERATURE");
      }
    }
  });

  it("rejects a result count above the search API page size", () => {
    expect(() => loadConfig({ MAX_SEARCH_RESULTS: "25" })).toThrow(ConfigurationError);
  });
});

describe("requireOpenAiApiKey", () => {
  it("returns the key when present", () => {
    expect(requireOpenAiApiKey(loadConfig({ OPENAI_API_KEY: "test-key" }))).toBe("test-key");
  });

  it("throws a configuration error when the key is missing", () => {
    expect(() => requireOpenAiApiKey(loadConfig({}))).toThrow(ConfigurationError);
    expect(() => requireOpenAiApiKey(loadConfig({}))).toThrow(/OPENAI_API_KEY is not set/);
  });
});
