import { describe, expect, it } from "vitest";
import { loadConfig } from "../config.js";

describe("loadConfig", () => {
  it("uses defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      port: 3000,
      metricsEnabled: false,
      dictionaryPath: undefined,
      strategy: "buffer",
      defaultMaxNgramSize: 3,
    });
  });

  it("reads every variable", () => {
    const cfg = loadConfig({
      PORT: "8080",
      METRICS_ENABLED: "1",
      DICTIONARY_PATH: " ./words.txt ",
      DICTIONARY_STRATEGY: "string",
      MAX_NGRAM_SIZE: "5",
    });
    expect(cfg).toEqual({
      port: 8080,
      metricsEnabled: true,
      dictionaryPath: "./words.txt",
      strategy: "string",
      defaultMaxNgramSize: 5,
    });
  });

  it("falls back on unusable numbers", () => {
    const cfg = loadConfig({ PORT: "abc", MAX_NGRAM_SIZE: "0", DICTIONARY_PATH: "  " });
    expect(cfg.port).toBe(3000);
    expect(cfg.defaultMaxNgramSize).toBe(3);
    expect(cfg.dictionaryPath).toBeUndefined();
  });

  it("rejects an unknown strategy", () => {
    expect(() => loadConfig({ DICTIONARY_STRATEGY: "trie" })).toThrow(/DICTIONARY_STRATEGY/);
  });
});
