import { isDictionaryStrategy, type DictionaryStrategy } from "./core/types.js";

export interface AppConfig {
  port: number;
  metricsEnabled: boolean;
  /** corpus file; the dictionary is empty when unset */
  dictionaryPath?: string;
  strategy: DictionaryStrategy;
  defaultMaxNgramSize: number;
}

export const DEFAULT_PORT = 3000;
export const DEFAULT_MAX_NGRAM_SIZE = 3;

function intOr(raw: string | undefined, fallback: number, min: number, max: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  return Number.isInteger(n) && n >= min && n <= max ? n : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const strategy = env.DICTIONARY_STRATEGY ?? "buffer";
  if (!isDictionaryStrategy(strategy)) {
    throw new Error(`DICTIONARY_STRATEGY must be one of: buffer, string (got "${strategy}")`);
  }

  const dictionaryPath = env.DICTIONARY_PATH?.trim();

  return {
    port: intOr(env.PORT, DEFAULT_PORT, 0, 65535),
    metricsEnabled: env.METRICS_ENABLED === "1",
    dictionaryPath: dictionaryPath ? dictionaryPath : undefined,
    strategy,
    defaultMaxNgramSize: intOr(env.MAX_NGRAM_SIZE, DEFAULT_MAX_NGRAM_SIZE, 1, 64),
  };
}
