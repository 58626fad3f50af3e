import { z } from 'zod';
import { ConfigError } from '@/lib/errors';

export type ChainGates = {
  minTopics: number;
  minOutlineSections: number;
  minContentWords: number;
};

export type AppConfig = {
  apiKey?: string;
  baseURL: string;
  model: string;
  temperature: number;
  maxTokens?: number;
  concurrency: number;
  gates: ChainGates;
};

export const DEFAULT_GATES: ChainGates = {
  minTopics: 3,
  minOutlineSections: 3,
  minContentWords: 300,
};

// unset and blank env vars both fall back to the default
const blankAsUndefined = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);
const optional = <T extends z.ZodTypeAny>(schema: T) => z.preprocess(blankAsUndefined, schema);
const count = (min: number, max: number, fallback: number) =>
  optional(z.coerce.number().int().min(min).max(max).default(fallback));

const EnvSchema = z.object({
  OPENAI_API_KEY: optional(z.string().trim().optional()),
  OPEN_AI_API_KEY: optional(z.string().trim().optional()),
  OPENAI_BASE_URL: optional(z.string().trim().url().default('https://api.openai.com/v1')),
  CHAIN_MODEL: optional(z.string().trim().min(1).default('gpt-4o-mini')),
  CHAIN_TEMPERATURE: optional(z.coerce.number().min(0).max(2).default(0.7)),
  CHAIN_MAX_TOKENS: optional(z.coerce.number().int().positive().optional()),
  LLM_CONCURRENCY: count(1, 8, 2),
  CHAIN_MIN_TOPICS: count(1, 50, DEFAULT_GATES.minTopics),
  CHAIN_MIN_OUTLINE_SECTIONS: count(1, 50, DEFAULT_GATES.minOutlineSections),
  CHAIN_MIN_CONTENT_WORDS: count(0, 100_000, DEFAULT_GATES.minContentWords),
});

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`));
  }
  const e = parsed.data;
  return {
    apiKey: e.OPENAI_API_KEY || e.OPEN_AI_API_KEY || undefined,
    baseURL: e.OPENAI_BASE_URL,
    model: e.CHAIN_MODEL,
    temperature: e.CHAIN_TEMPERATURE,
    maxTokens: e.CHAIN_MAX_TOKENS,
    concurrency: e.LLM_CONCURRENCY,
    gates: {
      minTopics: e.CHAIN_MIN_TOPICS,
      minOutlineSections: e.CHAIN_MIN_OUTLINE_SECTIONS,
      minContentWords: e.CHAIN_MIN_CONTENT_WORDS,
    },
  };
}

let _config: AppConfig | undefined;

export function getConfig(): AppConfig {
  if (!_config) _config = loadConfig();
  return _config;
}

export function resetConfig() {
  _config = undefined;
}
