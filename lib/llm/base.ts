import pLimit from 'p-limit';
import type { ChatMessage } from '@/lib/types';

export type LLMRequest = {
  messages: ChatMessage[];
  model?: string;
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
};

export type LLMResponse<T = string> = { ok: true; data: T } | { ok: false; error: string };

export interface LLMClient {
  name: string;
  chat(req: LLMRequest): Promise<LLMResponse>;
}

const limiters = new Map<string, ReturnType<typeof pLimit>>();

// One limiter per client name; the first caller fixes its size.
export function limiterFor(name: string, concurrency: number) {
  let limit = limiters.get(name);
  if (!limit) {
    limit = pLimit(Math.max(1, Math.min(8, concurrency)));
    limiters.set(name, limit);
  }
  return limit;
}
