import { z } from 'zod';
import type { AppConfig } from '@/lib/config';
import { errorMessage } from '@/lib/errors';
import { limiterFor, type LLMClient, type LLMRequest, type LLMResponse } from './base';

// OpenAI-compatible HTTP call helper
export type CompatBase = {
  baseURL: string;
  apiKey?: string;
};

const ApiErrorBody = z.object({ error: z.object({ message: z.string() }) });
const CompletionBody = z.object({
  choices: z.array(z.object({ message: z.object({ content: z.string() }) })).min(1),
});

export async function openaiCompatCall(compat: CompatBase, req: LLMRequest): Promise<LLMResponse> {
  const { baseURL, apiKey } = compat;
  if (!apiKey) return { ok: false, error: 'Missing API key' };
  try {
    const resp = await fetch(`${baseURL.replace(/\/$/, '')}/chat/completions`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${apiKey}`,
      },
      body: JSON.stringify({
        model: req.model,
        messages: req.messages,
        temperature: req.temperature,
        max_tokens: req.maxTokens,
      }),
      signal: req.signal,
    });
    if (!resp.ok) {
      const text = await resp.text().catch(() => '');
      return { ok: false, error: `HTTP ${resp.status}: ${text.slice(0, 500)}` };
    }
    let body: unknown;
    try {
      body = await resp.json();
    } catch {
      return { ok: false, error: 'Malformed response' };
    }
    const apiError = ApiErrorBody.safeParse(body);
    if (apiError.success) return { ok: false, error: apiError.data.error.message };
    const completion = CompletionBody.safeParse(body);
    if (!completion.success) return { ok: false, error: 'Malformed response' };
    const content = completion.data.choices[0].message.content;
    if (content.trim().length === 0) return { ok: false, error: 'Empty completion' };
    return { ok: true, data: content };
  } catch (e) {
    return { ok: false, error: errorMessage(e) };
  }
}

export function createOpenAIClient(cfg: AppConfig): LLMClient {
  const compat: CompatBase = { baseURL: cfg.baseURL, apiKey: cfg.apiKey };
  return {
    name: 'openai',
    chat(req) {
      const full: LLMRequest = {
        ...req,
        model: req.model || cfg.model,
        temperature: req.temperature ?? cfg.temperature,
        maxTokens: req.maxTokens ?? cfg.maxTokens,
      };
      return limiterFor('openai', cfg.concurrency)(() => openaiCompatCall(compat, full));
    },
  };
}
