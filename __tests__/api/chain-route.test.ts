import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { NextRequest } from 'next/server';
import { POST } from '@/app/api/chain/route';
import { resetConfig } from '@/lib/config';

const mockFetch = vi.fn();
vi.stubGlobal('fetch', mockFetch);

const TOPICS = '1. Raised beds\n2. Composting\n3. Watering';
const OUTLINE = 'Intro\n  why\nBeds\n  how\nWrap-up\n  next';
const DRAFT = 'A raised bed warms up early in spring.';
const POLISHED = 'A raised bed warms up early each spring.';

function completion(content: string) {
  return new Response(JSON.stringify({ choices: [{ message: { content } }] }), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
  });
}

function makeRequest(body: unknown): NextRequest {
  return new NextRequest('http://localhost/api/chain', {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: typeof body === 'string' ? body : JSON.stringify(body),
  });
}

describe('POST /api/chain', () => {
  beforeEach(() => {
    mockFetch.mockReset();
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'info').mockImplementation(() => {});
    vi.stubEnv('OPENAI_API_KEY', 'test-key');
    vi.stubEnv('OPEN_AI_API_KEY', '');
    vi.stubEnv('OPENAI_BASE_URL', 'https://llm.test/v1');
    vi.stubEnv('LLM_CONCURRENCY', '');
    vi.stubEnv('CHAIN_MIN_CONTENT_WORDS', '5');
    resetConfig();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    resetConfig();
  });

  it('returns all four fields after four model calls', async () => {
    mockFetch
      .mockResolvedValueOnce(completion(TOPICS))
      .mockResolvedValueOnce(completion(OUTLINE))
      .mockResolvedValueOnce(completion(DRAFT))
      .mockResolvedValueOnce(completion(POLISHED));

    const res = await POST(makeRequest({ domain: 'gardening', audience: 'beginners' }));
    const json = await res.json();

    expect(res.status).toBe(200);
    expect(json.ok).toBe(true);
    expect(typeof json.runId).toBe('string');
    expect(json.result).toEqual({ topic: 'Raised beds', topics: TOPICS, outline: OUTLINE, content: DRAFT, polishedContent: POLISHED });
    expect(mockFetch).toHaveBeenCalledTimes(4);
    expect(mockFetch.mock.calls[0][0]).toBe('https://llm.test/v1/chat/completions');
  });

  it('rejects a request missing the audience', async () => {
    const res = await POST(makeRequest({ domain: 'gardening' }));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ ok: false, error: 'invalid request' });
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('rejects blank fields', async () => {
    const res = await POST(makeRequest({ domain: '   ', audience: 'beginners' }));
    expect(res.status).toBe(400);
  });

  it('rejects a body that is not JSON', async () => {
    const res = await POST(makeRequest('domain=gardening'));
    expect(res.status).toBe(400);
  });

  it('returns a generic failure naming the step when a call fails', async () => {
    mockFetch
      .mockResolvedValueOnce(completion(TOPICS))
      .mockResolvedValueOnce(new Response('upstream down', { status: 503 }));

    const res = await POST(makeRequest({ domain: 'gardening', audience: 'beginners' }));

    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({ ok: false, error: 'generation failed', step: 'outline' });
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it('fails at the first step without a key', async () => {
    vi.stubEnv('OPENAI_API_KEY', '');
    resetConfig();

    const res = await POST(makeRequest({ domain: 'gardening', audience: 'beginners' }));

    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({ ok: false, error: 'generation failed', step: 'topics' });
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('reports invalid configuration', async () => {
    vi.stubEnv('LLM_CONCURRENCY', '99');
    resetConfig();

    const res = await POST(makeRequest({ domain: 'gardening', audience: 'beginners' }));

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ ok: false, error: 'server misconfigured' });
  });
});
