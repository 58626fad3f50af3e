// @vitest-environment jsdom
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { cleanup, fireEvent, render, screen, waitFor } from '@testing-library/react';
import type { ReactNode } from 'react';
import Home from '@/app/page';
import { STORAGE_KEY, loadStoredResult, saveStoredResult } from '@/lib/client/storage';
import { CHAIN_STEPS, type ChainResult, type ChainStepState, type ChainStreamEvent } from '@/lib/types';

vi.mock('next/dynamic', () => ({
  default: () =>
    function FlowStub({ children }: { children?: ReactNode }) {
      return <div>{children}</div>;
    },
}));

vi.mock('react-markdown', () => ({
  default: function MarkdownStub({ children }: { children?: string }) {
    return <div data-testid="markdown">{children}</div>;
  },
}));

const request = { domain: 'gardening', audience: 'beginners' };
const result: ChainResult = {
  topic: 'Raised beds',
  topics: '1. Raised beds\n2. Composting\n3. Watering',
  outline: 'Intro\n  why\nBeds\n  how\nWrap-up\n  next',
  content: 'Draft post.',
  polishedContent: 'Polished post.',
};

const running: ChainStreamEvent = {
  type: 'update',
  run: { id: 'run-1', steps: [{ step: 'topics', status: 'running', startedAt: 1 }] },
};
const done: ChainStreamEvent = {
  type: 'done',
  run: { id: 'run-1', steps: CHAIN_STEPS.map((step): ChainStepState => ({ step, status: 'done' })), result },
  result,
};

function ndjson(events: ChainStreamEvent[]): Response {
  return new Response(events.map((e) => `${JSON.stringify(e)}\n`).join(''), {
    headers: { 'Content-Type': 'application/x-ndjson' },
  });
}

function submit() {
  fireEvent.change(screen.getByLabelText('Domain'), { target: { value: request.domain } });
  fireEvent.change(screen.getByLabelText('Target audience'), { target: { value: request.audience } });
  fireEvent.click(screen.getByRole('button', { name: 'Generate' }));
}

describe('Home page', () => {
  beforeEach(() => {
    window.localStorage.clear();
  });

  afterEach(() => {
    cleanup();
    vi.unstubAllGlobals();
  });

  it('saves the result once the stream is done', async () => {
    const fetchMock = vi.fn(async () => ndjson([running, done]));
    vi.stubGlobal('fetch', fetchMock);
    render(<Home />);

    submit();

    expect(await screen.findByText('Polished post.')).toBeTruthy();
    expect(screen.getByText('Raised beds')).toBeTruthy();
    expect(fetchMock).toHaveBeenCalledWith('/api/chain/stream', expect.objectContaining({ method: 'POST', body: JSON.stringify(request) }));
    expect(loadStoredResult(window.localStorage)).toMatchObject({ request, result });
  });

  it('stores nothing when the stream reports an error', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => ndjson([running, { type: 'error', step: 'outline', message: 'generation failed' }])),
    );
    render(<Home />);

    submit();

    expect((await screen.findByRole('alert')).textContent).toBe('Generation failed at the Outline step');
    expect(window.localStorage.getItem(STORAGE_KEY)).toBeNull();
  });

  it('stores nothing when the run is stopped', async () => {
    const fetchMock = vi.fn(async (_url: string, init: RequestInit) => {
      const body = new ReadableStream<Uint8Array>({
        start(controller) {
          controller.enqueue(new TextEncoder().encode(`${JSON.stringify(running)}\n`));
          init.signal?.addEventListener('abort', () => controller.error(new Error('aborted')));
        },
      });
      return new Response(body);
    });
    vi.stubGlobal('fetch', fetchMock);
    render(<Home />);

    submit();
    await waitFor(() => expect(fetchMock).toHaveBeenCalledTimes(1));
    fireEvent.click(screen.getByRole('button', { name: 'Stop' }));

    expect(await screen.findByText(/Run cancelled/)).toBeTruthy();
    expect(screen.queryByRole('alert')).toBeNull();
    expect(window.localStorage.getItem(STORAGE_KEY)).toBeNull();
  });

  it('restores the saved request and result on mount', async () => {
    saveStoredResult(window.localStorage, request, result, 1_700_000_000_000);

    render(<Home />);

    expect(await screen.findByText('Polished post.')).toBeTruthy();
    expect(screen.getByLabelText('Domain')).toHaveProperty('value', 'gardening');
    expect(screen.getByLabelText('Target audience')).toHaveProperty('value', 'beginners');
    expect(screen.getByText('Raised beds')).toBeTruthy();
    expect(screen.getByRole('button', { name: 'Clear saved result' })).toBeTruthy();
  });

  it('still renders when storage access throws', async () => {
    vi.spyOn(Storage.prototype, 'getItem').mockImplementation(() => {
      throw new Error('storage denied');
    });

    render(<Home />);

    expect(await screen.findByText(/Could not read the saved result: storage denied/)).toBeTruthy();
    expect(screen.getByRole('button', { name: 'Generate' })).toHaveProperty('disabled', true);
  });

  it('clears the saved result on request', async () => {
    saveStoredResult(window.localStorage, request, result, 1_700_000_000_000);
    render(<Home />);

    fireEvent.click(await screen.findByRole('button', { name: 'Clear saved result' }));

    expect(window.localStorage.getItem(STORAGE_KEY)).toBeNull();
    expect(screen.queryByRole('button', { name: 'Clear saved result' })).toBeNull();
  });
});
