import { NextRequest } from 'next/server';
import { v4 as uuidv4 } from 'uuid';
import { getConfig, type AppConfig } from '@/lib/config';
import { ChainAbortedError, ChainStepError, errorMessage } from '@/lib/errors';
import { createOpenAIClient } from '@/lib/llm/openai';
import { logger } from '@/lib/logger';
import { runChain } from '@/lib/pipeline';
import type { ChainStreamEvent } from '@/lib/types';
import { ChainRequestSchema } from '@/lib/validation';

export const runtime = 'nodejs';

const NDJSON = { 'Content-Type': 'application/x-ndjson' };

function line(event: ChainStreamEvent) {
  return JSON.stringify(event) + '\n';
}

export async function POST(req: NextRequest) {
  const body: unknown = await req.json().catch(() => undefined);
  const parsed = ChainRequestSchema.safeParse(body);
  if (!parsed.success) {
    return new Response(line({ type: 'error', message: 'invalid request' }), { status: 400, headers: NDJSON });
  }

  let cfg: AppConfig;
  try {
    cfg = getConfig();
  } catch (e) {
    logger.error('configuration invalid', { error: errorMessage(e) });
    return new Response(line({ type: 'error', message: 'server misconfigured' }), { status: 500, headers: NDJSON });
  }

  const request = parsed.data;
  const client = createOpenAIClient(cfg);
  const gates = cfg.gates;
  const runId = uuidv4();
  const abort = new AbortController();
  const encoder = new TextEncoder();

  const stream = new ReadableStream<Uint8Array>({
    start(controller) {
      const send = (event: ChainStreamEvent) => controller.enqueue(encoder.encode(line(event)));
      const work = async () => {
        try {
          const run = await runChain(request, {
            client,
            gates,
            runId,
            signal: abort.signal,
            onUpdate: (state) => send({ type: 'update', run: state }),
          });
          send({ type: 'done', run, result: run.result });
        } catch (e) {
          if (e instanceof ChainAbortedError) {
            logger.info('chain cancelled by client', { runId, step: e.step });
            return;
          }
          const step = e instanceof ChainStepError ? e.step : undefined;
          logger.error('chain failed', { runId, step, error: errorMessage(e) });
          send({ type: 'error', step, message: 'generation failed' });
        }
        controller.close();
      };
      work().catch((e: unknown) => {
        logger.warn('chain stream closed early', { runId, error: errorMessage(e) });
      });
    },
    cancel() {
      abort.abort();
    },
  });

  return new Response(stream, { headers: NDJSON });
}
