import { NextRequest, NextResponse } from 'next/server';
import { v4 as uuidv4 } from 'uuid';
import { getConfig, type AppConfig } from '@/lib/config';
import { ChainStepError, errorMessage } from '@/lib/errors';
import { createOpenAIClient } from '@/lib/llm/openai';
import { logger } from '@/lib/logger';
import { runChain } from '@/lib/pipeline';
import { ChainRequestSchema } from '@/lib/validation';

export const runtime = 'nodejs';

export async function POST(req: NextRequest) {
  const body: unknown = await req.json().catch(() => undefined);
  const parsed = ChainRequestSchema.safeParse(body);
  if (!parsed.success) {
    return NextResponse.json({ ok: false, error: 'invalid request' }, { status: 400 });
  }

  let cfg: AppConfig;
  try {
    cfg = getConfig();
  } catch (e) {
    logger.error('configuration invalid', { error: errorMessage(e) });
    return NextResponse.json({ ok: false, error: 'server misconfigured' }, { status: 500 });
  }

  const runId = uuidv4();
  try {
    const run = await runChain(parsed.data, { client: createOpenAIClient(cfg), gates: cfg.gates, runId });
    return NextResponse.json({ ok: true, runId: run.id, result: run.result });
  } catch (e) {
    const step = e instanceof ChainStepError ? e.step : undefined;
    logger.error('chain failed', { runId, step, error: errorMessage(e) });
    return NextResponse.json({ ok: false, error: 'generation failed', step }, { status: 502 });
  }
}
