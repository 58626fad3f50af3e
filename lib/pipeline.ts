import { v4 as uuidv4 } from 'uuid';
import { DEFAULT_GATES, type ChainGates } from '@/lib/config';
import { ChainAbortedError, ChainStepError, errorMessage } from '@/lib/errors';
import { checkContent, checkOutline, checkPolish, checkTopics, pickTopic } from '@/lib/gates';
import type { LLMClient } from '@/lib/llm/base';
import { logger } from '@/lib/logger';
import { SYSTEM_PROMPT, fillTemplate, resolvePrompts, type Prompts } from '@/lib/prompts';
import {
  CHAIN_STEPS,
  type ChainRequest,
  type ChainRun,
  type ChainStep,
  type ChainStepState,
  type CompletedChainRun,
} from '@/lib/types';

export type ChainOptions = {
  client: LLMClient;
  prompts?: Partial<Prompts>;
  gates?: Partial<ChainGates>;
  runId?: string;
  onUpdate?: (run: ChainRun) => void | Promise<void>;
  signal?: AbortSignal;
};

function now() {
  return Date.now();
}

/**
 * Runs topics → outline → content → polish, one model call each, strictly in
 * order. The first failing call or gate stops the chain; its error carries the
 * step name.
 */
export async function runChain(request: ChainRequest, options: ChainOptions): Promise<CompletedChainRun> {
  const run: ChainRun = {
    id: options.runId ?? uuidv4(),
    steps: CHAIN_STEPS.map((step): ChainStepState => ({ step, status: 'idle' })),
  };
  const prompts = resolvePrompts(options.prompts);
  const gates: ChainGates = { ...DEFAULT_GATES, ...options.gates };
  const { client, signal } = options;

  const emit = async () => {
    if (!options.onUpdate) return;
    try {
      await options.onUpdate(structuredClone(run));
    } catch (e) {
      logger.warn('chain update listener failed', { runId: run.id, error: errorMessage(e) });
    }
  };

  const runStep = async (step: ChainStep, prompt: string, gate: (output: string) => void): Promise<string> => {
    if (signal?.aborted) throw new ChainAbortedError(step);
    const state = run.steps[CHAIN_STEPS.indexOf(step)];
    const startedAt = now();
    state.status = 'running';
    state.startedAt = startedAt;
    await emit();
    logger.debug('chain step started', { runId: run.id, step });
    try {
      const res = await client.chat({
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: prompt },
        ],
        signal,
      });
      if (!res.ok) {
        throw signal?.aborted ? new ChainAbortedError(step) : new ChainStepError(step, res.error);
      }
      gate(res.data);
      const endedAt = now();
      state.status = 'done';
      state.output = res.data;
      state.endedAt = endedAt;
      logger.info('chain step finished', { runId: run.id, step, ms: endedAt - startedAt });
      await emit();
      return res.data;
    } catch (e) {
      state.status = 'error';
      state.error = errorMessage(e);
      state.endedAt = now();
      await emit();
      if (e instanceof ChainStepError || e instanceof ChainAbortedError) throw e;
      throw new ChainStepError(step, errorMessage(e), { cause: e });
    }
  };

  const { domain, audience } = request;

  // 1) topics
  let topicList: string[] = [];
  const topics = await runStep('topics', fillTemplate(prompts.topics, { domain, audience }), (out) => {
    topicList = checkTopics(out, gates);
  });
  const topic = pickTopic(topicList);

  // 2) outline for the first topic
  const outline = await runStep(
    'outline',
    fillTemplate(prompts.outline, { domain, audience, topic, topics: topicList.join('\n') }),
    (out) => {
      checkOutline(out, gates);
    },
  );

  // 3) draft
  const content = await runStep('content', fillTemplate(prompts.content, { outline }), (out) => {
    checkContent(out, gates);
  });

  // 4) polish
  const polishedContent = await runStep('polish', fillTemplate(prompts.polish, { content }), (out) => {
    checkPolish(content, out);
  });

  const result = { topic, topics, outline, content, polishedContent };
  run.result = result;
  return { ...run, result };
}
