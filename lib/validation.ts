import { z } from 'zod';
import {
  CHAIN_STEPS,
  type ChainRequest,
  type ChainResult,
  type ChainRun,
  type ChainStreamEvent,
  type StoredResult,
} from '@/lib/types';

const field = z.string().trim().min(1).max(200);

export const ChainRequestSchema: z.ZodType<ChainRequest> = z.object({
  domain: field,
  audience: field,
});

const StepSchema = z.enum(CHAIN_STEPS);

export const ChainResultSchema: z.ZodType<ChainResult> = z.object({
  topic: z.string(),
  topics: z.string(),
  outline: z.string(),
  content: z.string(),
  polishedContent: z.string(),
});

export const ChainRunSchema: z.ZodType<ChainRun> = z.object({
  id: z.string(),
  steps: z.array(
    z.object({
      step: StepSchema,
      status: z.enum(['idle', 'running', 'done', 'error']),
      startedAt: z.number().optional(),
      endedAt: z.number().optional(),
      output: z.string().optional(),
      error: z.string().optional(),
    }),
  ),
  result: ChainResultSchema.optional(),
});

export const ChainStreamEventSchema: z.ZodType<ChainStreamEvent> = z.discriminatedUnion('type', [
  z.object({ type: z.literal('update'), run: ChainRunSchema }),
  z.object({ type: z.literal('done'), run: ChainRunSchema, result: ChainResultSchema }),
  z.object({ type: z.literal('error'), step: StepSchema.optional(), message: z.string() }),
]);

export const StoredResultSchema: z.ZodType<StoredResult> = z.object({
  request: ChainRequestSchema,
  result: ChainResultSchema,
  savedAt: z.number(),
});
