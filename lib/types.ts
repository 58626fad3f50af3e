export type ChatMessage = { role: 'system' | 'user' | 'assistant'; content: string };

export const CHAIN_STEPS = ['topics', 'outline', 'content', 'polish'] as const;

export type ChainStep = (typeof CHAIN_STEPS)[number];

export type ChainRequest = {
  domain: string;
  audience: string;
};

export type ChainResult = {
  /** The topic the outline and post were written about. */
  topic: string;
  topics: string;
  outline: string;
  content: string;
  polishedContent: string;
};

export type StepStatus = 'idle' | 'running' | 'done' | 'error';

export type ChainStepState = {
  step: ChainStep;
  status: StepStatus;
  startedAt?: number;
  endedAt?: number;
  output?: string;
  error?: string;
};

export type ChainRun = {
  id: string;
  steps: ChainStepState[];
  result?: ChainResult;
};

export type CompletedChainRun = ChainRun & { result: ChainResult };

export type ChainStreamEvent =
  | { type: 'update'; run: ChainRun }
  | { type: 'done'; run: ChainRun; result: ChainResult }
  | { type: 'error'; step?: ChainStep; message: string };

export type StoredResult = {
  request: ChainRequest;
  result: ChainResult;
  savedAt: number;
};
