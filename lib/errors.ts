import type { ChainStep } from '@/lib/types';

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/** A chain step failed; nothing after it ran. */
export class ChainStepError extends Error {
  constructor(readonly step: ChainStep, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ChainStepError';
  }
}

/** The step produced output that did not pass its quality gate. */
export class ChainGateError extends ChainStepError {
  constructor(step: ChainStep, message: string) {
    super(step, message);
    this.name = 'ChainGateError';
  }
}

export class ChainAbortedError extends Error {
  constructor(readonly step: ChainStep) {
    super(`aborted before ${step} finished`);
    this.name = 'ChainAbortedError';
  }
}

export class StreamProtocolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StreamProtocolError';
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
