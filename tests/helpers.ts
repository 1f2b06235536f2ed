import type { GuardrailsPolicy } from '../src/types/index.js';
import type { ChatMessage, TextGenerator } from '../src/inference/index.js';
import { DEFAULT_POLICY } from '../src/config/index.js';
import { createLogger } from '../src/logger.js';

export const silentLogger = createLogger({ level: 'silent' });

export function policyWith(overrides: {
  checks?: Partial<GuardrailsPolicy['checks']>;
  limits?: Partial<GuardrailsPolicy['limits']>;
}): GuardrailsPolicy {
  return {
    ...DEFAULT_POLICY,
    checks: { ...DEFAULT_POLICY.checks, ...overrides.checks },
    limits: { ...DEFAULT_POLICY.limits, ...overrides.limits }
  };
}

/** Records every call; answers with `reply` or fails with it. */
export class FakeGenerator implements TextGenerator {
  calls: { prompt: string; history: ChatMessage[] }[] = [];

  constructor(private reply: string | Error) {}

  async generate(prompt: string, history: ChatMessage[]): Promise<string> {
    this.calls.push({ prompt, history });
    if (this.reply instanceof Error) throw this.reply;
    return this.reply;
  }
}
