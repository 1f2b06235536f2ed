import type { GateContext, GuardrailsPolicy } from '../types/index.js';
import type { PatternCatalog } from '../patterns/index.js';
import { maxRisk } from '../types/index.js';

export function gate2Injection(
  ctx: GateContext,
  catalog: PatternCatalog,
  policy: GuardrailsPolicy
): GateContext {
  if (ctx.blocked) return ctx;

  const match = catalog.firstMatch('prompt_injection', ctx.input);
  if (match) {
    return {
      ...ctx,
      findings: { ...ctx.findings, hasPromptInjection: true },
      risk: maxRisk(ctx.risk, 'medium'),
      blocked: {
        gate: '2',
        category: 'prompt_injection',
        reason: policy.messages.prompt_injection,
        pattern: match.pattern
      }
    };
  }

  return {
    ...ctx,
    gatesPassed: [...ctx.gatesPassed, '2']
  };
}
