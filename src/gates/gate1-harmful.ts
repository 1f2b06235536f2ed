import type { GateContext, GuardrailsPolicy } from '../types/index.js';
import type { PatternCatalog } from '../patterns/index.js';

export function gate1Harmful(
  ctx: GateContext,
  catalog: PatternCatalog,
  policy: GuardrailsPolicy
): GateContext {
  if (ctx.blocked) return ctx;

  const hits = catalog.countMatches('harmful', ctx.input);
  const threshold = Math.max(1, policy.limits.harmful_content_threshold);

  if (hits >= threshold) {
    const first = catalog.firstMatch('harmful', ctx.input);
    return {
      ...ctx,
      findings: { ...ctx.findings, hasHarmfulContent: true },
      risk: 'high',
      blocked: {
        gate: '1',
        category: 'harmful',
        reason: policy.messages.harmful_content,
        pattern: first?.pattern ?? ''
      }
    };
  }

  return {
    ...ctx,
    gatesPassed: [...ctx.gatesPassed, '1']
  };
}
