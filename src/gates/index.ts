export { gate1Harmful } from './gate1-harmful.js';
export { gate2Injection } from './gate2-injection.js';
export { gate3Pii } from './gate3-pii.js';

import type { GateContext, GuardrailsPolicy, InputVerdict } from '../types/index.js';
import type { PatternCatalog } from '../patterns/index.js';
import { gate1Harmful } from './gate1-harmful.js';
import { gate2Injection } from './gate2-injection.js';
import { gate3Pii } from './gate3-pii.js';

export function createGateContext(input: string, sessionId: string): GateContext {
  return {
    sessionId,
    input,
    filteredText: input,
    gatesPassed: [],
    findings: {
      hasPII: false,
      hasHarmfulContent: false,
      hasPromptInjection: false
    },
    risk: 'low'
  };
}

export function runGateChain(
  ctx: GateContext,
  catalog: PatternCatalog,
  policy: GuardrailsPolicy
): GateContext {
  let result = ctx;

  // Gate 1: Harmful content
  if (policy.checks.harmful_content) {
    result = gate1Harmful(result, catalog, policy);
  }

  // Gate 2: Prompt injection
  if (policy.checks.prompt_injection) {
    result = gate2Injection(result, catalog, policy);
  }

  // Gate 3: PII redaction (never blocks)
  if (policy.checks.pii_detection) {
    result = gate3Pii(result, catalog);
  }

  return result;
}

export function toInputVerdict(ctx: GateContext): InputVerdict {
  const fields = {
    hasPII: ctx.findings.hasPII,
    hasHarmfulContent: ctx.findings.hasHarmfulContent,
    hasPromptInjection: ctx.findings.hasPromptInjection,
    filteredText: ctx.filteredText,
    riskLevel: ctx.risk,
    gatesPassed: ctx.gatesPassed
  };

  if (ctx.blocked) {
    return {
      ...fields,
      isValid: false,
      rejectionReason: ctx.blocked.reason,
      category: ctx.blocked.category
    };
  }

  return { ...fields, isValid: true, rejectionReason: null };
}
