export { filterHarmful } from './harmful.js';
export { filterPii } from './pii.js';
export { filterHallucination, appendDisclaimer, type HallucinationResult } from './hallucination.js';
export type { FilterResult } from './types.js';

import type { GuardrailsPolicy, OutputVerdict, RiskLevel } from '../types/index.js';
import { maxRisk } from '../types/index.js';
import type { PatternCatalog } from '../patterns/index.js';
import { filterHarmful } from './harmful.js';
import { filterPii } from './pii.js';
import { filterHallucination, appendDisclaimer } from './hallucination.js';

export interface FilterChainResult {
  verdict: OutputVerdict;
  allViolations: string[];
}

export function runFilterChain(
  output: string,
  catalog: PatternCatalog,
  policy: GuardrailsPolicy
): FilterChainResult {
  const filtersApplied: string[] = [];
  const allViolations: string[] = [];
  let currentOutput = output;
  let risk: RiskLevel = 'low';
  let harmful = false;
  let hasPII = false;
  let hasHallucinations = false;
  let indicators = 0;

  // Harmful content
  if (policy.checks.harmful_content) {
    filtersApplied.push('harmful');
    const result = filterHarmful(currentOutput, catalog, policy);
    allViolations.push(...result.violations);
    risk = maxRisk(risk, result.risk);
    harmful = !result.passed;
  }

  // PII is redacted even when the response is rejected
  if (policy.checks.pii_detection) {
    filtersApplied.push('pii');
    const result = filterPii(currentOutput, catalog);
    allViolations.push(...result.violations);
    risk = maxRisk(risk, result.risk);
    if (result.rewritten !== undefined) {
      currentOutput = result.rewritten;
      hasPII = true;
    }
  }

  // Hallucination indicators
  if (policy.checks.hallucination) {
    filtersApplied.push('hallucination');
    const result = filterHallucination(output, catalog, policy.limits.hallucination_threshold);
    allViolations.push(...result.violations);
    risk = maxRisk(risk, result.risk);
    indicators = result.indicators;
    hasHallucinations = result.flagged;
  }

  const fields = {
    hasPII,
    hasHarmfulContent: harmful,
    hasHallucinations,
    hallucinationIndicators: indicators,
    riskLevel: risk,
    filtersApplied
  };

  if (harmful) {
    return {
      verdict: {
        ...fields,
        isValid: false,
        filteredText: currentOutput,
        rejectionReason: policy.messages.output_harmful
      },
      allViolations
    };
  }

  if (hasHallucinations && policy.checks.hallucination_disclaimer) {
    currentOutput = appendDisclaimer(currentOutput, policy.messages.hallucination_disclaimer);
  }

  return {
    verdict: { ...fields, isValid: true, filteredText: currentOutput, rejectionReason: null },
    allViolations
  };
}
