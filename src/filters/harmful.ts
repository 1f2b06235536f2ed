import type { GuardrailsPolicy } from '../types/index.js';
import type { PatternCatalog } from '../patterns/index.js';
import type { FilterResult } from './types.js';

export function filterHarmful(
  output: string,
  catalog: PatternCatalog,
  policy: GuardrailsPolicy
): FilterResult {
  const hits = catalog.countMatches('harmful', output);
  const threshold = Math.max(1, policy.limits.harmful_content_threshold);

  if (hits < threshold) {
    return { passed: true, violations: [], risk: 'low' };
  }

  const first = catalog.firstMatch('harmful', output);
  return {
    passed: false,
    violations: [`Harmful content: "${first?.match ?? ''}"`],
    risk: 'high'
  };
}
