import type { PatternCatalog } from '../patterns/index.js';
import type { FilterResult } from './types.js';

export interface HallucinationResult extends FilterResult {
  indicators: number;
  flagged: boolean;
}

/**
 * Counts hedging phrases across the response. A single "might" is normal
 * prose; only `threshold` or more indicators flag the response.
 */
export function filterHallucination(
  output: string,
  catalog: PatternCatalog,
  threshold: number
): HallucinationResult {
  const indicators = catalog.countMatches('hallucination', output);
  const flagged = indicators >= Math.max(1, threshold);

  return {
    passed: true,
    violations: flagged ? [`Uncertainty indicators: ${indicators}`] : [],
    risk: flagged ? 'medium' : 'low',
    indicators,
    flagged
  };
}

export function appendDisclaimer(output: string, disclaimer: string): string {
  return `${output}\n\n_${disclaimer}_`;
}
