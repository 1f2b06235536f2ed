import type { PatternCatalog } from '../patterns/index.js';
import type { FilterResult } from './types.js';

export function filterPii(output: string, catalog: PatternCatalog): FilterResult {
  if (!catalog.matchesAny('pii', output)) {
    return { passed: true, violations: [], risk: 'low' };
  }

  // Redaction is a rewrite, not a rejection
  return {
    passed: true,
    violations: ['PII redacted'],
    rewritten: catalog.redact(output),
    risk: 'medium'
  };
}
