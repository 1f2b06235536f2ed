import type { GateContext } from '../types/index.js';
import type { PatternCatalog } from '../patterns/index.js';
import { maxRisk } from '../types/index.js';

// Runs on blocked messages too: redaction never rejects, and the filtered
// text is what gets logged and optionally stored.
export function gate3Pii(ctx: GateContext, catalog: PatternCatalog): GateContext {
  const gatesPassed = ctx.blocked ? ctx.gatesPassed : [...ctx.gatesPassed, '3'];

  if (!catalog.matchesAny('pii', ctx.input)) {
    return { ...ctx, gatesPassed };
  }

  return {
    ...ctx,
    gatesPassed,
    filteredText: catalog.redact(ctx.input),
    findings: { ...ctx.findings, hasPII: true },
    risk: maxRisk(ctx.risk, 'medium')
  };
}
