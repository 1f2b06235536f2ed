import type { GuardrailsPolicy, PatternCategory } from '../types/index.js';
import { PATTERN_CATEGORIES } from '../types/index.js';
import { DEFAULT_PATTERNS, DEFAULT_REDACTION_MARKER } from './defaults.js';

export interface PatternMatch {
  pattern: string;
  match: string;
}

function globalCopy(pattern: RegExp): RegExp {
  const flags = pattern.flags.includes('g') ? pattern.flags : pattern.flags + 'g';
  return new RegExp(pattern.source, flags);
}

function stripGlobal(pattern: RegExp): RegExp {
  return pattern.flags.includes('g')
    ? new RegExp(pattern.source, pattern.flags.replace('g', ''))
    : pattern;
}

/**
 * Regex policy tables for the four screening categories.
 *
 * Policy is "any match anywhere in the text": there is no disambiguation, so
 * words like "attack" in unrelated prose are flagged. Stored patterns are
 * non-global so `test` carries no `lastIndex` state between calls; counting
 * and redaction work on global copies.
 */
export class PatternCatalog {
  private readonly sets: Record<PatternCategory, RegExp[]>;
  readonly redactionMarker: string;

  constructor(
    sets: Record<PatternCategory, readonly RegExp[]> = DEFAULT_PATTERNS,
    redactionMarker: string = DEFAULT_REDACTION_MARKER
  ) {
    this.sets = {
      harmful: sets.harmful.map(stripGlobal),
      prompt_injection: sets.prompt_injection.map(stripGlobal),
      pii: sets.pii.map(stripGlobal),
      hallucination: sets.hallucination.map(stripGlobal)
    };
    this.redactionMarker = redactionMarker;
  }

  static fromPolicy(policy: GuardrailsPolicy): PatternCatalog {
    const sets = { ...DEFAULT_PATTERNS };
    for (const category of PATTERN_CATEGORIES) {
      const extra = policy.patterns[category].map(source => new RegExp(source, 'i'));
      sets[category] = [...DEFAULT_PATTERNS[category], ...extra];
    }
    return new PatternCatalog(sets, policy.redaction_marker);
  }

  patterns(category: PatternCategory): readonly RegExp[] {
    return this.sets[category];
  }

  matchesAny(category: PatternCategory, text: string): boolean {
    return this.sets[category].some(p => p.test(text));
  }

  firstMatch(category: PatternCategory, text: string): PatternMatch | null {
    for (const pattern of this.sets[category]) {
      const match = pattern.exec(text);
      if (match) {
        return { pattern: pattern.source, match: match[0] };
      }
    }
    return null;
  }

  /** Total non-overlapping matches across every pattern of the set. */
  countMatches(category: PatternCategory, text: string): number {
    let count = 0;
    for (const pattern of this.sets[category]) {
      count += text.match(globalCopy(pattern))?.length ?? 0;
    }
    return count;
  }

  redact(text: string): string {
    let result = text;
    for (const pattern of this.sets.pii) {
      result = result.replace(globalCopy(pattern), this.redactionMarker);
    }
    return result;
  }
}
