import type { PatternCategory } from '../types/index.js';

export const DEFAULT_REDACTION_MARKER = '[REDACTED]';

// Violence, weapons, hate speech and exploitation vocabulary
const HARMFUL_PATTERNS = [
  /\b(?:hack|exploit|attack|bomb|weapon|illegal|suicide|terrorist|extremist)\b/i,
  /\b(?:murder|kill|assassinate|destroy|harmful|violent)\b/i,
  /\b(?:nazi|racist|sexist|homophobic|transphobic)\b/i,
  /\b(?:child\s+porn|child\s+abuse|bestiality|torture)\b/i,
];

// Attempts to override the system instructions
const PROMPT_INJECTION_PATTERNS = [
  /\b(?:ignore|disregard|forget)\s+(?:all\s+)?(?:previous|prior|above|all)\s+(?:instructions?|prompts?)\b/i,
  /\bsystem\s*prompt\b/i,
  /\byou\s*are\s*now\b/i,
  /\bact\s*as\s*if\b/i,
  /\bnew\s*role\b/i,
  /\bstop\s*being\b/i,
];

// Applied in order; card numbers go before SSNs and phones so digit groups are not split
const PII_PATTERNS = [
  // Credit card: four groups of four digits
  /\b(?:\d{4}[- ]?){3}\d{4}\b/,
  // SSN: 123-45-6789 or 123456789
  /\b\d{3}-?\d{2}-?\d{4}\b/,
  // Email; starts only where no local-part character precedes, domain labels split on dots
  /(?<![A-Za-z0-9._%+-])[A-Za-z0-9._%+-]+@[A-Za-z0-9-]+(?:\.[A-Za-z0-9-]+)*\.[A-Za-z]{2,}\b/,
  // Phone: optional country code, optional parentheses
  /(?:\+\d{1,2}\s)?\(?\b\d{3}\)?[\s.-]?\d{3}[\s.-]?\d{4}\b/,
  // IPv4
  /\b(?:\d{1,3}\.){3}\d{1,3}\b/,
  // Street address
  /\b\d+\s+[A-Za-z][A-Za-z\s,]*?\s(?:street|st|avenue|ave|road|rd|highway|hwy|square|sq|trail|trl|drive|dr|court|ct|parkway|pkwy|circle|cir|boulevard|blvd)\b/i,
];

// Hedging and refusal phrases; counted, not matched once
const HALLUCINATION_PATTERNS = [
  /\bI(?:'|’)?m\s+not\s+sure\b/i,
  /\bI\s+don(?:'|’)?t\s+know\b/i,
  /\bI\s+cannot\s+(?:provide|give|offer)\b/i,
  /\b(?:cannot|can(?:'|’)t)\s+(?:access|find|retrieve)\b/i,
  /\b(?:do|does)\s+not\s+exist\b/i,
  /\b(?:no|limited)\s+information\s+available\b/i,
  /\b(?:sorry|unfortunately|I\s+apologize)\b/i,
  /\b(?:might|may|could|possibly)\b/i,
  /\b(?:unable|not\s+able)\s+to\b/i,
  /\bbeyond\s+(?:my|current)\b/i,
];

export const DEFAULT_PATTERNS: Record<PatternCategory, readonly RegExp[]> = {
  harmful: HARMFUL_PATTERNS,
  prompt_injection: PROMPT_INJECTION_PATTERNS,
  pii: PII_PATTERNS,
  hallucination: HALLUCINATION_PATTERNS
};
