export type PatternCategory = 'harmful' | 'prompt_injection' | 'pii' | 'hallucination';

export const PATTERN_CATEGORIES: readonly PatternCategory[] = [
  'harmful',
  'prompt_injection',
  'pii',
  'hallucination'
];

export interface GuardrailsPolicy {
  name: string;
  version: string;
  checks: {
    input_validation: boolean;
    output_validation: boolean;
    pii_detection: boolean;
    harmful_content: boolean;
    prompt_injection: boolean;
    hallucination: boolean;
    rate_limiting: boolean;
    hallucination_disclaimer: boolean;
    record_rejected_input: boolean;
  };
  limits: {
    max_requests_per_window: number;
    window_seconds: number;
    hallucination_threshold: number;
    harmful_content_threshold: number;
    max_history_messages: number;
    max_conversation_tokens: number;
  };
  messages: {
    harmful_content: string;
    prompt_injection: string;
    output_harmful: string;
    rate_limited: string;
    hallucination_disclaimer: string;
    general_error: string;
  };
  /** Extra regex sources appended to the built-in sets. */
  patterns: Record<PatternCategory, string[]>;
  redaction_marker: string;
}
