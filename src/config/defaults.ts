import { resolve } from 'path';
import { homedir } from 'os';
import type { GuardrailsPolicy } from '../types/index.js';
import type { InferenceBackend, GenerationSettings } from '../inference/router.js';
import { DEFAULT_REDACTION_MARKER } from '../patterns/index.js';

export interface AppConfig {
  server: {
    port: number;
    host: string;
  };
  cors: {
    allowed_origins: string[];
  };
  inference: {
    backends: InferenceBackend[];
    default: string;
    system_prompt: string;
    generation: GenerationSettings;
  };
  policies: {
    directory: string;
    default: string;
  };
  logging: {
    level: string;
    pretty: boolean;
  };
}

export const DEFAULT_SYSTEM_PROMPT = `You are a helpful assistant that provides accurate information with sources.
For factual information, always include relevant sources or citations at the end of your response.
Format sources as a numbered list under a 'Sources:' heading.`;

export const DEFAULT_POLICY: GuardrailsPolicy = {
  name: 'default',
  version: '1.0.0',
  checks: {
    input_validation: true,
    output_validation: true,
    pii_detection: true,
    harmful_content: true,
    prompt_injection: true,
    hallucination: true,
    rate_limiting: true,
    hallucination_disclaimer: true,
    record_rejected_input: false
  },
  limits: {
    max_requests_per_window: 20,
    window_seconds: 60,
    hallucination_threshold: 3,
    harmful_content_threshold: 1,
    max_history_messages: 50,
    max_conversation_tokens: 8000
  },
  messages: {
    harmful_content: 'Your message contains potentially harmful content that violates our usage policy.',
    prompt_injection: "Your message contains prompt engineering attempts that aren't allowed.",
    output_harmful: 'The AI generated potentially harmful content.',
    rate_limited: "You've made too many requests. Please wait a moment before sending another message.",
    hallucination_disclaimer: 'Note: This response may contain uncertainties. Please verify any critical information.',
    general_error: "I'm unable to process that request. Please try something different."
  },
  patterns: {
    harmful: [],
    prompt_injection: [],
    pii: [],
    hallucination: []
  },
  redaction_marker: DEFAULT_REDACTION_MARKER
};

export function defaultConfig(): AppConfig {
  return {
    server: { port: 8088, host: '127.0.0.1' },
    cors: {
      allowed_origins: ['http://localhost:3000']
    },
    inference: {
      backends: [
        { name: 'gemini', type: 'gemini', model: 'gemini-2.0-flash' },
        { name: 'claude', type: 'anthropic', model: 'claude-3-5-sonnet-latest' },
        { name: 'local', type: 'ollama', model: 'mistral' }
      ],
      default: 'gemini',
      system_prompt: DEFAULT_SYSTEM_PROMPT,
      generation: {
        temperature: 0.7,
        top_p: 1,
        top_k: 1,
        max_output_tokens: 1000
      }
    },
    policies: {
      directory: resolve(process.cwd(), 'policies'),
      default: 'default'
    },
    logging: {
      level: 'info',
      pretty: false
    }
  };
}

export const DEFAULT_CONFIG_PATHS = [
  resolve(process.cwd(), 'chat-guardrails.yaml'),
  resolve(homedir(), '.chat-guardrails', 'config.yaml'),
  resolve(homedir(), '.config', 'chat-guardrails', 'config.yaml')
];
