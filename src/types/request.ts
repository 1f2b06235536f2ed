import type { RiskLevel, RejectionCategory } from './verdict.js';

export interface ChatRequest {
  session_id?: string;
  request_id?: string;
  message: string;
}

export interface ValidateInputRequest {
  text: string;
  session_id?: string;
}

export interface TextRequest {
  text: string;
}

export interface GateContext {
  sessionId: string;
  input: string;
  filteredText: string;
  gatesPassed: string[];
  findings: {
    hasPII: boolean;
    hasHarmfulContent: boolean;
    hasPromptInjection: boolean;
  };
  risk: RiskLevel;
  blocked?: {
    gate: string;
    category: RejectionCategory;
    reason: string;
    pattern: string;
  };
}
