export type RiskLevel = 'low' | 'medium' | 'high';

const RISK_ORDER: Record<RiskLevel, number> = {
  low: 0,
  medium: 1,
  high: 2
};

export function maxRisk(a: RiskLevel, b: RiskLevel): RiskLevel {
  return RISK_ORDER[a] >= RISK_ORDER[b] ? a : b;
}

export type RejectionCategory = 'harmful' | 'prompt_injection';

interface InputVerdictFields {
  hasPII: boolean;
  hasHarmfulContent: boolean;
  hasPromptInjection: boolean;
  filteredText: string;
  riskLevel: RiskLevel;
  gatesPassed: string[];
}

export type InputVerdict =
  | (InputVerdictFields & { isValid: true; rejectionReason: null })
  | (InputVerdictFields & {
      isValid: false;
      rejectionReason: string;
      category: RejectionCategory;
    });

interface OutputVerdictFields {
  hasPII: boolean;
  hasHarmfulContent: boolean;
  hasHallucinations: boolean;
  hallucinationIndicators: number;
  filteredText: string;
  riskLevel: RiskLevel;
  filtersApplied: string[];
}

export type OutputVerdict =
  | (OutputVerdictFields & { isValid: true; rejectionReason: null })
  | (OutputVerdictFields & { isValid: false; rejectionReason: string });

/** Verdict metadata attached to history records and shown as badges by the UI. */
export interface VerdictMetadata {
  riskLevel: RiskLevel;
  hasPII: boolean;
  hasHallucinations: boolean;
  hasSources: boolean;
}
