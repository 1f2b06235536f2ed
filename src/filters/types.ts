import type { RiskLevel } from '../types/index.js';

export interface FilterResult {
  passed: boolean;
  violations: string[];
  rewritten?: string;
  risk: RiskLevel;
}
