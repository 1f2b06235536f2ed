import type { RiskLevel } from './verdict.js';
import type { Source } from '../format/sources.js';

export type TurnStatus = 'delivered' | 'rejected' | 'errored';

export type TurnCode = 'RATE_LIMITED' | 'INPUT_REJECTED' | 'OUTPUT_REJECTED' | 'UPSTREAM_ERROR';

export interface ChatResponse {
  request_id: string;
  session_id: string;
  status: TurnStatus;
  output: string;
  error_code?: TurnCode;
  risk_level: RiskLevel;
  has_pii: boolean;
  has_hallucinations: boolean;
  has_sources: boolean;
  sources: Source[];
  policy_profile: string;
  stats: {
    processing_time_ms: number;
  };
}
