import type { InputVerdict, OutputVerdict, VerdictMetadata } from '../types/index.js';
import type { Guardrails } from '../guardrails.js';
import type { TextGenerator } from '../inference/index.js';
import type { HistoryStore } from '../history/index.js';
import type { ResponseFormatter, Source } from '../format/index.js';
import { defaultFormatter } from '../format/index.js';
import { appendDisclaimer } from '../filters/index.js';
import { createLogger, type Logger } from '../logger.js';

export type TurnState = 'rate_check' | 'input_validate' | 'model_call' | 'output_validate' | 'deliver';

export interface TurnInput {
  sessionId: string;
  message: string;
}

export type TurnOutcome =
  | {
      state: 'rejected';
      code: 'RATE_LIMITED';
      rejectionReason: string;
      retryAfterMs: number;
      trace: TurnState[];
    }
  | {
      state: 'rejected';
      code: 'INPUT_REJECTED';
      rejectionReason: string;
      input: InputVerdict;
      trace: TurnState[];
    }
  | {
      state: 'rejected';
      code: 'OUTPUT_REJECTED';
      rejectionReason: string;
      input: InputVerdict;
      output: OutputVerdict;
      trace: TurnState[];
    }
  | {
      state: 'errored';
      code: 'UPSTREAM_ERROR';
      rejectionReason: string;
      detail: string;
      input: InputVerdict;
      trace: TurnState[];
    }
  | {
      state: 'delivered';
      text: string;
      metadata: VerdictMetadata;
      sources: Source[];
      input: InputVerdict;
      output: OutputVerdict;
      trace: TurnState[];
    };

export interface ChatTurnOrchestratorOptions {
  guardrails: Guardrails;
  generator: TextGenerator;
  history: HistoryStore;
  formatter?: ResponseFormatter;
  logger?: Logger;
  clock?: () => Date;
}

function inputMetadata(verdict: InputVerdict): VerdictMetadata {
  return {
    riskLevel: verdict.riskLevel,
    hasPII: verdict.hasPII,
    hasHallucinations: false,
    hasSources: false
  };
}

/**
 * One conversational turn:
 * rate check -> input validation -> model call -> output validation -> deliver.
 *
 * Every path ends in a TurnOutcome; model failures become UPSTREAM_ERROR.
 * The model only ever sees the filtered (PII-redacted) message, and a
 * rejected response's raw text is never returned or stored.
 */
export class ChatTurnOrchestrator {
  private guardrails: Guardrails;
  private generator: TextGenerator;
  private history: HistoryStore;
  private formatter: ResponseFormatter;
  private logger: Logger;
  private clock: () => Date;

  constructor(options: ChatTurnOrchestratorOptions) {
    this.guardrails = options.guardrails;
    this.generator = options.generator;
    this.history = options.history;
    this.formatter = options.formatter ?? defaultFormatter;
    this.logger = (options.logger ?? createLogger()).child({ component: 'orchestrator' });
    this.clock = options.clock ?? (() => new Date());
  }

  async runTurn(turn: TurnInput): Promise<TurnOutcome> {
    const { sessionId, message } = turn;
    const { policy } = this.guardrails;
    const trace: TurnState[] = ['rate_check'];

    if (!this.guardrails.checkRateLimit(sessionId)) {
      return {
        state: 'rejected',
        code: 'RATE_LIMITED',
        rejectionReason: policy.messages.rate_limited,
        retryAfterMs: this.guardrails.limiter.retryAfterMs(sessionId),
        trace
      };
    }

    trace.push('input_validate');
    const input = this.guardrails.validateInput(message, sessionId);

    if (!input.isValid) {
      if (policy.checks.record_rejected_input) {
        this.history.append(sessionId, {
          role: 'user',
          content: input.filteredText,
          timestamp: this.clock().toISOString(),
          verdict: inputMetadata(input),
          rejected: true
        });
      }
      return {
        state: 'rejected',
        code: 'INPUT_REJECTED',
        rejectionReason: input.rejectionReason,
        input,
        trace
      };
    }

    const context = this.history.window(sessionId, policy.limits.max_conversation_tokens);

    trace.push('model_call');
    let raw: string;
    try {
      raw = await this.generator.generate(input.filteredText, context);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      this.logger.error({ session_id: sessionId, error: detail }, 'Model call failed');
      return {
        state: 'errored',
        code: 'UPSTREAM_ERROR',
        rejectionReason: policy.messages.general_error,
        detail,
        input,
        trace
      };
    }

    trace.push('output_validate');
    const output = this.guardrails.validateOutput(raw);

    this.history.append(sessionId, {
      role: 'user',
      content: input.filteredText,
      timestamp: this.clock().toISOString(),
      verdict: inputMetadata(input)
    });

    if (!output.isValid) {
      this.history.append(sessionId, {
        role: 'assistant',
        content: output.rejectionReason,
        timestamp: this.clock().toISOString(),
        verdict: {
          riskLevel: output.riskLevel,
          hasPII: output.hasPII,
          hasHallucinations: output.hasHallucinations,
          hasSources: false
        }
      });
      return {
        state: 'rejected',
        code: 'OUTPUT_REJECTED',
        rejectionReason: output.rejectionReason,
        input,
        output,
        trace
      };
    }

    trace.push('deliver');
    const parsed = this.formatter.parse(this.withoutDisclaimer(output));
    const metadata: VerdictMetadata = {
      riskLevel: output.riskLevel,
      hasPII: output.hasPII,
      hasHallucinations: output.hasHallucinations,
      hasSources: parsed.hasSources
    };

    this.history.append(sessionId, {
      role: 'assistant',
      content: output.filteredText,
      timestamp: this.clock().toISOString(),
      verdict: metadata
    });

    return {
      state: 'delivered',
      text: output.filteredText,
      metadata,
      sources: parsed.sources,
      input,
      output,
      trace
    };
  }

  // Sources sit at the end of the answer; keep the disclaimer out of the last one
  private withoutDisclaimer(output: OutputVerdict): string {
    const suffix = appendDisclaimer('', this.guardrails.policy.messages.hallucination_disclaimer);
    const text = output.filteredText;
    return output.hasHallucinations && text.endsWith(suffix) ? text.slice(0, -suffix.length) : text;
  }
}
