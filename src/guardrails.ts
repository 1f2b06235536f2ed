import type { GuardrailsPolicy, InputVerdict, OutputVerdict } from './types/index.js';
import { PatternCatalog } from './patterns/index.js';
import { RateLimiter } from './rate-limit/index.js';
import { createGateContext, runGateChain, toInputVerdict } from './gates/index.js';
import { runFilterChain } from './filters/index.js';
import { DEFAULT_POLICY } from './config/index.js';
import { createLogger, excerpt, type Logger } from './logger.js';

export interface GuardrailsOptions {
  policy?: GuardrailsPolicy;
  logger?: Logger;
  /** Clock for the rate limiter, epoch ms. */
  now?: () => number;
}

/**
 * Validation entry points for one policy: input screening, output screening,
 * per-session rate limiting and PII redaction. Pattern matching never throws;
 * every outcome is a verdict.
 */
export class Guardrails {
  readonly policy: GuardrailsPolicy;
  readonly catalog: PatternCatalog;
  readonly limiter: RateLimiter;
  private logger: Logger;

  constructor(options: GuardrailsOptions = {}) {
    this.policy = options.policy ?? DEFAULT_POLICY;
    this.catalog = PatternCatalog.fromPolicy(this.policy);
    this.limiter = new RateLimiter({
      maxRequests: this.policy.limits.max_requests_per_window,
      windowSeconds: this.policy.limits.window_seconds,
      now: options.now
    });
    this.logger = (options.logger ?? createLogger()).child({ component: 'guardrails' });
  }

  checkRateLimit(sessionId: string): boolean {
    if (!this.policy.checks.rate_limiting) return true;

    const admitted = this.limiter.checkAndRecord(sessionId);
    if (!admitted) {
      this.logger.warn({
        session_id: sessionId,
        max_requests: this.limiter.maxRequests,
        window_seconds: this.policy.limits.window_seconds
      }, 'Rate limit exceeded');
    }
    return admitted;
  }

  validateInput(text: string, sessionId: string = 'anonymous'): InputVerdict {
    if (!this.policy.checks.input_validation) {
      return {
        isValid: true,
        hasPII: false,
        hasHarmfulContent: false,
        hasPromptInjection: false,
        filteredText: text,
        rejectionReason: null,
        riskLevel: 'low',
        gatesPassed: []
      };
    }

    const ctx = runGateChain(createGateContext(text, sessionId), this.catalog, this.policy);
    const verdict = toInputVerdict(ctx);

    if (ctx.blocked) {
      this.logger.warn({
        session_id: sessionId,
        category: ctx.blocked.category,
        pattern: ctx.blocked.pattern,
        text: excerpt(ctx.filteredText)
      }, 'Input rejected');
    } else if (verdict.hasPII) {
      this.logger.info({ session_id: sessionId }, 'PII detected and redacted from input');
    }

    this.logger.debug({
      session_id: sessionId,
      valid: verdict.isValid,
      risk: verdict.riskLevel
    }, 'Input validated');

    return verdict;
  }

  validateOutput(text: string): OutputVerdict {
    if (!this.policy.checks.output_validation) {
      return {
        isValid: true,
        hasPII: false,
        hasHarmfulContent: false,
        hasHallucinations: false,
        hallucinationIndicators: 0,
        filteredText: text,
        rejectionReason: null,
        riskLevel: 'low',
        filtersApplied: []
      };
    }

    const { verdict, allViolations } = runFilterChain(text, this.catalog, this.policy);

    if (!verdict.isValid) {
      this.logger.warn({
        violations: allViolations,
        text: excerpt(verdict.filteredText)
      }, 'Output rejected');
    } else {
      if (verdict.hasPII) {
        this.logger.info('PII detected and redacted from output');
      }
      if (verdict.hasHallucinations) {
        this.logger.info({
          indicators: verdict.hallucinationIndicators
        }, 'Potential hallucination detected in output');
      }
    }

    return verdict;
  }

  redactPII(text: string): string {
    return this.catalog.redact(text);
  }
}
