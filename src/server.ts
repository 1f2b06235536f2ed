import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { v4 as uuidv4 } from 'uuid';

import type {
  ChatRequest,
  ChatResponse,
  InputVerdict,
  OutputVerdict,
  TextRequest,
  ValidateInputRequest
} from './types/index.js';
import type { AppConfig } from './config/index.js';
import type { Guardrails } from './guardrails.js';
import type { ChatTurnOrchestrator, TurnOutcome } from './orchestrator/index.js';
import type { HistoryStore } from './history/index.js';
import type { Logger } from './logger.js';

export const VERSION = '1.0.0';

export interface ServerDeps {
  config: AppConfig;
  guardrails: Guardrails;
  orchestrator: ChatTurnOrchestrator;
  history: HistoryStore;
  logger: Logger;
  backends: string[];
}

const MAX_TEXT_CHARS = 20000;

const chatBodySchema = {
  type: 'object',
  required: ['message'],
  properties: {
    message: { type: 'string', minLength: 1, maxLength: MAX_TEXT_CHARS },
    session_id: { type: 'string', minLength: 1, maxLength: 128 },
    request_id: { type: 'string', minLength: 1, maxLength: 128 }
  }
} as const;

const textBodySchema = {
  type: 'object',
  required: ['text'],
  properties: {
    text: { type: 'string', maxLength: MAX_TEXT_CHARS },
    session_id: { type: 'string', minLength: 1, maxLength: 128 }
  }
} as const;

export function serializeInputVerdict(verdict: InputVerdict) {
  return {
    is_valid: verdict.isValid,
    has_pii: verdict.hasPII,
    has_harmful_content: verdict.hasHarmfulContent,
    has_prompt_injection: verdict.hasPromptInjection,
    filtered_text: verdict.filteredText,
    rejection_reason: verdict.rejectionReason,
    risk_level: verdict.riskLevel
  };
}

export function serializeOutputVerdict(verdict: OutputVerdict) {
  return {
    is_valid: verdict.isValid,
    has_pii: verdict.hasPII,
    has_harmful_content: verdict.hasHarmfulContent,
    has_hallucinations: verdict.hasHallucinations,
    hallucination_indicators: verdict.hallucinationIndicators,
    filtered_text: verdict.filteredText,
    rejection_reason: verdict.rejectionReason,
    risk_level: verdict.riskLevel
  };
}

function statusFor(outcome: TurnOutcome): number {
  switch (outcome.state) {
    case 'delivered':
      return 200;
    case 'errored':
      return 502;
    case 'rejected':
      return outcome.code === 'RATE_LIMITED' ? 429 : 403;
  }
}

function toChatResponse(
  outcome: TurnOutcome,
  ids: { requestId: string; sessionId: string },
  policyName: string,
  startTime: number
): ChatResponse {
  const base = {
    request_id: ids.requestId,
    session_id: ids.sessionId,
    policy_profile: policyName,
    stats: { processing_time_ms: Date.now() - startTime }
  };

  switch (outcome.state) {
    case 'delivered':
      return {
        ...base,
        status: 'delivered',
        output: outcome.text,
        risk_level: outcome.metadata.riskLevel,
        has_pii: outcome.metadata.hasPII,
        has_hallucinations: outcome.metadata.hasHallucinations,
        has_sources: outcome.metadata.hasSources,
        sources: outcome.sources
      };

    case 'errored':
      return {
        ...base,
        status: 'errored',
        output: outcome.rejectionReason,
        error_code: outcome.code,
        risk_level: outcome.input.riskLevel,
        has_pii: outcome.input.hasPII,
        has_hallucinations: false,
        has_sources: false,
        sources: []
      };

    case 'rejected':
      if (outcome.code === 'RATE_LIMITED') {
        return {
          ...base,
          status: 'rejected',
          output: outcome.rejectionReason,
          error_code: outcome.code,
          risk_level: 'low',
          has_pii: false,
          has_hallucinations: false,
          has_sources: false,
          sources: []
        };
      }
      if (outcome.code === 'INPUT_REJECTED') {
        return {
          ...base,
          status: 'rejected',
          output: outcome.rejectionReason,
          error_code: outcome.code,
          risk_level: outcome.input.riskLevel,
          has_pii: outcome.input.hasPII,
          has_hallucinations: false,
          has_sources: false,
          sources: []
        };
      }
      return {
        ...base,
        status: 'rejected',
        output: outcome.rejectionReason,
        error_code: outcome.code,
        risk_level: outcome.output.riskLevel,
        has_pii: outcome.output.hasPII,
        has_hallucinations: outcome.output.hasHallucinations,
        has_sources: false,
        sources: []
      };
  }
}

export async function buildServer(deps: ServerDeps): Promise<FastifyInstance> {
  const { config, guardrails, orchestrator, history, logger } = deps;

  const app = Fastify({ logger: false });

  await app.register(cors, {
    origin: config.cors.allowed_origins,
    credentials: true
  });

  app.setErrorHandler((error, request, reply) => {
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      logger.error({ err: error, url: request.url }, 'Unhandled request error');
    }
    reply.status(statusCode).send({
      error: error.code ?? 'INTERNAL_ERROR',
      message: statusCode >= 500 ? guardrails.policy.messages.general_error : error.message
    });
  });

  // Health endpoint
  app.get('/api/health', async () => {
    return {
      status: 'healthy',
      version: VERSION,
      backends: deps.backends,
      policy_profile: guardrails.policy.name
    };
  });

  // One guarded chat turn
  app.post<{ Body: ChatRequest }>('/api/chat', { schema: { body: chatBodySchema } }, async (request, reply) => {
    const startTime = Date.now();
    const body = request.body;
    const requestId = body.request_id || uuidv4();
    // Callers without a session id share one session per client address
    const sessionId = body.session_id || `anon:${request.ip}`;

    const outcome = await orchestrator.runTurn({ sessionId, message: body.message });
    const response = toChatResponse(outcome, { requestId, sessionId }, guardrails.policy.name, startTime);

    if (outcome.state === 'rejected' && outcome.code === 'RATE_LIMITED') {
      reply.header('Retry-After', String(Math.max(1, Math.ceil(outcome.retryAfterMs / 1000))));
    }

    logger.info({
      request_id: requestId,
      session_id: sessionId,
      status: response.status,
      error_code: response.error_code,
      processing_time_ms: response.stats.processing_time_ms
    }, 'Request processed');

    reply.status(statusFor(outcome));
    return response;
  });

  app.post<{ Body: ValidateInputRequest }>('/api/validate/input', { schema: { body: textBodySchema } }, async request => {
    const verdict = guardrails.validateInput(request.body.text, request.body.session_id);
    return serializeInputVerdict(verdict);
  });

  app.post<{ Body: TextRequest }>('/api/validate/output', { schema: { body: textBodySchema } }, async request => {
    return serializeOutputVerdict(guardrails.validateOutput(request.body.text));
  });

  app.post<{ Body: TextRequest }>('/api/redact', { schema: { body: textBodySchema } }, async request => {
    return { text: guardrails.redactPII(request.body.text) };
  });

  app.get<{ Params: { id: string } }>('/api/sessions/:id/history', async request => {
    return {
      session_id: request.params.id,
      messages: history.list(request.params.id)
    };
  });

  app.delete<{ Params: { id: string } }>('/api/sessions/:id/history', async (request, reply) => {
    history.clear(request.params.id);
    return reply.status(204).send();
  });

  return app;
}
