export * from './types/index.js';
export * from './patterns/index.js';
export * from './rate-limit/index.js';
export * from './gates/index.js';
export * from './filters/index.js';
export * from './config/index.js';
export * from './inference/index.js';
export * from './format/index.js';
export * from './history/index.js';
export * from './orchestrator/index.js';
export { Guardrails, type GuardrailsOptions } from './guardrails.js';
export { buildServer, serializeInputVerdict, serializeOutputVerdict, VERSION, type ServerDeps } from './server.js';
export { createLogger, excerpt, type Logger, type LoggerOptions } from './logger.js';
