import { loadConfig, loadPolicy, ConfigError } from './config/index.js';
import { Guardrails } from './guardrails.js';
import { InferenceRouter } from './inference/index.js';
import { InMemoryHistoryStore } from './history/index.js';
import { ChatTurnOrchestrator } from './orchestrator/index.js';
import { buildServer } from './server.js';
import { createLogger } from './logger.js';

async function main() {
  const config = loadConfig();

  const logger = createLogger({
    level: process.env.LOG_LEVEL || config.logging.level,
    pretty: config.logging.pretty
  });

  logger.info('chat-guardrails starting...');

  const policy = loadPolicy(config.policies.directory, config.policies.default);
  const guardrails = new Guardrails({ policy, logger });
  const history = new InMemoryHistoryStore(policy.limits.max_history_messages);

  const router = new InferenceRouter(config.inference.backends, config.inference.default, {
    systemPrompt: config.inference.system_prompt,
    generation: config.inference.generation
  });

  const orchestrator = new ChatTurnOrchestrator({
    guardrails,
    generator: router,
    history,
    logger
  });

  const app = await buildServer({
    config,
    guardrails,
    orchestrator,
    history,
    logger,
    backends: router.getAvailableBackends()
  });

  await app.listen({ port: config.server.port, host: config.server.host });
  logger.info({ policy: policy.name }, `chat-guardrails listening on ${config.server.host}:${config.server.port}`);
}

main().catch(err => {
  const message = err instanceof ConfigError ? err.message : String(err);
  createLogger().error({ err }, `Startup failed: ${message}`);
  process.exit(1);
});
