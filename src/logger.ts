import pino, { type Logger } from 'pino';

export type { Logger };

export interface LoggerOptions {
  level?: string;
  pretty?: boolean;
  name?: string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? process.env.LOG_LEVEL ?? 'info';

  if (options.pretty) {
    return pino({
      name: options.name ?? 'chat-guardrails',
      level,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true }
      }
    });
  }

  return pino({ name: options.name ?? 'chat-guardrails', level });
}

/** Truncated excerpt for log lines; callers pass already-redacted text. */
export function excerpt(text: string, max: number = 50): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}
