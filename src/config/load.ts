import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { parse as parseYaml } from 'yaml';

import type { GuardrailsPolicy } from '../types/index.js';
import { PATTERN_CATEGORIES } from '../types/index.js';
import type { BackendType, InferenceBackend } from '../inference/router.js';
import { BACKEND_TYPES } from '../inference/router.js';
import { DEFAULT_CONFIG_PATHS, DEFAULT_POLICY, defaultConfig, type AppConfig } from './defaults.js';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

type YamlRecord = Record<string, unknown>;

function isRecord(value: unknown): value is YamlRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(obj: YamlRecord, key: string, field: string): YamlRecord {
  const value = obj[key];
  if (value === undefined) return {};
  if (!isRecord(value)) {
    throw new ConfigError(`Config field "${field}" must be a mapping`);
  }
  return value;
}

function readString(obj: YamlRecord, key: string, fallback: string, field: string): string {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigError(`Config field "${field}" must be a non-empty string`);
  }
  return value;
}

function readNumber(obj: YamlRecord, key: string, fallback: number, field: string): number {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw new ConfigError(`Config field "${field}" must be a non-negative number`);
  }
  return value;
}

function readBoolean(obj: YamlRecord, key: string, fallback: boolean, field: string): boolean {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'boolean') {
    throw new ConfigError(`Config field "${field}" must be a boolean`);
  }
  return value;
}

function readStringArray(obj: YamlRecord, key: string, fallback: string[], field: string): string[] {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (!Array.isArray(value)) {
    throw new ConfigError(`Config field "${field}" must be a list of strings`);
  }
  return value.map((item: unknown, i) => {
    if (typeof item !== 'string') {
      throw new ConfigError(`Config field "${field}[${i}]" must be a string`);
    }
    return item;
  });
}

function readYaml(path: string): unknown {
  try {
    const raw: unknown = parseYaml(readFileSync(path, 'utf-8'));
    return raw;
  } catch (err) {
    throw new ConfigError(
      `Failed to read "${path}": ${err instanceof Error ? err.message : String(err)}`
    );
  }
}

function isBackendType(value: unknown): value is BackendType {
  return BACKEND_TYPES.some(t => t === value);
}

function parseBackends(value: unknown, fallback: InferenceBackend[]): InferenceBackend[] {
  if (value === undefined) return fallback;
  if (!Array.isArray(value) || value.length === 0) {
    throw new ConfigError('Config field "inference.backends" must be a non-empty list');
  }

  return value.map((entry: unknown, i) => {
    const field = `inference.backends[${i}]`;
    if (!isRecord(entry)) {
      throw new ConfigError(`Config field "${field}" must be a mapping`);
    }
    if (!isBackendType(entry['type'])) {
      throw new ConfigError(
        `Config field "${field}.type" must be one of: ${BACKEND_TYPES.join(', ')}`
      );
    }
    const backend: InferenceBackend = {
      name: readString(entry, 'name', '', `${field}.name`),
      type: entry['type'],
      model: readString(entry, 'model', '', `${field}.model`)
    };
    if (!backend.name || !backend.model) {
      throw new ConfigError(`Config field "${field}" needs a name and a model`);
    }
    if (entry['baseUrl'] !== undefined) {
      backend.baseUrl = readString(entry, 'baseUrl', '', `${field}.baseUrl`);
    }
    return backend;
  });
}

export function parseConfig(raw: unknown, base: AppConfig = defaultConfig()): AppConfig {
  if (raw === null || raw === undefined) return base;
  if (!isRecord(raw)) {
    throw new ConfigError('Config must be a YAML mapping');
  }

  const server = section(raw, 'server', 'server');
  const cors = section(raw, 'cors', 'cors');
  const inference = section(raw, 'inference', 'inference');
  const generation = section(inference, 'generation', 'inference.generation');
  const policies = section(raw, 'policies', 'policies');
  const logging = section(raw, 'logging', 'logging');

  const backends = parseBackends(inference['backends'], base.inference.backends);
  const defaultBackend = readString(inference, 'default', base.inference.default, 'inference.default');
  if (!backends.some(b => b.name === defaultBackend)) {
    throw new ConfigError(`Default backend "${defaultBackend}" is not configured`);
  }

  return {
    server: {
      port: readNumber(server, 'port', base.server.port, 'server.port'),
      host: readString(server, 'host', base.server.host, 'server.host')
    },
    cors: {
      allowed_origins: readStringArray(
        cors,
        'allowed_origins',
        base.cors.allowed_origins,
        'cors.allowed_origins'
      )
    },
    inference: {
      backends,
      default: defaultBackend,
      system_prompt: readString(
        inference,
        'system_prompt',
        base.inference.system_prompt,
        'inference.system_prompt'
      ),
      generation: {
        temperature: readNumber(generation, 'temperature', base.inference.generation.temperature, 'inference.generation.temperature'),
        top_p: readNumber(generation, 'top_p', base.inference.generation.top_p, 'inference.generation.top_p'),
        top_k: readNumber(generation, 'top_k', base.inference.generation.top_k, 'inference.generation.top_k'),
        max_output_tokens: readNumber(
          generation,
          'max_output_tokens',
          base.inference.generation.max_output_tokens,
          'inference.generation.max_output_tokens'
        )
      }
    },
    policies: {
      directory: readString(policies, 'directory', base.policies.directory, 'policies.directory'),
      default: readString(policies, 'default', base.policies.default, 'policies.default')
    },
    logging: {
      level: readString(logging, 'level', base.logging.level, 'logging.level'),
      pretty: readBoolean(logging, 'pretty', base.logging.pretty, 'logging.pretty')
    }
  };
}

/** First existing file of `paths` wins; built-in defaults when none exists. */
export function loadConfig(paths: string[] = DEFAULT_CONFIG_PATHS): AppConfig {
  for (const path of paths) {
    if (existsSync(path)) {
      return parseConfig(readYaml(path));
    }
  }
  return defaultConfig();
}

/** Overlays a parsed policy document on `base`; missing keys keep the base value. */
export function parsePolicy(raw: unknown, base: GuardrailsPolicy = DEFAULT_POLICY): GuardrailsPolicy {
  if (raw === null || raw === undefined) return base;
  if (!isRecord(raw)) {
    throw new ConfigError('Policy must be a YAML mapping');
  }

  const checks = section(raw, 'checks', 'checks');
  const limits = section(raw, 'limits', 'limits');
  const messages = section(raw, 'messages', 'messages');
  const patterns = section(raw, 'patterns', 'patterns');

  const bool = (key: keyof GuardrailsPolicy['checks']) =>
    readBoolean(checks, key, base.checks[key], `checks.${key}`);
  const num = (key: keyof GuardrailsPolicy['limits']) =>
    readNumber(limits, key, base.limits[key], `limits.${key}`);
  const msg = (key: keyof GuardrailsPolicy['messages']) =>
    readString(messages, key, base.messages[key], `messages.${key}`);

  const extraPatterns = { ...base.patterns };
  for (const category of PATTERN_CATEGORIES) {
    const sources = readStringArray(patterns, category, base.patterns[category], `patterns.${category}`);
    for (const source of sources) {
      try {
        new RegExp(source, 'i');
      } catch (err) {
        throw new ConfigError(
          `Invalid pattern in "patterns.${category}": ${err instanceof Error ? err.message : String(err)}`
        );
      }
    }
    extraPatterns[category] = sources;
  }

  return {
    name: readString(raw, 'name', base.name, 'name'),
    version: readString(raw, 'version', base.version, 'version'),
    checks: {
      input_validation: bool('input_validation'),
      output_validation: bool('output_validation'),
      pii_detection: bool('pii_detection'),
      harmful_content: bool('harmful_content'),
      prompt_injection: bool('prompt_injection'),
      hallucination: bool('hallucination'),
      rate_limiting: bool('rate_limiting'),
      hallucination_disclaimer: bool('hallucination_disclaimer'),
      record_rejected_input: bool('record_rejected_input')
    },
    limits: {
      max_requests_per_window: num('max_requests_per_window'),
      window_seconds: num('window_seconds'),
      hallucination_threshold: num('hallucination_threshold'),
      harmful_content_threshold: num('harmful_content_threshold'),
      max_history_messages: num('max_history_messages'),
      max_conversation_tokens: num('max_conversation_tokens')
    },
    messages: {
      harmful_content: msg('harmful_content'),
      prompt_injection: msg('prompt_injection'),
      output_harmful: msg('output_harmful'),
      rate_limited: msg('rate_limited'),
      hallucination_disclaimer: msg('hallucination_disclaimer'),
      general_error: msg('general_error')
    },
    patterns: extraPatterns,
    redaction_marker: readString(raw, 'redaction_marker', base.redaction_marker, 'redaction_marker')
  };
}

export function loadPolicy(directory: string, name: string): GuardrailsPolicy {
  const policyPath = resolve(directory, `${name}.yaml`);

  if (existsSync(policyPath)) {
    return parsePolicy(readYaml(policyPath));
  }

  return DEFAULT_POLICY;
}
