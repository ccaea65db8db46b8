import { readFileSync } from 'fs';
import * as Joi from 'joi';
import { Logger } from '@nestjs/common';
import { parse as parseYaml } from 'yaml';
import { ForcedFault } from '../modules/runtime/interfaces/runtime.interfaces';

/**
 * Injection token for the loaded mock settings
 */
export const MOCK_SETTINGS = 'MOCK_SETTINGS';

/**
 * Mock behaviour settings, immutable for the life of the process
 */
export interface MockSettings {
  server: {
    port: number;
    latencyMs: number;
  };
  rateLimit: {
    enabled: boolean;
    /** Advisory only, reported in rate-limit headers */
    requestsPerMinute: number;
    /** Every request from the Nth on is rate limited; 0 disables */
    failAfterRequests: number;
  };
  errors: {
    /** Probability in [0, 1] of a random fault per request */
    errorRate: number;
    forceError: ForcedFault;
  };
  auth: {
    requireAuth: boolean;
    validKeys: string[];
  };
  providers: {
    openaiChat: boolean;
    anthropic: boolean;
    gemini: boolean;
    openaiResponses: boolean;
  };
  content: {
    deterministic: boolean;
    seed: number;
  };
}

/**
 * Settings document as written on disk (snake_case keys)
 */
export interface SettingsDocument {
  server: { port: number; latency_ms: number };
  rate_limit: {
    enabled: boolean;
    requests_per_minute: number;
    fail_after_requests: number;
  };
  errors: { error_rate: number; force_error: ForcedFault };
  auth: { require_auth: boolean; valid_keys: string[] };
  providers: {
    openai_chat: boolean;
    anthropic: boolean;
    gemini: boolean;
    openai_responses: boolean;
  };
  content: { deterministic: boolean; seed: number };
}

export const settingsDocumentSchema = Joi.object<SettingsDocument>({
  server: Joi.object({
    port: Joi.number().port().default(8787),
    latency_ms: Joi.number().integer().min(0).default(0),
  }).default(),
  rate_limit: Joi.object({
    enabled: Joi.boolean().default(false),
    requests_per_minute: Joi.number().integer().min(1).default(60),
    fail_after_requests: Joi.number().integer().min(0).default(0),
  }).default(),
  errors: Joi.object({
    error_rate: Joi.number().min(0).max(1).default(0),
    force_error: Joi.string()
      .valid('none', 'unauthorized', 'rate_limit', 'server_error', 'timeout')
      .default('none'),
  }).default(),
  auth: Joi.object({
    require_auth: Joi.boolean().default(false),
    valid_keys: Joi.array().items(Joi.string()).default([]),
  }).default(),
  providers: Joi.object({
    openai_chat: Joi.boolean().default(true),
    anthropic: Joi.boolean().default(true),
    gemini: Joi.boolean().default(true),
    openai_responses: Joi.boolean().default(true),
  }).default(),
  content: Joi.object({
    deterministic: Joi.boolean().default(false),
    seed: Joi.number().integer().min(0).default(42),
  }).default(),
});

export class SettingsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SettingsError';
  }
}

/**
 * Validate a parsed settings document and apply defaults
 */
export function parseMockSettings(document: unknown): MockSettings {
  const result = settingsDocumentSchema.validate(document ?? {}, {
    abortEarly: true,
  });

  if (result.error !== undefined) {
    throw new SettingsError(`Invalid mock settings: ${result.error.message}`);
  }
  const { value } = result;

  return {
    server: {
      port: value.server.port,
      latencyMs: value.server.latency_ms,
    },
    rateLimit: {
      enabled: value.rate_limit.enabled,
      requestsPerMinute: value.rate_limit.requests_per_minute,
      failAfterRequests: value.rate_limit.fail_after_requests,
    },
    errors: {
      errorRate: value.errors.error_rate,
      forceError: value.errors.force_error,
    },
    auth: {
      requireAuth: value.auth.require_auth,
      validKeys: value.auth.valid_keys,
    },
    providers: {
      openaiChat: value.providers.openai_chat,
      anthropic: value.providers.anthropic,
      gemini: value.providers.gemini,
      openaiResponses: value.providers.openai_responses,
    },
    content: {
      deterministic: value.content.deterministic,
      seed: value.content.seed,
    },
  };
}

export function defaultMockSettings(): MockSettings {
  return parseMockSettings({});
}

/**
 * Load the settings document from disk. A missing file means defaults,
 * anything unreadable or invalid is fatal.
 */
export function loadMockSettings(
  path: string,
  logger = new Logger('MockSettings'),
): MockSettings {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      logger.log(`No settings file at ${path}, using defaults`);
      return defaultMockSettings();
    }
    throw error;
  }

  let document: unknown;
  try {
    document = parseYaml(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new SettingsError(`Failed to parse ${path}: ${message}`);
  }

  const settings = parseMockSettings(document);
  logger.log(`Loaded mock settings from ${path}`);
  return settings;
}

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}
