import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface ReviewSettings {
  /** Agents enabled by the ENABLE_*_AGENT flags, in registration order. */
  enabledAgents: string[];
  /** Worker-pool ceiling shared by every active review. */
  maxConcurrentTasks: number;
  maxRequestsPerMinute: number;
  /** Timeout of a single model call. */
  taskTimeoutMs: number;
  retry: RetryPolicy;
  /** 0 disables the review-level timeout. */
  reviewTimeoutMs: number;
  maxTokens: number;
}

export const AGENT_FLAGS: ReadonlyArray<readonly [agentName: string, flag: string]> = [
  ['Security', 'ENABLE_SECURITY_AGENT'],
  ['Performance', 'ENABLE_PERFORMANCE_AGENT'],
  ['Style', 'ENABLE_STYLE_AGENT'],
  ['Documentation', 'ENABLE_DOCS_AGENT'],
];

export const DEFAULT_REVIEW_SETTINGS: ReviewSettings = {
  enabledAgents: AGENT_FLAGS.map(([agentName]) => agentName),
  maxConcurrentTasks: 5,
  maxRequestsPerMinute: 60,
  taskTimeoutMs: 30_000,
  retry: {
    maxAttempts: 3,
    baseDelayMs: 1_000,
    maxDelayMs: 30_000,
  },
  reviewTimeoutMs: 0,
  maxTokens: 2048,
};

const logger = new Logger('ReviewSettings');

function readRaw(config: ConfigService, key: string): string | undefined {
  const value = config.get<string | number | boolean>(key);
  if (value === undefined || value === null) {
    return undefined;
  }
  const text = String(value).trim();
  return text === '' ? undefined : text;
}

function readInteger(config: ConfigService, key: string, fallback: number, min: number): number {
  const raw = readRaw(config, key);
  if (raw === undefined) {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    logger.warn(`Ignoring ${key}=${raw}: expected an integer >= ${min}, using ${fallback}`);
    return fallback;
  }
  return value;
}

function readBoolean(config: ConfigService, key: string, fallback: boolean): boolean {
  const raw = readRaw(config, key);
  if (raw === undefined) {
    return fallback;
  }

  switch (raw.toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
    case 'on':
      return true;
    case 'false':
    case '0':
    case 'no':
    case 'off':
      return false;
    default:
      logger.warn(`Ignoring ${key}=${raw}: expected a boolean, using ${fallback}`);
      return fallback;
  }
}

export function loadReviewSettings(config: ConfigService): ReviewSettings {
  const defaults = DEFAULT_REVIEW_SETTINGS;

  return {
    enabledAgents: AGENT_FLAGS
      .filter(([, flag]) => readBoolean(config, flag, true))
      .map(([agentName]) => agentName),
    maxConcurrentTasks: readInteger(config, 'MAX_CONCURRENT_TASKS', defaults.maxConcurrentTasks, 1),
    maxRequestsPerMinute: readInteger(config, 'MAX_REQUESTS_PER_MINUTE', defaults.maxRequestsPerMinute, 1),
    taskTimeoutMs: readInteger(config, 'MODEL_TIMEOUT', defaults.taskTimeoutMs / 1000, 1) * 1000,
    retry: {
      maxAttempts: readInteger(config, 'MODEL_MAX_ATTEMPTS', defaults.retry.maxAttempts, 1),
      baseDelayMs: readInteger(config, 'RETRY_BASE_DELAY_MS', defaults.retry.baseDelayMs, 0),
      maxDelayMs: readInteger(config, 'RETRY_MAX_DELAY_MS', defaults.retry.maxDelayMs, 0),
    },
    reviewTimeoutMs: readInteger(config, 'REVIEW_TIMEOUT', defaults.reviewTimeoutMs / 1000, 0) * 1000,
    maxTokens: readInteger(config, 'MODEL_MAX_TOKENS', defaults.maxTokens, 1),
  };
}
