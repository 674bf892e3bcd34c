import { ReviewSettings } from '../../src/core/config/review.settings';

export function makeSettings(overrides: Partial<ReviewSettings> = {}): ReviewSettings {
  return {
    enabledAgents: ['Security', 'Performance', 'Style', 'Documentation'],
    maxConcurrentTasks: 5,
    maxRequestsPerMinute: 1000,
    taskTimeoutMs: 1000,
    retry: { maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 1000 },
    reviewTimeoutMs: 0,
    maxTokens: 512,
    ...overrides,
  };
}
