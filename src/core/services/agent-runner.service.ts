import { Inject, Injectable, Logger } from '@nestjs/common';
import type { ReviewAgent } from '../agents/review-agent';
import type { RetryPolicy, ReviewSettings } from '../config/review.settings';
import { AGENT_FAILURE_CATEGORY, AgentResult } from '../domain/entities/agent-result.entity';
import { Finding, Severity } from '../domain/entities/finding.entity';
import { ReviewFile } from '../domain/entities/review-request.entity';
import { AgentTimeoutError, describeError, isTransientFailure } from '../domain/errors/review.errors';
import { MODEL_REPOSITORY_TOKEN, REVIEW_SETTINGS_TOKEN } from '../domain/repositories/injection-tokens';
import type { ModelRepository, ModelRequest } from '../domain/repositories/model.repository';
import { abortError, rejectOnAbort, sleep, throwIfAborted } from '../orchestration/abort';
import { OrchestrationContext } from '../orchestration/orchestration.context';
import { parseFindings } from './finding.parser';

export interface AgentTask {
  file: ReviewFile;
  agent: ReviewAgent;
  /** Aborted when the owning review is cancelled. */
  signal: AbortSignal;
}

export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
}

/**
 * Runs one (file, agent) unit of a review.
 *
 * Model failures never escape: after the attempts are spent the result degrades to a
 * single `agent_failure` finding. The only error `run` rejects with is the abort
 * reason of a cancelled review.
 */
@Injectable()
export class AgentRunner {
  private readonly logger = new Logger(AgentRunner.name);

  constructor(
    private readonly context: OrchestrationContext,
    @Inject(MODEL_REPOSITORY_TOKEN) private readonly model: ModelRepository,
    @Inject(REVIEW_SETTINGS_TOKEN) private readonly settings: ReviewSettings,
  ) {}

  async run({ file, agent, signal }: AgentTask): Promise<AgentResult> {
    const startedAt = Date.now();
    const { maxAttempts } = this.settings.retry;
    let lastError: unknown;
    let attempt = 0;

    while (attempt < maxAttempts) {
      attempt++;
      throwIfAborted(signal);

      try {
        const request = this.buildRequest(file, agent);
        await this.context.rateLimiter.acquire(signal);
        const raw = await this.invoke(request, signal);
        const findings = agent.filterFindings(parseFindings(raw, file.path));

        this.logger.debug(`${agent.name} found ${findings.length} issue(s) in ${file.path} (attempt ${attempt})`);
        return new AgentResult(agent.name, file.path, findings, Date.now() - startedAt, new Date(), attempt);
      } catch (error) {
        if (signal.aborted) {
          throw abortError(signal);
        }

        lastError = error;
        if (!isTransientFailure(error)) {
          this.logger.warn(`${agent.name} failed on ${file.path} with a non-retryable error: ${describeError(error)}`);
          break;
        }

        if (attempt < maxAttempts) {
          const delay = backoffDelay(attempt, this.settings.retry);
          this.logger.warn(
            `${agent.name} attempt ${attempt}/${maxAttempts} on ${file.path} failed (${describeError(error)}), retrying in ${delay}ms`,
          );
          await sleep(delay, signal);
        }
      }
    }

    return this.degrade(file, agent, attempt, lastError, startedAt);
  }

  private buildRequest(file: ReviewFile, agent: ReviewAgent): ModelRequest {
    return {
      modelKind: agent.modelKind,
      temperature: agent.temperature,
      maxTokens: this.settings.maxTokens,
      messages: [
        { role: 'system', content: agent.systemPrompt },
        { role: 'user', content: agent.buildPrompt(file) },
      ],
    };
  }

  /**
   * One model call bounded by the task timeout. The call gets its own signal that
   * aborts on timeout or when the review is cancelled.
   */
  private async invoke(request: ModelRequest, signal: AbortSignal): Promise<string> {
    throwIfAborted(signal);
    const controller = new AbortController();
    const forwardAbort = () => controller.abort(signal.reason);
    signal.addEventListener('abort', forwardAbort, { once: true });

    const timeoutMs = this.settings.taskTimeoutMs;
    const timer = setTimeout(() => controller.abort(new AgentTimeoutError(timeoutMs)), timeoutMs);

    try {
      return await Promise.race([this.model.complete(request, controller.signal), rejectOnAbort(controller.signal)]);
    } catch (error) {
      // the transport may reject with its own cancel error; report the abort reason instead
      if (controller.signal.aborted) {
        throw abortError(controller.signal);
      }
      throw error;
    } finally {
      clearTimeout(timer);
      signal.removeEventListener('abort', forwardAbort);
    }
  }

  private degrade(file: ReviewFile, agent: ReviewAgent, attempts: number, error: unknown, startedAt: number): AgentResult {
    const reason = describeError(error);
    this.logger.warn(`${agent.name} gave up on ${file.path} after ${attempts} attempt(s): ${reason}`);

    const diagnostic = new Finding(
      0,
      Severity.LOW,
      AGENT_FAILURE_CATEGORY,
      `${agent.name} agent could not analyze this file after ${attempts} attempt(s): ${reason}`,
      'Re-run the review once the model backend is reachable and answering in the expected JSON format.',
      file.path,
    );

    return new AgentResult(agent.name, file.path, [diagnostic], Date.now() - startedAt, new Date(), attempts, true, reason);
  }
}
