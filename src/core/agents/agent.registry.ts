import { ReviewRejectedError } from '../domain/errors/review.errors';
import { DocumentationAgent } from './documentation.agent';
import { PerformanceAgent } from './performance.agent';
import type { ReviewAgent } from './review-agent';
import { SecurityAgent } from './security.agent';
import { StyleAgent } from './style.agent';

/**
 * Agents available to reviews, by name. Each review picks its agents explicitly
 * from this set.
 */
export class AgentRegistry {
  private readonly agents = new Map<string, ReviewAgent>();

  constructor(agents: readonly ReviewAgent[] = []) {
    agents.forEach(agent => this.register(agent));
  }

  register(agent: ReviewAgent): void {
    if (this.agents.has(agent.name)) {
      throw new Error(`Agent ${agent.name} is already registered`);
    }
    this.agents.set(agent.name, agent);
  }

  names(): string[] {
    return [...this.agents.keys()];
  }

  /**
   * Resolves the agents a review asked for, in the order given. Without an explicit
   * list every registered agent runs.
   */
  resolve(names?: readonly string[]): ReviewAgent[] {
    const requested = [...new Set(names ?? this.names())];
    if (requested.length === 0) {
      throw new ReviewRejectedError('No agents enabled for this review');
    }

    const unknown = requested.filter(name => !this.agents.has(name));
    if (unknown.length > 0) {
      throw new ReviewRejectedError(
        `Unknown or disabled agent(s): ${unknown.join(', ')}. Available: ${this.names().join(', ') || 'none'}`,
      );
    }

    return requested.flatMap(name => {
      const agent = this.agents.get(name);
      return agent ? [agent] : [];
    });
  }
}

const BUILT_IN_AGENTS: ReadonlyArray<() => ReviewAgent> = [
  () => new SecurityAgent(),
  () => new PerformanceAgent(),
  () => new StyleAgent(),
  () => new DocumentationAgent(),
];

export function createAgentRegistry(enabled: readonly string[]): AgentRegistry {
  const wanted = new Set(enabled);
  return new AgentRegistry(
    BUILT_IN_AGENTS.map(create => create()).filter(agent => wanted.has(agent.name)),
  );
}
