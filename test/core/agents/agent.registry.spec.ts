import { describe, it, expect } from 'vitest';
import { AgentRegistry, createAgentRegistry } from '../../../src/core/agents/agent.registry';
import { SecurityAgent } from '../../../src/core/agents/security.agent';
import { ReviewRejectedError } from '../../../src/core/domain/errors/review.errors';

describe('AgentRegistry', () => {
  it('should build only the enabled built-in agents, in registration order', () => {
    const registry = createAgentRegistry(['Documentation', 'Security']);

    expect(registry.names()).toEqual(['Security', 'Documentation']);
  });

  it('should resolve every registered agent when no list is given', () => {
    const registry = createAgentRegistry(['Security', 'Performance', 'Style', 'Documentation']);

    expect(registry.resolve().map(agent => agent.name)).toEqual(['Security', 'Performance', 'Style', 'Documentation']);
  });

  it('should resolve an explicit list in the order given, without repeats', () => {
    const registry = createAgentRegistry(['Security', 'Performance', 'Style']);

    expect(registry.resolve(['Style', 'Security', 'Style']).map(agent => agent.name)).toEqual(['Style', 'Security']);
  });

  it('should reject unknown or disabled agents', () => {
    const registry = createAgentRegistry(['Security']);

    expect(() => registry.resolve(['Security', 'Style'])).toThrow(ReviewRejectedError);
    expect(() => registry.resolve(['Style'])).toThrow('Unknown or disabled agent(s): Style. Available: Security');
  });

  it('should reject a review when no agent is enabled', () => {
    expect(() => new AgentRegistry().resolve()).toThrow(new ReviewRejectedError('No agents enabled for this review'));
    expect(() => createAgentRegistry(['Security']).resolve([])).toThrow(ReviewRejectedError);
  });

  it('should refuse to register the same name twice', () => {
    const registry = new AgentRegistry([new SecurityAgent()]);

    expect(() => registry.register(new SecurityAgent())).toThrow('Agent Security is already registered');
  });
});
