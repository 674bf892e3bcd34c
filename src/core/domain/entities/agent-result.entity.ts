import { Finding } from './finding.entity';

export const AGENT_FAILURE_CATEGORY = 'agent_failure';

/**
 * Output of one agent for one file. Findings keep the order the agent produced them in.
 * A degraded result carries a single `agent_failure` diagnostic instead of real findings.
 */
export class AgentResult {
  constructor(
    public readonly agentName: string,
    public readonly filePath: string,
    public readonly findings: readonly Finding[],
    public readonly durationMs: number,
    public readonly completedAt: Date,
    public readonly attempts: number,
    public readonly degraded: boolean = false,
    public readonly error?: string,
  ) {}
}
