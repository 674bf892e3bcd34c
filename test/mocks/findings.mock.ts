import { AgentResult } from '../../src/core/domain/entities/agent-result.entity';
import { Finding, Severity } from '../../src/core/domain/entities/finding.entity';

export const FIXED_TIME = new Date('2026-03-01T10:00:00.000Z');

export interface FindingOverrides {
  lineNumber?: number;
  severity?: Severity;
  category?: string;
  message?: string;
  suggestion?: string;
  filePath?: string;
}

export function makeFinding(overrides: FindingOverrides = {}): Finding {
  return new Finding(
    overrides.lineNumber ?? 1,
    overrides.severity ?? Severity.MEDIUM,
    overrides.category ?? 'general',
    overrides.message ?? 'Something to look at',
    overrides.suggestion ?? '',
    overrides.filePath ?? 'src/app.ts',
    FIXED_TIME,
  );
}

export function makeResult(agentName: string, filePath: string, findings: Finding[]): AgentResult {
  return new AgentResult(agentName, filePath, findings, 5, FIXED_TIME, 1);
}
