import { Finding, Severity } from '../domain/entities/finding.entity';
import { BaseReviewAgent, sortBySeverity } from './review-agent';

export class StyleAgent extends BaseReviewAgent {
  readonly name = 'Style';
  readonly modelKind = 'code';
  readonly temperature = 0.1;
  readonly systemPrompt = [
    'You are a code style expert ensuring clean, readable code.',
    'Focus on: naming conventions, code organization, DRY principles, readability.',
    'Reference language-specific style guides (PEP8, ESLint, etc.).',
  ].join('\n');

  protected readonly role = 'As a code style expert';
  protected readonly focus = [
    'Naming conventions',
    'Code organization and function length',
    'Duplicated logic (DRY)',
    'Readability and consistent formatting',
    'Language-specific style guide violations',
  ];
  protected readonly categories = ['naming', 'organization', 'duplication', 'readability', 'formatting', 'other'];
  protected readonly scopeNote = 'Only report style and readability issues, not security or performance concerns.';

  static readonly MAX_FINDINGS = 20;
  /** Past this many kept findings, LOW ones are dropped. */
  static readonly LOW_SEVERITY_CUTOFF = 10;

  filterFindings(findings: readonly Finding[]): Finding[] {
    const seen = new Set<string>();
    const kept: Finding[] = [];

    for (const finding of findings) {
      if (kept.length > StyleAgent.LOW_SEVERITY_CUTOFF && finding.severity === Severity.LOW) {
        continue;
      }
      const key = `${finding.lineNumber}\u0000${finding.category}`;
      if (!seen.has(key)) {
        seen.add(key);
        kept.push(finding);
      }
    }

    return sortBySeverity(kept, true).slice(0, StyleAgent.MAX_FINDINGS);
  }
}
