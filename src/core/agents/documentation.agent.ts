import { Finding } from '../domain/entities/finding.entity';
import { BaseReviewAgent, sortBySeverity } from './review-agent';

export class DocumentationAgent extends BaseReviewAgent {
  readonly name = 'Documentation';
  readonly modelKind = 'general';
  readonly temperature = 0.2;
  readonly systemPrompt = [
    'You are a documentation expert reviewing code documentation.',
    'Focus on: docstrings, inline comments, README updates, API documentation.',
    'Ensure complex logic is explained and public APIs are documented.',
  ].join('\n');

  protected readonly role = 'As a documentation expert';
  protected readonly focus = [
    'Missing or outdated docstrings on public functions and classes',
    'Complex logic without explanatory comments',
    'Public API changes that need documentation updates',
    'Misleading or stale comments',
  ];
  protected readonly categories = ['docstring', 'comments', 'api_docs', 'readme', 'other'];
  protected readonly scopeNote = 'Only report documentation issues.';

  static readonly MAX_FINDINGS = 15;
  static readonly MAX_PER_CATEGORY = 3;

  filterFindings(findings: readonly Finding[]): Finding[] {
    const perCategory = new Map<string, number>();
    const kept: Finding[] = [];

    for (const finding of findings) {
      const count = perCategory.get(finding.category) ?? 0;
      if (count >= DocumentationAgent.MAX_PER_CATEGORY) {
        continue;
      }
      perCategory.set(finding.category, count + 1);
      kept.push(finding);
    }

    return sortBySeverity(kept, true).slice(0, DocumentationAgent.MAX_FINDINGS);
  }
}
