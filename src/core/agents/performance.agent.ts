import { Finding } from '../domain/entities/finding.entity';
import { BaseReviewAgent, dedupeBy, sortBySeverity } from './review-agent';

export class PerformanceAgent extends BaseReviewAgent {
  readonly name = 'Performance';
  readonly modelKind = 'code';
  readonly temperature = 0.1;
  readonly systemPrompt = [
    'You are a performance optimization expert reviewing code.',
    'Focus on: time complexity, memory usage, database queries, caching opportunities.',
    'Identify O(n²) or worse algorithms, N+1 queries, memory leaks.',
  ].join('\n');

  protected readonly role = 'As a performance optimization expert';
  protected readonly focus = [
    'Time complexity (O(n²) or worse algorithms)',
    'N+1 queries and database access inside loops',
    'Memory usage and leaks',
    'Inefficient string building and data structure choices',
    'Caching opportunities',
    'Blocking I/O on hot paths',
  ];
  protected readonly categories = ['complexity', 'database', 'memory', 'io', 'caching', 'other'];
  protected readonly scopeNote = 'Only report issues with a real performance impact, not style or security concerns.';

  static readonly MAX_FINDINGS = 15;

  filterFindings(findings: readonly Finding[]): Finding[] {
    const unique = dedupeBy(
      findings,
      finding => `${finding.lineNumber}\u0000${finding.category}\u0000${finding.message.slice(0, 30)}`,
    );
    return sortBySeverity(unique).slice(0, PerformanceAgent.MAX_FINDINGS);
  }
}
