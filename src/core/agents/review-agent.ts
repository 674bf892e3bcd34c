import { Finding, severityRank } from '../domain/entities/finding.entity';
import { ReviewFile } from '../domain/entities/review-request.entity';
import type { ModelKind } from '../domain/repositories/model.repository';

/** Full file content sent alongside the diff is cut to this many characters. */
export const MAX_CONTENT_CHARS = 3000;

/**
 * A specialized reviewer. Agents only describe what to ask the model and how to
 * trim what comes back; the AgentRunner does the calling, retrying and parsing.
 */
export interface ReviewAgent {
  readonly name: string;
  readonly modelKind: ModelKind;
  readonly temperature: number;
  readonly systemPrompt: string;
  buildPrompt(file: ReviewFile): string;
  filterFindings(findings: readonly Finding[]): Finding[];
}

export abstract class BaseReviewAgent implements ReviewAgent {
  abstract readonly name: string;
  abstract readonly modelKind: ModelKind;
  abstract readonly temperature: number;
  abstract readonly systemPrompt: string;

  /** Opening sentence of the prompt, e.g. "As a security expert". */
  protected abstract readonly role: string;
  protected abstract readonly focus: readonly string[];
  protected abstract readonly categories: readonly string[];
  protected abstract readonly scopeNote: string;

  abstract filterFindings(findings: readonly Finding[]): Finding[];

  buildPrompt(file: ReviewFile): string {
    const parts = [
      `${this.role}, review the following code changes in ${file.path}:`,
      '',
      'Focus on these concerns:',
      ...this.focus.map((item, index) => `${index + 1}. ${item}`),
      '',
      '=== CODE DIFF ===',
      file.diff,
      '',
    ];

    if (file.content) {
      parts.push('=== FULL FILE CONTENT (truncated) ===', file.content.slice(0, MAX_CONTENT_CHARS), '');
    }

    const example = {
      issues: [
        {
          line_number: 'line number where the issue occurs',
          severity: 'CRITICAL|HIGH|MEDIUM|LOW|INFO',
          category: this.categories.join('|'),
          message: 'clear description of the issue',
          suggestion: 'specific fix',
        },
      ],
    };

    parts.push(
      'Provide your review in the following JSON format:',
      JSON.stringify(example, null, 2),
      '',
      this.scopeNote,
      'Return only valid JSON without any additional text.',
    );

    return parts.join('\n');
  }
}

export function dedupeBy(findings: readonly Finding[], key: (finding: Finding) => string): Finding[] {
  const seen = new Set<string>();
  const unique: Finding[] = [];
  for (const finding of findings) {
    const value = key(finding);
    if (!seen.has(value)) {
      seen.add(value);
      unique.push(finding);
    }
  }
  return unique;
}

/** Stable: findings of equal rank keep their relative order. */
export function sortBySeverity(findings: Finding[], thenByLine = false): Finding[] {
  return findings.sort((a, b) => {
    const bySeverity = severityRank(a.severity) - severityRank(b.severity);
    if (bySeverity !== 0 || !thenByLine) {
      return bySeverity;
    }
    return a.lineNumber - b.lineNumber;
  });
}
