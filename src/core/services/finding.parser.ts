import { Finding, parseSeverity } from '../domain/entities/finding.entity';
import { MalformedAgentOutputError } from '../domain/errors/review.errors';

export const DEFAULT_CATEGORY = 'general';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function text(value: unknown): string {
  if (value === undefined || value === null) {
    return '';
  }
  return (typeof value === 'string' ? value : String(value)).trim();
}

/**
 * First integer found in the value: models answer "12", 12, "12-14" or "[12, 20]".
 */
export function parseLineNumber(value: unknown): number {
  const match = /(\d+)/.exec(String(value ?? 0));
  return match ? Number.parseInt(match[1], 10) : 0;
}

/**
 * Parses a model answer of the form `{"issues": [...]}`. Models often wrap the
 * object in prose or code fences, so everything outside the outermost braces is ignored.
 *
 * @throws MalformedAgentOutputError when no usable object can be extracted
 */
export function parseFindings(raw: string, filePath: string, timestamp: Date = new Date()): Finding[] {
  const start = raw.indexOf('{');
  const end = raw.lastIndexOf('}');
  if (start === -1 || end <= start) {
    throw new MalformedAgentOutputError('model output contains no JSON object');
  }

  let data: unknown;
  try {
    data = JSON.parse(raw.slice(start, end + 1));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MalformedAgentOutputError(`model output is not valid JSON: ${reason}`);
  }

  if (!isRecord(data) || !Array.isArray(data.issues)) {
    throw new MalformedAgentOutputError('model output has no "issues" array');
  }

  return data.issues.filter(isRecord).map(
    issue =>
      new Finding(
        parseLineNumber(issue.line_number),
        parseSeverity(issue.severity),
        text(issue.category) || DEFAULT_CATEGORY,
        text(issue.message),
        text(issue.suggestion),
        filePath,
        timestamp,
      ),
  );
}
