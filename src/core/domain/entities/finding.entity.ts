export enum Severity {
  CRITICAL = 'CRITICAL',
  HIGH = 'HIGH',
  MEDIUM = 'MEDIUM',
  LOW = 'LOW',
  INFO = 'INFO',
}

/**
 * Severities from most to least severe. Breakdowns and rankings iterate in this order.
 */
export const SEVERITY_RANK: readonly Severity[] = [
  Severity.CRITICAL,
  Severity.HIGH,
  Severity.MEDIUM,
  Severity.LOW,
  Severity.INFO,
];

export function severityRank(severity: Severity): number {
  return SEVERITY_RANK.indexOf(severity);
}

/**
 * Normalizes a severity label coming from model output ("high", " Critical ").
 * Anything unrecognized maps to the fallback.
 */
export function parseSeverity(value: unknown, fallback: Severity = Severity.MEDIUM): Severity {
  const normalized = String(value ?? '').trim().toUpperCase();
  return SEVERITY_RANK.find(severity => severity === normalized) ?? fallback;
}

export interface FindingJson {
  line_number: number;
  severity: Severity;
  category: string;
  message: string;
  suggestion: string;
  file_path: string;
  timestamp: string;
}

/**
 * One issue reported by one agent for one file.
 *
 * `category` is an opaque key: a compound tag such as "complexity|database"
 * is counted as a single category and never split.
 */
export class Finding {
  constructor(
    public readonly lineNumber: number,
    public readonly severity: Severity,
    public readonly category: string,
    public readonly message: string,
    public readonly suggestion: string,
    public readonly filePath: string,
    public readonly timestamp: Date = new Date(),
  ) {
    Object.freeze(this);
  }

  toJSON(): FindingJson {
    return {
      line_number: this.lineNumber,
      severity: this.severity,
      category: this.category,
      message: this.message,
      suggestion: this.suggestion,
      file_path: this.filePath,
      timestamp: this.timestamp.toISOString(),
    };
  }
}
