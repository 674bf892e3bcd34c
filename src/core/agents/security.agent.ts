import { Finding } from '../domain/entities/finding.entity';
import { BaseReviewAgent, dedupeBy, sortBySeverity } from './review-agent';

export class SecurityAgent extends BaseReviewAgent {
  readonly name = 'Security';
  readonly modelKind = 'code';
  readonly temperature = 0.1;
  readonly systemPrompt = [
    'You are a security expert reviewing code for vulnerabilities.',
    'Focus on: SQL injection, XSS, authentication issues, exposed secrets, OWASP Top 10.',
    'Provide specific line numbers and severity levels (CRITICAL, HIGH, MEDIUM, LOW).',
  ].join('\n');

  protected readonly role = 'As a security expert';
  protected readonly focus = [
    'SQL injection vulnerabilities',
    'Cross-site scripting (XSS)',
    'Authentication and authorization issues',
    'Hardcoded secrets or credentials',
    'Insecure cryptography',
    'Path traversal vulnerabilities',
    'Code injection risks',
    'OWASP Top 10 vulnerabilities',
  ];
  protected readonly categories = ['sql_injection', 'xss', 'auth', 'secrets', 'crypto', 'path_traversal', 'injection', 'other'];
  protected readonly scopeNote = 'Only report actual security issues, not style or performance concerns.';

  static readonly MAX_FINDINGS = 20;

  filterFindings(findings: readonly Finding[]): Finding[] {
    const unique = dedupeBy(findings, finding => `${finding.lineNumber}\u0000${finding.message}`);
    return sortBySeverity(unique).slice(0, SecurityAgent.MAX_FINDINGS);
  }
}
