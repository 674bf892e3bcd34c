import { Finding, Severity, SEVERITY_RANK, severityRank } from '../domain/entities/finding.entity';
import { ReviewReport } from '../domain/entities/review-report.entity';

const SEVERITY_ICONS: Record<Severity, string> = {
  [Severity.CRITICAL]: '🔴',
  [Severity.HIGH]: '🟠',
  [Severity.MEDIUM]: '🟡',
  [Severity.LOW]: '🔵',
  [Severity.INFO]: 'ℹ️',
};

const MAX_OTHER_FINDINGS = 10;
const FOLD_THRESHOLD = 3;

interface AttributedFinding {
  agentName: string;
  finding: Finding;
}

function findingLine({ agentName, finding }: AttributedFinding): string {
  return `- **Line ${finding.lineNumber}** ${SEVERITY_ICONS[finding.severity]} \`${finding.severity}\` (${agentName}): ${finding.message}`;
}

function renderFile(filePath: string, findings: AttributedFinding[]): string[] {
  const ranked = [...findings].sort((a, b) => severityRank(a.finding.severity) - severityRank(b.finding.severity));
  const urgent = ranked.filter(({ finding }) => severityRank(finding.severity) <= severityRank(Severity.HIGH));
  const others = ranked.filter(({ finding }) => severityRank(finding.severity) > severityRank(Severity.HIGH));

  const lines = [`#### \`${filePath}\``, ''];
  for (const entry of urgent) {
    lines.push(findingLine(entry));
    if (entry.finding.suggestion) {
      lines.push(`  - 💡 ${entry.finding.suggestion}`);
    }
  }

  const folded = others.length > FOLD_THRESHOLD;
  if (folded) {
    lines.push('', '<details>', `<summary>Show ${others.length} more issues</summary>`, '');
  }
  for (const entry of others.slice(0, MAX_OTHER_FINDINGS)) {
    lines.push(findingLine(entry));
  }
  if (folded) {
    lines.push('', '</details>');
  }

  lines.push('');
  return lines;
}

/**
 * Renders a sealed report as a pull-request comment.
 */
export function renderReportMarkdown(report: ReviewReport): string {
  const { summary } = report;
  const lines = [
    '## 🤖 Code Review Report',
    '',
    `**Repository:** ${report.repoName}`,
    `**Pull Request:** #${report.prNumber}`,
    `**Review Duration:** ${summary.durationSeconds.toFixed(1)}s`,
    '',
    '### 📊 Summary',
    `- **Total Issues:** ${summary.totalIssues}`,
    summary.criticalIssues > 0 ? `- **Critical Issues:** ${summary.criticalIssues} 🚨` : '- **Critical Issues:** 0 ✅',
    `- **Files Reviewed:** ${summary.totalFiles}`,
    '',
  ];

  if (summary.totalIssues > 0) {
    lines.push('### 🎯 Issues by Severity', '| Severity | Count | Percentage |', '|----------|-------|------------|');
    for (const severity of SEVERITY_RANK) {
      const count = summary.severityBreakdown[severity];
      if (count > 0) {
        const percentage = ((count / summary.totalIssues) * 100).toFixed(1);
        lines.push(`| ${SEVERITY_ICONS[severity]} ${severity} | ${count} | ${percentage}% |`);
      }
    }
    lines.push('');
  }

  lines.push('### 📁 Detailed Results', '');

  const filePaths = [...report.fileResults.keys()].sort();
  for (const filePath of filePaths) {
    const findings: AttributedFinding[] = [];
    for (const [agentName, agentFindings] of report.fileResults.get(filePath) ?? []) {
      findings.push(...agentFindings.map(finding => ({ agentName, finding })));
    }
    if (findings.length > 0) {
      lines.push(...renderFile(filePath, findings));
    }
  }

  lines.push('---', '*Generated by the multi-agent review service*', `*Agents used: ${summary.agentsUsed.join(', ')}*`);

  return lines.join('\n');
}
