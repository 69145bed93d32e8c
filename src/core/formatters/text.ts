/**
 * Plain-text report formatters
 */

import type { ProfileVulnerabilityReport, SecurityScoreReport, VersionAnalysis } from '../types.js';

function formatScore(score: number | null): string {
  return score === null ? 'N/A' : String(score);
}

export function formatScoreReport(report: SecurityScoreReport, verbose = false): string {
  const lines: string[] = [];

  lines.push('');
  lines.push('Security Score Report');
  lines.push('='.repeat(50));
  lines.push('');
  lines.push('Profiles Checked: ' + report.profilesChecked);
  lines.push('Average Score:    ' + (report.averageScore === null ? 'N/A' : report.averageScore.toFixed(1)));
  lines.push('Lowest Score:     ' + formatScore(report.lowestScore));
  lines.push('Highest Score:    ' + formatScore(report.highestScore));
  lines.push('');

  const { summary } = report;
  lines.push(
    'Excellent: ' + summary.excellent +
    ' | Good: ' + summary.good +
    ' | Fair: ' + summary.fair +
    ' | Poor: ' + summary.poor +
    ' | Critical: ' + summary.critical +
    ' | Unknown: ' + summary.unknown
  );
  lines.push('');

  for (const result of report.results) {
    const label = result.label ?? 'Unknown';
    lines.push(`[${formatScore(result.score).padStart(3)}] ${result.profileName} (${label})`);

    if (result.platform || result.version) {
      lines.push(`      ${result.platform ?? '?'} ${result.version ?? '?'}`);
    }

    if (result.score !== null) {
      lines.push(`      CVEs: ${result.cveCount} | Penalty: ${result.totalFinalPenalty}`);
    }

    if (verbose) {
      for (const item of result.cveBreakdown) {
        const modifiers = item.modifiersApplied.length > 0 ? ` [${item.modifiersApplied.join(', ')}]` : '';
        lines.push(
          `      - ${item.cveId} ${item.severity} base ${item.basePenalty} x${item.modifierValue} = ${item.finalPenalty}${modifiers}`
        );
      }
    }
  }

  if (report.diagnostics.length > 0) {
    lines.push('');
    lines.push('DIAGNOSTICS:');
    lines.push('-'.repeat(50));
    for (const diagnostic of report.diagnostics) {
      lines.push('  ' + diagnostic);
    }
  }

  lines.push('');
  lines.push('='.repeat(50));

  return lines.join('\n');
}

export function formatVersionAnalysis(analysis: VersionAnalysis): string {
  const lines: string[] = [];

  lines.push('');
  lines.push(`CVE Analysis: ${analysis.platform} ${analysis.version}`);
  lines.push('='.repeat(50));
  lines.push('');

  if (analysis.matched.length === 0) {
    lines.push('No known vulnerabilities matched.');
  } else {
    const { severities } = analysis;
    lines.push(
      `Matched: ${analysis.matched.length} (critical ${severities.critical}, high ${severities.high}, ` +
      `medium ${severities.medium}, low ${severities.low})`
    );
    lines.push('');

    for (const record of analysis.matched) {
      lines.push(`  ${record.id} [${record.severity ?? 'unknown'}] ${record.title}`);
      if (record.fixedIn) {
        lines.push(`      Fixed in: ${record.fixedIn}`);
      }
      if (record.workaround) {
        lines.push(`      Workaround: ${record.workaround}`);
      }
      if (record.advisoryUrl) {
        lines.push(`      Advisory: ${record.advisoryUrl}`);
      }
    }
  }

  if (analysis.recommendation) {
    lines.push('');
    lines.push('Recommendation: ' + analysis.recommendation);
  }

  lines.push('');
  lines.push('='.repeat(50));

  return lines.join('\n');
}

export function formatStatusReport(report: ProfileVulnerabilityReport): string {
  const lines: string[] = [];

  lines.push('');
  lines.push('Profile Vulnerability Status');
  lines.push('='.repeat(50));
  lines.push('');

  for (const result of report.results) {
    const cvss = result.maxCvss === null ? '' : ` max CVSS ${result.maxCvss}`;
    lines.push(`  [${result.status.toUpperCase()}] ${result.profileName}${cvss}`);
    if (result.cves.length > 0) {
      lines.push(`      ${result.cves.join(', ')}`);
    }
  }

  lines.push('');
  const { summary } = report;
  lines.push(
    `Critical: ${summary.critical} | High: ${summary.high} | Medium: ${summary.medium} | ` +
    `Low: ${summary.low} | Clean: ${summary.clean} | Unknown: ${summary.unknown}`
  );
  lines.push('='.repeat(50));

  return lines.join('\n');
}
