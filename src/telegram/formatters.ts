import { SOLSCAN_BASE } from '../constants.js';
import { shortenAddress } from '../utils/helpers.js';
import type { Analysis, VerdictDecision } from '../types.js';

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

function solscanLink(label: string, path: string): string {
  return `<a href="${SOLSCAN_BASE}${path}">${escapeHtml(label)}</a>`;
}

const DECISION_ICON: Record<VerdictDecision, string> = {
  GO: '🟢',
  WATCH: '🟡',
  NO: '🔴',
};

const MAX_ALERT_WARNINGS = 3;

export function formatAnalysisAlert(analysis: Analysis): string {
  const lines = [
    `${DECISION_ICON[analysis.verdictDecision]} <b>${analysis.verdictDecision}</b> | Score <b>${analysis.finalScore.toFixed(1)}/100</b>`,
    ``,
    `Token: ${solscanLink(shortenAddress(analysis.tokenAddress), `/token/${analysis.tokenAddress}`)}`,
    `Risk: ${analysis.riskLevel} | Recommendation: ${analysis.recommendation}`,
    `Traditional: ${analysis.composite.traditionalScore}/95`,
  ];

  if (analysis.ai) {
    lines.push(`AI: ${analysis.ai.aiScore}/100 ${analysis.ai.recommendation} (confidence ${analysis.ai.confidence}%)`);
  } else {
    lines.push('AI: not used');
  }

  lines.push(
    `Sources: ${analysis.dataSourcesUsed.join(', ') || 'none'} ` +
    `(${analysis.metadata.sourcesSucceeded}/${analysis.metadata.sourcesAttempted})`,
  );

  const issues = [...analysis.security.criticalIssues, ...analysis.security.warnings];
  if (issues.length > 0) {
    lines.push(``, `<b>Flags</b>`);
    for (const issue of issues.slice(0, MAX_ALERT_WARNINGS)) {
      lines.push(`• ${escapeHtml(issue)}`);
    }
    if (issues.length > MAX_ALERT_WARNINGS) {
      lines.push(`• +${issues.length - MAX_ALERT_WARNINGS} more`);
    }
  }

  return lines.join('\n');
}

export function formatError(error: string, context: string): string {
  return `🚨 <b>ERROR: ${escapeHtml(context)}</b>\n\n<code>${escapeHtml(error.slice(0, 300))}</code>`;
}
