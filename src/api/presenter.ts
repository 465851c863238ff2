import type { AnalysisSummary } from '../data/analysis-repository.js';
import type { SnapshotStats } from '../snapshots/snapshot-scheduler.js';
import type { AIResult, AnalysisOutcome, MetricResult, SecurityReport, SnapshotRunResult, WhaleReport } from '../types.js';

function presentMetric(m: MetricResult) {
  return {
    name: m.name,
    value: m.value,
    risk_bucket: m.riskBucket,
    points: m.points,
    max_points: m.maxPoints,
    detail: m.detail,
  };
}

function presentAi(ai: AIResult) {
  return {
    ai_score: ai.aiScore,
    risk_assessment: ai.riskAssessment,
    recommendation: ai.recommendation,
    confidence: ai.confidence,
    reasoning: ai.reasoning,
    key_insights: ai.keyInsights,
    risk_factors: ai.riskFactors,
    stop_flags: ai.stopFlags,
    model: ai.model,
    latency_ms: ai.latencyMs,
  };
}

/** Wire shape of an analysis response (snake_case) */
export function presentAnalysis({ analysis: a, cached }: AnalysisOutcome) {
  return {
    analysis_id: a.id,
    token_address: a.tokenAddress,
    analysis_type: a.analysisType,
    source: a.source,
    security: {
      passed: a.security.passed,
      critical_issues: a.security.criticalIssues,
      warnings: a.security.warnings,
    },
    market_metrics: a.metrics.map(presentMetric),
    composite: {
      traditional_score: a.composite.traditionalScore,
      breakdown: a.composite.breakdown,
      capped: a.composite.capped,
    },
    ai: a.ai ? presentAi(a.ai) : null,
    overall_analysis: {
      final_score: a.finalScore,
      traditional_score: a.composite.traditionalScore,
      weighted_score: a.blend.weightedScore,
      agreement_bonus_applied: a.blend.agreementBonusApplied,
      risk_level: a.riskLevel,
      recommendation: a.recommendation,
      decision: a.verdictDecision,
      ai_enhanced: a.aiEnhanced,
    },
    data_sources_used: a.dataSourcesUsed,
    warnings: a.warnings,
    created_at: new Date(a.createdAt).toISOString(),
    metadata: {
      processing_time_ms: a.metadata.processingTimeMs,
      sources_attempted: a.metadata.sourcesAttempted,
      sources_succeeded: a.metadata.sourcesSucceeded,
      source_statuses: a.metadata.sourceStatuses,
      security_short_circuited: a.metadata.securityShortCircuited,
      ai_enhanced: a.metadata.aiEnhanced,
      ai_failure_reason: a.metadata.aiFailureReason ?? null,
      cached,
    },
  };
}

export function presentSummary(s: AnalysisSummary) {
  return {
    analysis_id: s.id,
    token_address: s.tokenAddress,
    analysis_type: s.analysisType,
    source: s.source,
    final_score: s.finalScore,
    traditional_score: s.traditionalScore,
    risk_level: s.riskLevel,
    recommendation: s.recommendation,
    decision: s.verdictDecision,
    ai_enhanced: s.aiEnhanced,
    security_passed: s.securityPassed,
    data_sources_used: s.dataSourcesUsed,
    warnings: s.warnings,
    processing_time_ms: s.processingTimeMs,
    created_at: new Date(s.createdAt).toISOString(),
  };
}

export function presentSecurityReport(r: SecurityReport) {
  return {
    token_address: r.tokenAddress,
    security: {
      passed: r.security.passed,
      critical_issues: r.security.criticalIssues,
      warnings: r.security.warnings,
    },
    data_sources_used: r.dataSourcesUsed,
    source_statuses: r.sourceStatuses,
    warnings: r.warnings,
    processing_time_ms: r.processingTimeMs,
    created_at: new Date(r.createdAt).toISOString(),
  };
}

export function presentWhaleReport(r: WhaleReport) {
  return {
    token_address: r.tokenAddress,
    holder_count: r.holderCount,
    holders_reported: r.holdersReported,
    whale_count: r.whaleCount,
    whale_control_percent: r.whaleControlPct,
    top_whale_percent: r.topWhalePct,
    whale_risk_level: r.whaleRiskLevel,
    whales: r.whales.map((w) => ({ address: w.address, percent: w.pct })),
    metric: presentMetric(r.metric),
    data_sources_used: r.dataSourcesUsed,
    warnings: r.warnings,
    created_at: new Date(r.createdAt).toISOString(),
  };
}

export function presentSnapshotRun(run: SnapshotRunResult) {
  return {
    started_at: new Date(run.startedAt).toISOString(),
    duration_ms: run.durationMs,
    tokens_processed: run.tokensProcessed,
    succeeded: run.succeeded,
    failed: run.failed,
    errors: run.errors,
  };
}

export function presentSnapshotStats(s: SnapshotStats) {
  return {
    enabled: s.enabled,
    running: s.running,
    interval_seconds: s.intervalSeconds,
    runs_completed: s.runsCompleted,
    runs_skipped: s.runsSkipped,
    total_tokens_processed: s.totalTokensProcessed,
    total_succeeded: s.totalSucceeded,
    total_failed: s.totalFailed,
    last_run: s.lastRun ? presentSnapshotRun(s.lastRun) : null,
    next_run_at: s.nextRunAt !== null ? new Date(s.nextRunAt).toISOString() : null,
  };
}
