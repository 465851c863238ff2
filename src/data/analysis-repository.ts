import type { Db } from './database.js';
import { logger } from '../utils/logger.js';
import type {
  Analysis,
  AnalysisSource,
  AnalysisType,
  RiskLevel,
  Recommendation,
  VerdictDecision,
} from '../types.js';

export interface AnalysisSummary {
  id: string;
  tokenAddress: string;
  analysisType: AnalysisType;
  source: AnalysisSource;
  finalScore: number;
  traditionalScore: number;
  riskLevel: RiskLevel;
  recommendation: Recommendation;
  verdictDecision: VerdictDecision;
  aiEnhanced: boolean;
  securityPassed: boolean;
  dataSourcesUsed: string[];
  warnings: string[];
  processingTimeMs: number;
  createdAt: number;
}

/** Persistence seam for analysis history */
export interface AnalysisHistory {
  save(analysis: Analysis): void;
  recent(limit: number): AnalysisSummary[];
  historyFor(tokenAddress: string, limit: number): AnalysisSummary[];
  /** Distinct analysed tokens, least recently analysed first */
  trackedTokens(limit: number): string[];
}

interface AnalysisRow {
  id: string;
  token_address: string;
  analysis_type: AnalysisType;
  source: AnalysisSource;
  final_score: number;
  traditional_score: number;
  risk_level: RiskLevel;
  recommendation: Recommendation;
  verdict_decision: VerdictDecision;
  ai_enhanced: number;
  security_passed: number;
  data_sources_used: string;
  warnings: string;
  processing_time_ms: number;
  created_at: number;
}

const SUMMARY_COLUMNS = `
  id, token_address, analysis_type, source, final_score, traditional_score,
  risk_level, recommendation, verdict_decision, ai_enhanced, security_passed,
  data_sources_used, warnings, processing_time_ms, created_at
`;

function parseStringList(json: string): string[] {
  try {
    const parsed: unknown = JSON.parse(json);
    return Array.isArray(parsed) ? parsed.filter((v): v is string => typeof v === 'string') : [];
  } catch (err) {
    logger.warn(`[db] Malformed JSON list column: ${String(err)}`);
    return [];
  }
}

function toSummary(row: AnalysisRow): AnalysisSummary {
  return {
    id: row.id,
    tokenAddress: row.token_address,
    analysisType: row.analysis_type,
    source: row.source,
    finalScore: row.final_score,
    traditionalScore: row.traditional_score,
    riskLevel: row.risk_level,
    recommendation: row.recommendation,
    verdictDecision: row.verdict_decision,
    aiEnhanced: row.ai_enhanced === 1,
    securityPassed: row.security_passed === 1,
    dataSourcesUsed: parseStringList(row.data_sources_used),
    warnings: parseStringList(row.warnings),
    processingTimeMs: row.processing_time_ms,
    createdAt: row.created_at,
  };
}

export class AnalysisRepository implements AnalysisHistory {
  constructor(private readonly db: Db) {}

  save(analysis: Analysis): void {
    this.db.prepare(`
      INSERT OR REPLACE INTO analyses
      (id, token_address, analysis_type, source, final_score, traditional_score,
       risk_level, recommendation, verdict_decision, ai_enhanced, security_passed,
       data_sources_used, warnings, processing_time_ms, payload, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      analysis.id,
      analysis.tokenAddress,
      analysis.analysisType,
      analysis.source,
      analysis.finalScore,
      analysis.composite.traditionalScore,
      analysis.riskLevel,
      analysis.recommendation,
      analysis.verdictDecision,
      analysis.aiEnhanced ? 1 : 0,
      analysis.security.passed ? 1 : 0,
      JSON.stringify(analysis.dataSourcesUsed),
      JSON.stringify(analysis.warnings),
      Math.round(analysis.metadata.processingTimeMs),
      JSON.stringify(analysis),
      analysis.createdAt,
    );
  }

  recent(limit: number): AnalysisSummary[] {
    const rows = this.db
      .prepare<[number], AnalysisRow>(
        `SELECT ${SUMMARY_COLUMNS} FROM analyses ORDER BY created_at DESC, rowid DESC LIMIT ?`,
      )
      .all(limit);
    return rows.map(toSummary);
  }

  historyFor(tokenAddress: string, limit: number): AnalysisSummary[] {
    const rows = this.db
      .prepare<[string, number], AnalysisRow>(
        `SELECT ${SUMMARY_COLUMNS} FROM analyses WHERE token_address = ? ORDER BY created_at DESC, rowid DESC LIMIT ?`,
      )
      .all(tokenAddress, limit);
    return rows.map(toSummary);
  }

  trackedTokens(limit: number): string[] {
    const rows = this.db
      .prepare<[number], { token_address: string }>(`
        SELECT token_address, MAX(created_at) AS last_analyzed
        FROM analyses
        GROUP BY token_address
        ORDER BY last_analyzed ASC, token_address ASC
        LIMIT ?
      `)
      .all(limit);
    return rows.map((r) => r.token_address);
  }
}
