import { Router } from 'express';
import { asyncHandler } from '../middleware/error-handler.js';
import {
  analyzeBodySchema,
  analyzeParamsSchema,
  analyzeQuerySchema,
  limitQuerySchema,
  parseInput,
  securityBodySchema,
} from '../validation.js';
import {
  presentAnalysis,
  presentSecurityReport,
  presentSnapshotRun,
  presentSnapshotStats,
  presentSummary,
  presentWhaleReport,
} from '../presenter.js';
import { AppError } from '../../errors.js';
import type { AnalysisHistory } from '../../data/analysis-repository.js';
import type { SnapshotScheduler } from '../../snapshots/snapshot-scheduler.js';
import type { Analyzer } from '../../webhooks/webhook-queue.js';
import type { SecurityReport, WhaleReport } from '../../types.js';

export interface AnalysisService extends Analyzer {
  checkSecurity(tokenAddress: string): Promise<SecurityReport>;
  whaleActivity(tokenAddress: string): Promise<WhaleReport>;
}

export function analysisRoutes(
  analyzer: AnalysisService,
  history: AnalysisHistory | null,
  snapshots: SnapshotScheduler | null = null,
): Router {
  const router = Router();

  router.get('/analyze/:tokenAddress', asyncHandler(async (req, res) => {
    const { tokenAddress } = parseInput(analyzeParamsSchema, req.params);
    const { type, refresh } = parseInput(analyzeQuerySchema, req.query);
    const outcome = await analyzer.analyze({ tokenAddress, analysisType: type, refresh, source: 'api' });
    res.json(presentAnalysis(outcome));
  }));

  router.post('/analyze', asyncHandler(async (req, res) => {
    const body = parseInput(analyzeBodySchema, req.body);
    const outcome = await analyzer.analyze({
      tokenAddress: body.token_address,
      analysisType: body.analysis_type,
      refresh: body.refresh,
      source: 'api',
    });
    res.json(presentAnalysis(outcome));
  }));

  router.post('/analyze/security', asyncHandler(async (req, res) => {
    const body = parseInput(securityBodySchema, req.body);
    const report = await analyzer.checkSecurity(body.token_address);
    res.json(presentSecurityReport(report));
  }));

  router.get('/whale-activity/:tokenAddress', asyncHandler(async (req, res) => {
    const { tokenAddress } = parseInput(analyzeParamsSchema, req.params);
    const report = await analyzer.whaleActivity(tokenAddress);
    res.json(presentWhaleReport(report));
  }));

  const requireHistory = (): AnalysisHistory => {
    if (!history) throw new AppError('Analysis history is disabled', 503, 'HISTORY_DISABLED');
    return history;
  };

  router.get('/analyses/recent', (req, res) => {
    const { limit } = parseInput(limitQuerySchema, req.query);
    const rows = requireHistory().recent(limit);
    res.json({ success: true, count: rows.length, analyses: rows.map(presentSummary) });
  });

  router.get('/analyses/:tokenAddress/history', (req, res) => {
    const { tokenAddress } = parseInput(analyzeParamsSchema, req.params);
    const { limit } = parseInput(limitQuerySchema, req.query);
    const rows = requireHistory().historyFor(tokenAddress, limit);
    res.json({ success: true, token_address: tokenAddress, count: rows.length, analyses: rows.map(presentSummary) });
  });

  const requireSnapshots = (): SnapshotScheduler => {
    if (!snapshots) throw new AppError('Snapshot scheduling is disabled', 503, 'SNAPSHOTS_DISABLED');
    return snapshots;
  };

  router.get('/snapshots/stats', (_req, res) => {
    res.json({ success: true, snapshots: presentSnapshotStats(requireSnapshots().stats()) });
  });

  router.post('/snapshots/run', asyncHandler(async (_req, res) => {
    const run = await requireSnapshots().runOnce();
    if (!run) {
      res.status(409).json({ success: false, status: 'already_running' });
      return;
    }
    res.json({ success: true, status: 'completed', run: presentSnapshotRun(run) });
  }));

  return router;
}
