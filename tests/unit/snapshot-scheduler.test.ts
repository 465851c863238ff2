import { describe, it, expect, vi, afterEach } from 'vitest';
import { SnapshotScheduler, type SnapshotOptions } from '../../src/snapshots/snapshot-scheduler.js';
import { EngineEmitter } from '../../src/events/event-emitter.js';
import type { AnalyzeRequest } from '../../src/analysis/token-analyzer.js';
import type { AnalysisOutcome, SnapshotRunResult } from '../../src/types.js';
import { OTHER_TOKEN, TOKEN, analysisFixture } from '../helpers/fixtures.js';

const OPTIONS: SnapshotOptions = { intervalSeconds: 60, maxTokensPerRun: 10, delayMs: 0, analysisType: 'quick' };

class FakeAnalyzer {
  readonly requests: AnalyzeRequest[] = [];
  private readonly gates: Array<() => void> = [];

  constructor(
    private readonly failing = new Set<string>(),
    private readonly hold = false,
  ) {}

  async analyze(request: AnalyzeRequest): Promise<AnalysisOutcome> {
    this.requests.push(request);
    if (this.hold) await new Promise<void>((resolve) => {
      this.gates.push(() => resolve());
    });
    if (this.failing.has(request.tokenAddress)) throw new Error('all sources down');
    return { analysis: analysisFixture({ tokenAddress: request.tokenAddress, source: 'snapshot' }), cached: false };
  }

  releaseAll(): void {
    for (const release of this.gates.splice(0)) release();
  }
}

function trackedHistory(tokens: string[]) {
  const limits: number[] = [];
  return {
    limits,
    trackedTokens(limit: number): string[] {
      limits.push(limit);
      return tokens.slice(0, limit);
    },
  };
}

describe('SnapshotScheduler', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should refresh every tracked token in history order', async () => {
    const analyzer = new FakeAnalyzer();
    const history = trackedHistory([TOKEN, OTHER_TOKEN]);
    const scheduler = new SnapshotScheduler(analyzer, history, OPTIONS);

    const run = await scheduler.runOnce();

    expect(history.limits).toEqual([10]);
    expect(analyzer.requests).toEqual([
      { tokenAddress: TOKEN, analysisType: 'quick', refresh: true, source: 'snapshot' },
      { tokenAddress: OTHER_TOKEN, analysisType: 'quick', refresh: true, source: 'snapshot' },
    ]);
    expect(run).toMatchObject({ tokensProcessed: 2, succeeded: 2, failed: 0, errors: [] });
  });

  it('should keep going past a failed token and record it', async () => {
    const analyzer = new FakeAnalyzer(new Set([TOKEN]));
    const scheduler = new SnapshotScheduler(analyzer, trackedHistory([TOKEN, OTHER_TOKEN]), OPTIONS);

    const run = await scheduler.runOnce();

    expect(run).toMatchObject({
      tokensProcessed: 2,
      succeeded: 1,
      failed: 1,
      errors: [`${TOKEN}: all sources down`],
    });
    expect(scheduler.stats()).toMatchObject({
      enabled: false,
      running: false,
      runsCompleted: 1,
      totalTokensProcessed: 2,
      totalSucceeded: 1,
      totalFailed: 1,
    });
  });

  it('should cap a run at maxTokensPerRun', async () => {
    const analyzer = new FakeAnalyzer();
    const scheduler = new SnapshotScheduler(analyzer, trackedHistory([TOKEN, OTHER_TOKEN]), { ...OPTIONS, maxTokensPerRun: 1 });

    await scheduler.runOnce();

    expect(analyzer.requests.map((r) => r.tokenAddress)).toEqual([TOKEN]);
  });

  it('should skip a run while the previous one is in progress', async () => {
    const analyzer = new FakeAnalyzer(new Set(), true);
    const scheduler = new SnapshotScheduler(analyzer, trackedHistory([TOKEN]), OPTIONS);

    const first = scheduler.runOnce();
    await vi.waitFor(() => expect(analyzer.requests).toHaveLength(1));

    expect(await scheduler.runOnce()).toBeNull();
    expect(scheduler.stats()).toMatchObject({ running: true, runsSkipped: 1 });

    analyzer.releaseAll();
    await first;
    expect(scheduler.stats()).toMatchObject({ running: false, runsCompleted: 1, runsSkipped: 1 });
  });

  it('should emit snapshotRunCompleted after each run', async () => {
    const emitter = new EngineEmitter();
    const runs: SnapshotRunResult[] = [];
    emitter.on('snapshotRunCompleted', (run) => runs.push(run));
    const scheduler = new SnapshotScheduler(new FakeAnalyzer(), trackedHistory([]), OPTIONS, emitter);

    await scheduler.runOnce();

    expect(runs).toHaveLength(1);
    expect(runs[0]).toMatchObject({ tokensProcessed: 0, succeeded: 0, failed: 0 });
  });

  it('should run on the interval until stopped', async () => {
    vi.useFakeTimers();
    const analyzer = new FakeAnalyzer();
    const scheduler = new SnapshotScheduler(analyzer, trackedHistory([TOKEN]), OPTIONS);

    scheduler.start();
    expect(scheduler.stats()).toMatchObject({ enabled: true, nextRunAt: Date.now() + 60_000 });

    await vi.advanceTimersByTimeAsync(60_000);
    expect(analyzer.requests).toHaveLength(1);

    scheduler.stop();
    await vi.advanceTimersByTimeAsync(120_000);
    expect(analyzer.requests).toHaveLength(1);
    expect(scheduler.stats()).toMatchObject({ enabled: false, nextRunAt: null, runsCompleted: 1 });
  });
});
