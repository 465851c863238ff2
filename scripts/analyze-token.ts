import { loadConfig } from '../src/config.js';
import { Cache, AnalysisCache } from '../src/data/redis-cache.js';
import { createSources } from '../src/sources/index.js';
import { createLlmOracle } from '../src/ai/llm-client.js';
import { TokenAnalyzer } from '../src/analysis/token-analyzer.js';
import type { AnalysisType } from '../src/types.js';

async function main() {
  const mint = process.argv[2];
  const type: AnalysisType = process.argv[3] === 'deep' ? 'deep' : 'quick';
  if (!mint) {
    console.error('Usage: npx tsx scripts/analyze-token.ts <TOKEN_MINT_ADDRESS> [quick|deep]');
    process.exit(1);
  }

  console.log(`=== Analyzing Token: ${mint} (${type}) ===\n`);

  const config = loadConfig();
  const cache = new Cache();
  const analyzer = new TokenAnalyzer({
    sources: createSources(config.sources),
    cache: new AnalysisCache(cache, config.cache.keyPrefix),
    oracle: createLlmOracle(config.ai),
    options: {
      sourceTimeoutMs: config.sources.timeoutMs,
      aiTimeoutMs: config.ai.timeoutMs,
      blend: config.ai.blend,
      security: config.security,
    },
  });

  const { analysis } = await analyzer.analyze({ tokenAddress: mint, analysisType: type, refresh: true });

  console.log('\n=== SECURITY ===');
  console.log(`Passed: ${analysis.security.passed ? 'YES' : 'NO'}`);
  for (const issue of analysis.security.criticalIssues) console.log(`  CRITICAL ${issue}`);
  for (const warning of analysis.security.warnings) console.log(`  warn     ${warning}`);

  if (analysis.metrics.length > 0) {
    console.log('\n=== METRICS ===');
    for (const m of analysis.metrics) {
      console.log(`  ${m.name.padEnd(20)} ${String(m.points).padStart(2)}/${m.maxPoints}  ${m.riskBucket.padEnd(8)} ${m.detail}`);
    }
  }

  if (analysis.ai) {
    console.log('\n=== AI ===');
    console.log(`Score: ${analysis.ai.aiScore} | ${analysis.ai.recommendation} | confidence ${analysis.ai.confidence}%`);
    console.log(analysis.ai.reasoning);
  }

  const whales = await analyzer.whaleActivity(mint);
  console.log('\n=== WHALES ===');
  console.log(`${whales.whaleCount} whale(s) hold ${whales.whaleControlPct}% (top ${whales.topWhalePct}%, risk ${whales.whaleRiskLevel})`);

  console.log('\n=== RESULT ===');
  console.log(`Traditional: ${analysis.composite.traditionalScore}/95`);
  console.log(`Final:       ${analysis.finalScore}/100 (AI ${analysis.aiEnhanced ? 'on' : 'off'})`);
  console.log(`Decision:    ${analysis.verdictDecision} (${analysis.riskLevel}, ${analysis.recommendation})`);
  console.log(`Sources:     ${analysis.dataSourcesUsed.join(', ') || 'none'}`);
  for (const w of analysis.warnings) console.log(`  ! ${w}`);
  console.log(`Time:        ${analysis.metadata.processingTimeMs}ms`);

  await cache.close();
}

main().catch((err: unknown) => {
  console.error('Error:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
