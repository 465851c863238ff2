import type { NormalizedSignal, SecurityPolicy, SecurityVerdict, SourceName } from '../types.js';

type BooleanFact = 'mintAuthorityActive' | 'freezeAuthorityActive' | 'rugged' | 'metadataMutable';

const SECURITY_FACTS = [
  'mintAuthorityActive',
  'freezeAuthorityActive',
  'rugged',
  'metadataMutable',
  'fileMetadataPresent',
  'lpProviderCount',
  'top10HolderPct',
] as const satisfies readonly (keyof NormalizedSignal)[];

function reporting(signals: readonly NormalizedSignal[], fact: BooleanFact): SourceName[] {
  return signals.filter((s) => s[fact] === true).map((s) => s.source);
}

function withSources(message: string, sources: readonly SourceName[]): string {
  return `${message} (${sources.join(', ')})`;
}

/**
 * Hard-fail checks across every source. A single source reporting a critical
 * fact fails the token; disagreement is resolved toward the riskier reading.
 */
export function evaluateSecurity(
  signals: readonly NormalizedSignal[],
  policy: SecurityPolicy,
): SecurityVerdict {
  const criticalIssues: string[] = [];
  const warnings: string[] = [];

  const mint = reporting(signals, 'mintAuthorityActive');
  if (mint.length > 0) criticalIssues.push(withSources('Mint authority active', mint));

  const freeze = reporting(signals, 'freezeAuthorityActive');
  if (freeze.length > 0) criticalIssues.push(withSources('Freeze authority active', freeze));

  const rugged = reporting(signals, 'rugged');
  if (rugged.length > 0) criticalIssues.push(withSources('Token flagged as rugged', rugged));

  const mutable = reporting(signals, 'metadataMutable');
  if (mutable.length > 0) warnings.push(withSources('Token metadata is mutable', mutable));

  const fewProviders = signals.filter(
    (s) => s.lpProviderCount !== undefined && s.lpProviderCount < policy.minLpProviders,
  );
  if (fewProviders.length > 0) {
    const lowest = Math.min(...fewProviders.map((s) => s.lpProviderCount ?? 0));
    warnings.push(withSources(
      `Low LP provider count: ${lowest} (minimum ${policy.minLpProviders})`,
      fewProviders.map((s) => s.source),
    ));
  }

  const noFileMeta = signals.filter((s) => s.fileMetadataPresent === false).map((s) => s.source);
  if (noFileMeta.length > 0) warnings.push(withSources('File metadata missing', noFileMeta));

  const concentrated = signals.filter(
    (s) => s.top10HolderPct !== undefined && s.top10HolderPct > policy.top10WarningPct,
  );
  if (concentrated.length > 0) {
    const highest = Math.max(...concentrated.map((s) => s.top10HolderPct ?? 0));
    warnings.push(withSources(
      `Top 10 holders own ${highest.toFixed(1)}% of supply (threshold ${policy.top10WarningPct}%)`,
      concentrated.map((s) => s.source),
    ));
  }

  const anyFact = signals.some((s) => SECURITY_FACTS.some((fact) => s[fact] !== undefined));
  if (!anyFact) warnings.push('No source reported security data');

  return {
    passed: criticalIssues.length === 0,
    criticalIssues,
    warnings,
  };
}
