import { z } from 'zod';
import { errorMessage, toFiniteNumber } from '../utils/helpers.js';
import { logger } from '../utils/logger.js';
import type { HolderShare, NormalizedSignal, ServiceResult, SourceName, TokenMetadata } from '../types.js';

type SignalFields = Omit<NormalizedSignal, 'source' | 'completeness'>;
type Adapter = (payload: unknown, result: ServiceResult) => SignalFields | null;

/** Binds a payload schema to its mapper; a payload that fails the schema maps to null */
function defineAdapter<S extends z.ZodTypeAny>(
  schema: S,
  map: (data: z.output<S>, result: ServiceResult) => SignalFields,
): Adapter {
  return (payload, result) => {
    const parsed = schema.safeParse(payload);
    if (!parsed.success) return null;
    return map(parsed.data, result);
  };
}

const numeric = z.union([z.number(), z.string()]).nullable().optional();
const text = z.string().nullable().optional();

function nonEmpty(value: string | null | undefined): string | undefined {
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}

/** undefined stays unknown, null or '' means the authority was revoked */
function authorityActive(value: string | null | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  return nonEmpty(value) !== undefined;
}

function buildMetadata(name?: string | null, symbol?: string | null, uri?: string | null): TokenMetadata | undefined {
  const meta: TokenMetadata = {
    name: nonEmpty(name),
    symbol: nonEmpty(symbol),
    uri: nonEmpty(uri),
  };
  return meta.name || meta.symbol || meta.uri ? meta : undefined;
}

/** Share of supply in percent; values outside 0..100 are dropped */
function collectHolders<T>(rows: readonly T[], read: (row: T) => [string, unknown]): HolderShare[] {
  const holders: HolderShare[] = [];
  for (const row of rows) {
    const [address, raw] = read(row);
    const pct = toFiniteNumber(raw);
    if (pct !== undefined && pct >= 0 && pct <= 100) holders.push({ address, pct });
  }
  return holders;
}

function topTenPct(holders: readonly HolderShare[]): number | undefined {
  if (holders.length === 0) return undefined;
  const sorted = [...holders].sort((a, b) => b.pct - a.pct);
  return sorted.slice(0, 10).reduce((sum, h) => sum + h.pct, 0);
}

// ─── goplus ──────────────────────────────────────────────────────────

const goplusFlag = z.object({ status: numeric }).nullable().optional();

const goplusTokenSchema = z.object({
  mintable: goplusFlag,
  freezable: goplusFlag,
  metadata_mutable: goplusFlag,
  holder_count: numeric,
  holders: z.array(z.object({ account: z.string(), percent: numeric })).nullable().optional(),
  metadata: z.object({ name: text, symbol: text, uri: text }).nullable().optional(),
});

const goplusSchema = z.object({
  result: z.record(goplusTokenSchema),
});

function goplusStatus(flag: z.output<typeof goplusFlag>): boolean | undefined {
  const status = toFiniteNumber(flag?.status);
  if (status === undefined) return undefined;
  return status === 1;
}

const goplusAdapter = defineAdapter(goplusSchema, (data, result) => {
  const token = data.result[result.tokenAddress] ?? Object.values(data.result)[0];
  if (!token) return {};

  // percent of supply, same unit as rugcheck's pct
  const holders = collectHolders(token.holders ?? [], (h) => [h.account, h.percent]);

  return {
    mintAuthorityActive: goplusStatus(token.mintable),
    freezeAuthorityActive: goplusStatus(token.freezable),
    metadataMutable: goplusStatus(token.metadata_mutable),
    holderCount: toFiniteNumber(token.holder_count),
    holders: token.holders ? holders : undefined,
    top10HolderPct: topTenPct(holders),
    metadata: buildMetadata(token.metadata?.name, token.metadata?.symbol, token.metadata?.uri),
  };
});

// ─── rugcheck ────────────────────────────────────────────────────────

const rugcheckSchema = z.object({
  mintAuthority: text,
  freezeAuthority: text,
  rugged: z.boolean().nullable().optional(),
  totalLPProviders: numeric,
  fileMeta: z.record(z.unknown()).nullable().optional(),
  tokenMeta: z
    .object({ name: text, symbol: text, uri: text, mutable: z.boolean().nullable().optional() })
    .nullable()
    .optional(),
  topHolders: z.array(z.object({ address: z.string(), pct: numeric })).nullable().optional(),
  totalHolders: numeric,
  totalMarketLiquidity: numeric,
  markets: z
    .array(z.object({ lp: z.object({ lpLockedPct: numeric }).nullable().optional() }))
    .nullable()
    .optional(),
});

const rugcheckAdapter = defineAdapter(rugcheckSchema, (data) => {
  const holders = collectHolders(data.topHolders ?? [], (h) => [h.address, h.pct]);

  let fileMetadataPresent: boolean | undefined;
  if (data.fileMeta === null) fileMetadataPresent = false;
  else if (data.fileMeta !== undefined) fileMetadataPresent = Object.keys(data.fileMeta).length > 0;

  let lpLocked: boolean | undefined;
  if (data.markets && data.markets.length > 0) {
    lpLocked = data.markets.some((m) => (toFiniteNumber(m.lp?.lpLockedPct) ?? 0) > 0);
  }

  return {
    mintAuthorityActive: authorityActive(data.mintAuthority),
    freezeAuthorityActive: authorityActive(data.freezeAuthority),
    rugged: data.rugged ?? undefined,
    lpLocked,
    metadataMutable: data.tokenMeta?.mutable ?? undefined,
    fileMetadataPresent,
    lpProviderCount: toFiniteNumber(data.totalLPProviders),
    holderCount: toFiniteNumber(data.totalHolders),
    holders: data.topHolders ? holders : undefined,
    top10HolderPct: topTenPct(holders),
    liquidityUsd: toFiniteNumber(data.totalMarketLiquidity),
    metadata: buildMetadata(data.tokenMeta?.name, data.tokenMeta?.symbol, data.tokenMeta?.uri),
  };
});

// ─── solsniffer ──────────────────────────────────────────────────────

const solsnifferSchema = z.object({
  tokenData: z.object({
    tokenName: text,
    tokenSymbol: text,
    auditRisk: z
      .object({
        mintDisabled: z.boolean().nullable().optional(),
        freezeDisabled: z.boolean().nullable().optional(),
        lpBurned: z.boolean().nullable().optional(),
      })
      .nullable()
      .optional(),
  }),
});

function negate(value: boolean | null | undefined): boolean | undefined {
  return typeof value === 'boolean' ? !value : undefined;
}

const solsnifferAdapter = defineAdapter(solsnifferSchema, (data) => {
  const audit = data.tokenData.auditRisk;
  return {
    mintAuthorityActive: negate(audit?.mintDisabled),
    freezeAuthorityActive: negate(audit?.freezeDisabled),
    lpLocked: audit?.lpBurned ?? undefined,
    metadata: buildMetadata(data.tokenData.tokenName, data.tokenData.tokenSymbol),
  };
});

// ─── birdeye ─────────────────────────────────────────────────────────

const birdeyeSide = z.object({ address: text, price: numeric }).nullable().optional();

const birdeyeSchema = z.object({
  overview: z.object({
    data: z.object({
      price: numeric,
      liquidity: numeric,
      v24hUSD: numeric,
      priceChange24hPercent: numeric,
      holder: numeric,
      name: text,
      symbol: text,
      logoURI: text,
    }),
  }),
  // the trades call is best-effort; a body of any other shape only costs the price samples
  trades: z
    .object({
      data: z.object({
        items: z.array(z.object({ from: birdeyeSide, to: birdeyeSide })),
      }),
    })
    .nullable()
    .optional()
    .catch(null),
});

const birdeyeAdapter = defineAdapter(birdeyeSchema, (data, result) => {
  const o = data.overview.data;

  let priceSamples: number[] | undefined;
  if (data.trades) {
    priceSamples = [];
    for (const trade of data.trades.data.items) {
      const side = trade.from?.address === result.tokenAddress ? trade.from : trade.to;
      if (!side || side.address !== result.tokenAddress) continue;
      const price = toFiniteNumber(side.price);
      if (price !== undefined && price > 0) priceSamples.push(price);
    }
  }

  return {
    priceUsd: toFiniteNumber(o.price),
    liquidityUsd: toFiniteNumber(o.liquidity),
    volume24hUsd: toFiniteNumber(o.v24hUSD),
    priceChange24hPct: toFiniteNumber(o.priceChange24hPercent),
    holderCount: toFiniteNumber(o.holder),
    priceSamples,
    metadata: buildMetadata(o.name, o.symbol, o.logoURI),
  };
});

// ─── dexscreener ─────────────────────────────────────────────────────

const dexToken = z.object({ address: z.string(), name: text, symbol: text }).nullable().optional();

const dexPair = z.object({
  chainId: z.string(),
  priceUsd: numeric,
  liquidity: z.object({ usd: numeric }).nullable().optional(),
  volume: z.object({ h24: numeric }).nullable().optional(),
  priceChange: z.object({ h24: numeric }).nullable().optional(),
  baseToken: dexToken,
  quoteToken: dexToken,
});

const dexscreenerSchema = z.union([
  z.array(dexPair),
  z.object({ pairs: z.array(dexPair).nullable() }).transform((v) => v.pairs ?? []),
]);

const dexscreenerAdapter = defineAdapter(dexscreenerSchema, (pairs, result) => {
  const solana = pairs.filter((p) => p.chainId === 'solana');
  if (solana.length === 0) return {};

  let liquidityUsd: number | undefined;
  let volume24hUsd: number | undefined;
  let deepest = solana[0];
  let deepestLiquidity = -1;

  for (const pair of solana) {
    const liq = toFiniteNumber(pair.liquidity?.usd);
    const vol = toFiniteNumber(pair.volume?.h24);
    if (liq !== undefined) liquidityUsd = (liquidityUsd ?? 0) + liq;
    if (vol !== undefined) volume24hUsd = (volume24hUsd ?? 0) + vol;
    if ((liq ?? 0) > deepestLiquidity) {
      deepestLiquidity = liq ?? 0;
      deepest = pair;
    }
  }

  const token = deepest.baseToken?.address === result.tokenAddress ? deepest.baseToken : deepest.quoteToken;

  return {
    liquidityUsd,
    volume24hUsd,
    priceUsd: toFiniteNumber(deepest.priceUsd),
    priceChange24hPct: toFiniteNumber(deepest.priceChange?.h24),
    metadata: buildMetadata(token?.name, token?.symbol),
  };
});

// ─── helius ──────────────────────────────────────────────────────────

const heliusSchema = z.object({
  result: z.object({
    mutable: z.boolean().nullable().optional(),
    content: z
      .object({
        json_uri: text,
        files: z.array(z.unknown()).nullable().optional(),
        metadata: z.object({ name: text, symbol: text }).nullable().optional(),
      })
      .nullable()
      .optional(),
    token_info: z
      .object({ mint_authority: text, freeze_authority: text })
      .nullable()
      .optional(),
  }),
});

const heliusAdapter = defineAdapter(heliusSchema, (data) => {
  const { content, token_info: tokenInfo } = data.result;

  let fileMetadataPresent: boolean | undefined;
  if (content) {
    fileMetadataPresent = nonEmpty(content.json_uri) !== undefined || (content.files?.length ?? 0) > 0;
  }

  return {
    metadataMutable: data.result.mutable ?? undefined,
    fileMetadataPresent,
    mintAuthorityActive: authorityActive(tokenInfo?.mint_authority),
    freezeAuthorityActive: authorityActive(tokenInfo?.freeze_authority),
    metadata: buildMetadata(content?.metadata?.name, content?.metadata?.symbol, content?.json_uri),
  };
});

const ADAPTERS: Record<SourceName, Adapter> = {
  goplus: goplusAdapter,
  rugcheck: rugcheckAdapter,
  solsniffer: solsnifferAdapter,
  birdeye: birdeyeAdapter,
  dexscreener: dexscreenerAdapter,
  helius: heliusAdapter,
};

/**
 * Maps one provider response onto the common signal shape. Non-ok results
 * and payloads that fail the provider schema yield an incomplete signal
 * with no facts. Never throws.
 */
export function normalize(result: ServiceResult): NormalizedSignal {
  const empty: NormalizedSignal = { source: result.source, completeness: false };
  if (result.status !== 'ok') return empty;

  let fields: SignalFields | null;
  try {
    fields = ADAPTERS[result.source](result.payload, result);
  } catch (err) {
    logger.warn(`[normalizer] ${result.source} mapping failed: ${errorMessage(err)}`);
    fields = null;
  }
  if (fields === null) {
    logger.debug(`[normalizer] ${result.source} payload did not match its schema`);
    return empty;
  }

  return { ...fields, source: result.source, completeness: true };
}

export function normalizeAll(results: readonly ServiceResult[]): NormalizedSignal[] {
  return results.map(normalize);
}
