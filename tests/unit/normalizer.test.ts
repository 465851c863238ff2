import { describe, it, expect } from 'vitest';
import { normalize, normalizeAll } from '../../src/analysis/normalizer.js';
import {
  TOKEN,
  WSOL,
  birdeyePayload,
  dexscreenerPayload,
  failedResult,
  goplusPayload,
  heliusPayload,
  okResult,
  rugcheckPayload,
} from '../helpers/fixtures.js';

describe('normalize', () => {
  it('should return an incomplete signal for failed results', () => {
    expect(normalize(failedResult('goplus'))).toEqual({ source: 'goplus', completeness: false });
    expect(normalize(failedResult('birdeye', 'timeout'))).toEqual({ source: 'birdeye', completeness: false });
  });

  it('should return an incomplete signal when the payload does not match', () => {
    expect(normalize(okResult('rugcheck', 'not an object'))).toEqual({ source: 'rugcheck', completeness: false });
    expect(normalize(okResult('helius', { error: 'nope' }))).toEqual({ source: 'helius', completeness: false });
  });

  describe('goplus', () => {
    it('should map status flags and read holder percent as given', () => {
      const signal = normalize(okResult('goplus', goplusPayload({
        mintable: { status: '1' },
        holders: [
          { account: 'whale', percent: '25' },
          { account: 'small', percent: '50' },
        ],
      })));

      expect(signal.completeness).toBe(true);
      expect(signal.mintAuthorityActive).toBe(true);
      expect(signal.freezeAuthorityActive).toBe(false);
      expect(signal.metadataMutable).toBe(false);
      expect(signal.holderCount).toBe(15230);
      expect(signal.holders).toEqual([
        { address: 'whale', pct: 25 },
        { address: 'small', pct: 50 },
      ]);
      expect(signal.top10HolderPct).toBe(75);
      expect(signal.metadata).toEqual({ name: 'Test Token', symbol: 'TEST', uri: 'https://example.com/meta.json' });
    });

    it('should keep small holder shares in percent', () => {
      const signal = normalize(okResult('goplus', goplusPayload({
        holders: [
          { account: 'a', percent: '1.5' },
          { account: 'b', percent: '1.2' },
          { account: 'c', percent: '0.9' },
        ],
      })));

      expect(signal.holders).toEqual([
        { address: 'a', pct: 1.5 },
        { address: 'b', pct: 1.2 },
        { address: 'c', pct: 0.9 },
      ]);
      expect(signal.top10HolderPct).toBeCloseTo(3.6, 10);
    });

    it('should drop shares outside 0..100', () => {
      const signal = normalize(okResult('goplus', goplusPayload({
        holders: [
          { account: 'a', percent: '150' },
          { account: 'b', percent: '-1' },
          { account: 'c', percent: 'n/a' },
          { account: 'd', percent: '4' },
        ],
      })));

      expect(signal.holders).toEqual([{ address: 'd', pct: 4 }]);
      expect(signal.top10HolderPct).toBe(4);
    });

    it('should leave flags unknown when a status is missing', () => {
      const signal = normalize(okResult('goplus', goplusPayload({ freezable: null, metadata_mutable: undefined })));

      expect(signal.freezeAuthorityActive).toBeUndefined();
      expect(signal.metadataMutable).toBeUndefined();
    });
  });

  describe('rugcheck', () => {
    it('should treat a null authority as revoked and a key as active', () => {
      const revoked = normalize(okResult('rugcheck', rugcheckPayload()));
      const active = normalize(okResult('rugcheck', rugcheckPayload({ freezeAuthority: 'FreezeAuth1111' })));

      expect(revoked.mintAuthorityActive).toBe(false);
      expect(revoked.freezeAuthorityActive).toBe(false);
      expect(active.freezeAuthorityActive).toBe(true);
    });

    it('should leave an omitted authority unknown', () => {
      const payload: Record<string, unknown> = rugcheckPayload();
      delete payload.mintAuthority;

      expect(normalize(okResult('rugcheck', payload)).mintAuthorityActive).toBeUndefined();
    });

    it('should map LP, holder and file metadata facts', () => {
      const signal = normalize(okResult('rugcheck', rugcheckPayload()));

      expect(signal.rugged).toBe(false);
      expect(signal.lpLocked).toBe(true);
      expect(signal.lpProviderCount).toBe(12);
      expect(signal.fileMetadataPresent).toBe(true);
      expect(signal.holderCount).toBe(15230);
      expect(signal.liquidityUsd).toBe(640000);
      expect(signal.top10HolderPct).toBeCloseTo(3.6, 10);
    });

    it('should report missing file metadata as false', () => {
      expect(normalize(okResult('rugcheck', rugcheckPayload({ fileMeta: null }))).fileMetadataPresent).toBe(false);
      expect(normalize(okResult('rugcheck', rugcheckPayload({ fileMeta: {} }))).fileMetadataPresent).toBe(false);
    });
  });

  describe('solsniffer', () => {
    it('should invert the disabled flags', () => {
      const signal = normalize(okResult('solsniffer', {
        tokenData: {
          tokenName: 'Test Token',
          tokenSymbol: 'TEST',
          auditRisk: { mintDisabled: true, freezeDisabled: false, lpBurned: true },
        },
      }));

      expect(signal.mintAuthorityActive).toBe(false);
      expect(signal.freezeAuthorityActive).toBe(true);
      expect(signal.lpLocked).toBe(true);
      expect(signal.metadata).toEqual({ name: 'Test Token', symbol: 'TEST', uri: undefined });
    });
  });

  describe('birdeye', () => {
    it('should map the overview and collect trade prices for the token side', () => {
      const signal = normalize(okResult('birdeye', birdeyePayload()));

      expect(signal.priceUsd).toBe(0.0042);
      expect(signal.liquidityUsd).toBe(600000);
      expect(signal.volume24hUsd).toBe(2000000);
      expect(signal.priceChange24hPct).toBe(2.5);
      expect(signal.holderCount).toBe(15230);
      expect(signal.priceSamples).toEqual([0.0042, 0.00421, 0.00419, 0.0042, 0.00422]);
    });

    it('should skip trades that do not involve the token', () => {
      const payload = birdeyePayload();
      payload.trades.data.items.push({ from: { address: WSOL, price: 150 }, to: { address: 'otherMint', price: 1 } });

      expect(normalize(okResult('birdeye', payload)).priceSamples).toHaveLength(5);
    });

    it('should leave price samples undefined when trades are unavailable', () => {
      const payload = { ...birdeyePayload(), trades: null };
      expect(normalize(okResult('birdeye', payload)).priceSamples).toBeUndefined();
    });

    it('should keep the overview when the trades body is malformed', () => {
      const signal = normalize(okResult('birdeye', { ...birdeyePayload(), trades: { success: false, data: null } }));

      expect(signal.completeness).toBe(true);
      expect(signal.volume24hUsd).toBe(2000000);
      expect(signal.liquidityUsd).toBe(600000);
      expect(signal.priceChange24hPct).toBe(2.5);
      expect(signal.priceSamples).toBeUndefined();
    });
  });

  describe('dexscreener', () => {
    it('should sum liquidity and volume across solana pairs', () => {
      const pairs = [
        ...dexscreenerPayload(),
        {
          chainId: 'solana',
          priceUsd: '0.0041',
          liquidity: { usd: 20000 },
          volume: { h24: 100000 },
          priceChange: { h24: 9 },
          baseToken: { address: TOKEN, name: 'Test Token', symbol: 'TEST' },
          quoteToken: { address: WSOL, name: 'Wrapped SOL', symbol: 'SOL' },
        },
        { chainId: 'ethereum', priceUsd: '5', liquidity: { usd: 1_000_000 }, volume: { h24: 5 } },
      ];
      const signal = normalize(okResult('dexscreener', pairs));

      expect(signal.liquidityUsd).toBe(600000);
      expect(signal.volume24hUsd).toBe(2000000);
      expect(signal.priceUsd).toBe(0.0042);
      expect(signal.priceChange24hPct).toBe(2.4);
      expect(signal.metadata).toEqual({ name: 'Test Token', symbol: 'TEST', uri: undefined });
    });

    it('should accept the legacy pairs envelope', () => {
      const signal = normalize(okResult('dexscreener', { pairs: dexscreenerPayload() }));
      expect(signal.liquidityUsd).toBe(580000);
    });

    it('should report no market facts when no pair is listed', () => {
      expect(normalize(okResult('dexscreener', { pairs: null }))).toEqual({ source: 'dexscreener', completeness: true });
    });
  });

  describe('helius', () => {
    it('should map mutability, file metadata and authorities', () => {
      const signal = normalize(okResult('helius', heliusPayload({
        mutable: true,
        token_info: { mint_authority: 'MintAuth1111', freeze_authority: null },
      })));

      expect(signal.metadataMutable).toBe(true);
      expect(signal.fileMetadataPresent).toBe(true);
      expect(signal.mintAuthorityActive).toBe(true);
      expect(signal.freezeAuthorityActive).toBe(false);
    });

    it('should report missing file metadata when there is no uri and no files', () => {
      const signal = normalize(okResult('helius', heliusPayload({
        content: { json_uri: '', files: [], metadata: { name: 'Test Token', symbol: 'TEST' } },
      })));

      expect(signal.fileMetadataPresent).toBe(false);
    });
  });
});

describe('normalizeAll', () => {
  it('should keep the input order', () => {
    const signals = normalizeAll([
      okResult('helius', heliusPayload()),
      failedResult('goplus'),
      okResult('dexscreener', dexscreenerPayload()),
    ]);

    expect(signals.map((s) => [s.source, s.completeness])).toEqual([
      ['helius', true],
      ['goplus', false],
      ['dexscreener', true],
    ]);
  });
});
