import { HttpSource, type HttpSourceOptions } from './http-source.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/helpers.js';

/**
 * Birdeye token overview plus the latest swaps. The swap list only feeds
 * volatility, so its failure leaves `trades` null instead of failing the source.
 */
export class BirdeyeSource extends HttpSource {
  readonly name = 'birdeye' as const;

  constructor(
    private readonly baseUrl: string,
    private readonly apiKey: string,
    options: HttpSourceOptions,
  ) {
    super(options);
  }

  protected async request(tokenAddress: string, signal: AbortSignal): Promise<unknown> {
    const headers = { 'X-API-KEY': this.apiKey, 'x-chain': 'solana' };
    const address = encodeURIComponent(tokenAddress);

    const [overview, trades] = await Promise.all([
      this.requestJson(`${this.baseUrl}/defi/token_overview?address=${address}`, signal, { headers }),
      this.requestJson(
        `${this.baseUrl}/defi/txs/token?address=${address}&tx_type=swap&sort_type=desc&limit=20`,
        signal,
        { headers },
      ).catch((err: unknown) => {
        logger.debug(`[birdeye] Trades unavailable: ${errorMessage(err)}`);
        return null;
      }),
    ]);

    return { overview, trades };
  }
}
