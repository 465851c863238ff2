import { HttpSource, type HttpSourceOptions } from './http-source.js';

export class DexscreenerSource extends HttpSource {
  readonly name = 'dexscreener' as const;

  constructor(
    private readonly baseUrl: string,
    options: HttpSourceOptions,
  ) {
    super(options);
  }

  protected request(tokenAddress: string, signal: AbortSignal): Promise<unknown> {
    return this.requestJson(`${this.baseUrl}/tokens/v1/solana/${tokenAddress}`, signal);
  }
}
