import { HttpSource, SourceHttpError, isRecord, type HttpSourceOptions } from './http-source.js';

/** GoPlus token security (mint/freeze flags, holders, metadata mutability) */
export class GoPlusSource extends HttpSource {
  readonly name = 'goplus' as const;

  constructor(
    private readonly baseUrl: string,
    options: HttpSourceOptions,
  ) {
    super(options);
  }

  protected async request(tokenAddress: string, signal: AbortSignal): Promise<unknown> {
    const url = `${this.baseUrl}/solana/token_security?contract_addresses=${encodeURIComponent(tokenAddress)}`;
    const body = await this.requestJson(url, signal);
    // GoPlus answers 200 with an error code in the body
    if (isRecord(body) && typeof body.code === 'number' && body.code !== 1) {
      throw new SourceHttpError(200, `GoPlus error ${body.code}: ${String(body.message ?? 'unknown')}`);
    }
    return body;
  }
}
