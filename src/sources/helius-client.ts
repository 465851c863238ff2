import { HttpSource, SourceHttpError, isRecord, type HttpSourceOptions } from './http-source.js';

/** DAS `getAsset` over Helius JSON-RPC */
export class HeliusSource extends HttpSource {
  readonly name = 'helius' as const;

  constructor(
    private readonly rpcUrl: string,
    private readonly apiKey: string,
    options: HttpSourceOptions,
  ) {
    super(options);
  }

  protected async request(tokenAddress: string, signal: AbortSignal): Promise<unknown> {
    const url = `${this.rpcUrl}/?api-key=${encodeURIComponent(this.apiKey)}`;
    const body = await this.requestJson(url, signal, {
      method: 'POST',
      body: {
        jsonrpc: '2.0',
        id: 'token-risk',
        method: 'getAsset',
        params: { id: tokenAddress },
      },
    });
    if (isRecord(body) && isRecord(body.error)) {
      throw new SourceHttpError(200, `RPC error: ${String(body.error.message ?? 'unknown')}`);
    }
    return body;
  }
}
