import { HttpSource, type HttpSourceOptions } from './http-source.js';

export class SolsnifferSource extends HttpSource {
  readonly name = 'solsniffer' as const;

  constructor(
    private readonly baseUrl: string,
    private readonly apiKey: string,
    options: HttpSourceOptions,
  ) {
    super(options);
  }

  protected request(tokenAddress: string, signal: AbortSignal): Promise<unknown> {
    return this.requestJson(`${this.baseUrl}/token/${tokenAddress}`, signal, {
      headers: { 'X-API-KEY': this.apiKey },
    });
  }
}
