import { HttpSource, type HttpSourceOptions } from './http-source.js';

export class RugcheckSource extends HttpSource {
  readonly name = 'rugcheck' as const;

  constructor(
    private readonly baseUrl: string,
    options: HttpSourceOptions,
  ) {
    super(options);
  }

  protected request(tokenAddress: string, signal: AbortSignal): Promise<unknown> {
    return this.requestJson(`${this.baseUrl}/tokens/${tokenAddress}/report`, signal);
  }
}
