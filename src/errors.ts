export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly code: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidTokenAddressError extends AppError {
  constructor(public readonly tokenAddress: string) {
    super(`Invalid Solana token address: ${tokenAddress}`, 400, 'INVALID_TOKEN_ADDRESS');
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400, 'VALIDATION_ERROR');
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Invalid webhook signature') {
    super(message, 401, 'UNAUTHORIZED');
  }
}

/** Cache and every data source are down at once */
export class InfrastructureUnavailableError extends AppError {
  constructor(message = 'Analysis infrastructure unavailable: cache and all data sources failed') {
    super(message, 503, 'INFRASTRUCTURE_UNAVAILABLE');
  }
}

export class AiTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`AI inference timed out after ${timeoutMs}ms`);
    this.name = 'AiTimeoutError';
  }
}
