export class PriceUnavailableError extends Error {
  constructor(
    readonly symbol: string,
    readonly causeMessage?: string,
  ) {
    super(
      causeMessage ? `Price unavailable for ${symbol}: ${causeMessage}` : `Price unavailable for ${symbol}`,
    );
    this.name = 'PriceUnavailableError';
  }
}

export class NoWindowDataError extends Error {
  constructor(
    readonly symbol: string,
    readonly durationMinutes: number,
  ) {
    super(`No window data for ${symbol} over ${durationMinutes}m`);
    this.name = 'NoWindowDataError';
  }
}

export class RepositoryUnavailableError extends Error {
  constructor(
    readonly operation: string,
    readonly causeMessage?: string,
  ) {
    super(
      causeMessage
        ? `Alert repository unavailable during ${operation}: ${causeMessage}`
        : `Alert repository unavailable during ${operation}`,
    );
    this.name = 'RepositoryUnavailableError';
  }
}

export class DeliveryFailureError extends Error {
  constructor(
    readonly ownerKey: string,
    readonly causeMessage?: string,
  ) {
    super(
      causeMessage
        ? `Notification delivery to ${ownerKey} failed: ${causeMessage}`
        : `Notification delivery to ${ownerKey} failed`,
    );
    this.name = 'DeliveryFailureError';
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : 'Unknown error';
