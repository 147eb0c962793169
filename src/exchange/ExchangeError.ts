/**
 * Typed exchange failures. Adapters map venue-specific errors to these kinds
 * so the execution engine can decide between retry, lookup and abandon.
 */

export type ExchangeErrorKind =
  | 'RATE_LIMITED'
  | 'INSUFFICIENT_FUNDS'
  | 'INVALID_REQUEST'
  | 'TRANSIENT'
  | 'UNKNOWN';

export interface ExchangeErrorDetail {
  readonly kind: ExchangeErrorKind;
  readonly message: string;
  readonly exchange: string;
  // The request may have reached the venue (timeouts, dropped responses)
  readonly ambiguous?: boolean;
  readonly originalMessage?: string;
  readonly timestamp?: number;
}

export class ExchangeError extends Error {
  readonly kind: ExchangeErrorKind;
  readonly exchange: string;
  readonly ambiguous: boolean;
  readonly retryable: boolean;
  readonly originalMessage?: string;
  readonly timestamp: number;

  constructor(detail: ExchangeErrorDetail) {
    super(detail.message);
    this.name = 'ExchangeError';
    this.kind = detail.kind;
    this.exchange = detail.exchange;
    this.ambiguous = detail.ambiguous ?? false;
    this.retryable = isRetryableKind(detail.kind);
    this.originalMessage = detail.originalMessage;
    this.timestamp = detail.timestamp ?? Date.now();
  }

  toJSON(): ExchangeErrorDetail & { retryable: boolean } {
    return {
      kind: this.kind,
      message: this.message,
      exchange: this.exchange,
      ambiguous: this.ambiguous,
      originalMessage: this.originalMessage,
      timestamp: this.timestamp,
      retryable: this.retryable
    };
  }
}

export function isRetryableKind(kind: ExchangeErrorKind): boolean {
  return kind === 'RATE_LIMITED' || kind === 'TRANSIENT';
}

export function toExchangeError(exchange: string, error: unknown): ExchangeError {
  if (error instanceof ExchangeError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);

  if (/ETIMEDOUT|timed? ?out/i.test(message)) {
    return new ExchangeError({
      kind: 'TRANSIENT',
      message: `Request timeout to ${exchange}`,
      exchange,
      ambiguous: true,
      originalMessage: message
    });
  }

  if (/ECONNREFUSED|ECONNRESET|ENOTFOUND|socket hang up/i.test(message)) {
    return new ExchangeError({
      kind: 'TRANSIENT',
      message: `Connection failure to ${exchange}`,
      exchange,
      ambiguous: /ECONNRESET|socket hang up/i.test(message),
      originalMessage: message
    });
  }

  return new ExchangeError({
    kind: 'UNKNOWN',
    message,
    exchange,
    originalMessage: message
  });
}
