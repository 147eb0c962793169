import type { RejectionReason } from '../types/trading';

export type EngineErrorCode =
  | 'SIGNAL_UNAVAILABLE'
  | 'INSUFFICIENT_QUORUM'
  | 'RISK_REJECTED'
  | 'EXECUTION_TRANSIENT'
  | 'EXECUTION_FATAL'
  | 'LEDGER_WRITE_FAILURE';

export abstract class EngineError extends Error {
  abstract readonly code: EngineErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  toJSON(): { code: EngineErrorCode; name: string; message: string } {
    return { code: this.code, name: this.name, message: this.message };
  }
}

export class SignalUnavailable extends EngineError {
  readonly code = 'SIGNAL_UNAVAILABLE';

  constructor(readonly sourceId: string, message: string, options?: { cause?: unknown }) {
    super(`${sourceId}: ${message}`, options);
  }
}

export class InsufficientQuorum extends EngineError {
  readonly code = 'INSUFFICIENT_QUORUM';

  constructor(readonly responding: number, readonly configured: number) {
    super(`${responding}/${configured} signal sources responded`);
  }
}

export class RiskRejected extends EngineError {
  readonly code = 'RISK_REJECTED';

  constructor(readonly reason: RejectionReason, message?: string) {
    super(message ?? reason);
  }
}

export class ExecutionTransient extends EngineError {
  readonly code = 'EXECUTION_TRANSIENT';
}

export class ExecutionFatal extends EngineError {
  readonly code = 'EXECUTION_FATAL';

  constructor(message: string, readonly clientOrderId?: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class LedgerWriteFailure extends EngineError {
  readonly code = 'LEDGER_WRITE_FAILURE';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
