export type RelayErrorCode =
  | 'ingest_overload'
  | 'protocol_error'
  | 'unexpected_message'
  | 'negotiation_timeout'
  | 'negotiation_failed'
  | 'transport_closed'
  | 'capacity';

export class RelayError extends Error {
  readonly code: RelayErrorCode;

  constructor(code: RelayErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Frame dropped for one session because its outbound queue was full. */
export class IngestOverloadError extends RelayError {
  constructor(sessionId: string, pendingFrames: number) {
    super('ingest_overload', `Session ${sessionId} has ${pendingFrames} frames pending`);
  }
}

/** Malformed or out-of-order signaling. The session survives. */
export class SignalingProtocolError extends RelayError {
  constructor(
    message: string,
    code: Extract<RelayErrorCode, 'protocol_error' | 'unexpected_message'> = 'protocol_error',
  ) {
    super(code, message);
  }
}

export class NegotiationTimeoutError extends RelayError {
  constructor(stage: string, timeoutMs: number) {
    super('negotiation_timeout', `No ${stage} within ${timeoutMs}ms`);
  }
}

export class NegotiationFailedError extends RelayError {
  constructor(message: string, cause?: unknown) {
    super('negotiation_failed', message, { cause });
  }
}

/** Expected terminal condition; triggers cleanup, never logged as an error. */
export class TransportClosedError extends RelayError {
  constructor(reason: string, cause?: unknown) {
    super('transport_closed', reason, { cause });
  }
}

export class CapacityError extends RelayError {
  constructor(limit: number) {
    super('capacity', `Session limit of ${limit} reached`);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
