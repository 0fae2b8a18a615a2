export type DhtErrorCode =
  | 'MALFORMED_ENVELOPE'
  | 'MISSING_ORIGIN'
  | 'ENCRYPTED_WITHOUT_ORIGIN'
  | 'AUTHENTICATION_FAILED'
  | 'UNSUPPORTED_MESSAGE_TYPE'
  | 'UNSUPPORTED_VERSION'
  | 'NETWORK_MISMATCH'
  | 'IDENTITY_MISSING'
  | 'INVALID_CONFIG'
  | 'TRANSPORT_FAILED';

/** Reasons an inbound message can be dropped (never thrown, reported via events) */
export type DropReason = Exclude<DhtErrorCode, 'IDENTITY_MISSING' | 'INVALID_CONFIG' | 'TRANSPORT_FAILED'>;

/**
 * Thrown only for local contract violations (no identity, bad config, misuse of
 * the outbound API). Anything caused by a remote peer is a drop, not an exception.
 */
export class DhtError extends Error {
  readonly code: DhtErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: DhtErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'DhtError';
    this.code = code;
    this.context = context;
  }
}
