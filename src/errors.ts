/**
 * Typed errors shared by the engine, the campaign nodes and the transport.
 * Every error carries a stable `code` so callers can branch without
 * string matching.
 */

export type CampaignGraphErrorCode =
  | 'EXTRACTION_FAILED'
  | 'COMPLETION_FAILED'
  | 'LIST_PROVIDER_FAILED'
  | 'PROTOCOL_VIOLATION'
  | 'SESSION_NOT_FOUND'
  | 'SESSION_ALREADY_ACTIVE'
  | 'SESSION_CANCELLED'
  | 'INVARIANT_VIOLATION'
  | 'INVALID_CONFIG';

export class CampaignGraphError extends Error {
  constructor(
    message: string,
    public readonly code: CampaignGraphErrorCode
  ) {
    super(message);
    this.name = 'CampaignGraphError';
  }
}

/** Completion output could not be turned into campaign fields */
export class ExtractionError extends CampaignGraphError {
  constructor(message: string) {
    super(message, 'EXTRACTION_FAILED');
    this.name = 'ExtractionError';
  }
}

/** The text-completion service failed or timed out */
export class CompletionError extends CampaignGraphError {
  constructor(
    message: string,
    public readonly statusCode?: number
  ) {
    super(message, 'COMPLETION_FAILED');
    this.name = 'CompletionError';
  }
}

/** The contact-list directory could not be reached or rejected the request */
export class ListProviderError extends CampaignGraphError {
  constructor(
    message: string,
    public readonly statusCode?: number
  ) {
    super(message, 'LIST_PROVIDER_FAILED');
    this.name = 'ListProviderError';
  }
}

/** Malformed inbound message, or a reply for a question that is not open */
export class ProtocolViolationError extends CampaignGraphError {
  constructor(message: string) {
    super(message, 'PROTOCOL_VIOLATION');
    this.name = 'ProtocolViolationError';
  }
}

export class SessionNotFoundError extends CampaignGraphError {
  constructor(public readonly sessionId: string) {
    super(`No active session for client ${sessionId}`, 'SESSION_NOT_FOUND');
    this.name = 'SessionNotFoundError';
  }
}

export class SessionAlreadyActiveError extends CampaignGraphError {
  constructor(public readonly sessionId: string) {
    super(
      `A session is already active for client ${sessionId}`,
      'SESSION_ALREADY_ACTIVE'
    );
    this.name = 'SessionAlreadyActiveError';
  }
}

/** Raised inside a run loop once its session has been cancelled */
export class SessionCancelledError extends CampaignGraphError {
  constructor(public readonly reason: string) {
    super(`Session cancelled: ${reason}`, 'SESSION_CANCELLED');
    this.name = 'SessionCancelledError';
  }
}

/** An engine invariant was broken; the owning session is aborted */
export class InvariantViolationError extends CampaignGraphError {
  constructor(message: string) {
    super(message, 'INVARIANT_VIOLATION');
    this.name = 'InvariantViolationError';
  }
}

export class ConfigError extends CampaignGraphError {
  constructor(message: string) {
    super(message, 'INVALID_CONFIG');
    this.name = 'ConfigError';
  }
}

/**
 * Human-readable message for any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
