/**
 * Base class for every error raised by the request/reply stage.
 */
export class RequestReplyError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Invalid or incomplete configuration. Raised while the stage is being created.
 */
export class ConfigurationError extends RequestReplyError {}

/**
 * The broker could not be reached, rejected the handshake, or failed mid-request.
 */
export class ConnectionError extends RequestReplyError {}

/**
 * The stage has no live connection, either because it was never connected or
 * because it has been closed.
 */
export class StageClosedError extends RequestReplyError {}

/**
 * A subject or header template could not be evaluated against a record.
 */
export class TemplateEvaluationError extends RequestReplyError {}

/**
 * No reply arrived before the request deadline.
 */
export class RequestTimeoutError extends RequestReplyError {}

/**
 * The caller aborted the request before a reply arrived.
 */
export class RequestCancelledError extends RequestReplyError {}

/**
 * The server reported that nothing is subscribed to the request subject.
 */
export class NoRespondersError extends RequestReplyError {}

/**
 * The reply could not be turned into an output record.
 */
export class ConversionError extends RequestReplyError {}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : 'Unknown error';
}
