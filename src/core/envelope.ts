/**
 * Transport-agnostic result envelope.
 *
 * Wire form:
 *   success  {"result": <payload>}
 *   failure  {"error": {"kind": <kind>, "message": <message>}}
 *
 * Clients branch on `kind` alone; the vocabulary below is stable across
 * stdio, SSE and HTTP.
 */

import {
  AuthenticationError,
  BackendError,
  ForbiddenError,
  PortalMcpError,
  SessionExpiredError,
  UnknownToolError,
  ValidationError
} from '../errors/mcpErrors.js';

export const FAILURE_KINDS = ['UnknownTool', 'Forbidden', 'InvalidArgument', 'Auth', 'Backend'] as const;

export type FailureKind = typeof FAILURE_KINDS[number];

export interface SuccessEnvelope<T = unknown> {
  ok: true;
  payload: T;
}

export interface FailureEnvelope {
  ok: false;
  kind: FailureKind;
  message: string;
}

export type ResultEnvelope<T = unknown> = SuccessEnvelope<T> | FailureEnvelope;

export type Outcome<T = unknown> =
  | { ok: true; value: T }
  | { ok: false; error: unknown };

export type WireEnvelope =
  | { result: unknown }
  | { error: { kind: FailureKind; message: string } };

/** Message used for errors outside the taxonomy; their text may carry internals */
export const UNEXPECTED_FAILURE_MESSAGE = 'Unexpected failure while calling the portal';

const REDACTED = '***';

export function success<T>(payload: T): SuccessEnvelope<T> {
  return { ok: true, payload };
}

export function failure(kind: FailureKind, message: string): FailureEnvelope {
  return { ok: false, kind, message };
}

export function isFailureKind(value: unknown): value is FailureKind {
  return FAILURE_KINDS.some(kind => kind === value);
}

/**
 * Replace every occurrence of the given secrets in a message
 */
export function redact(message: string, secrets: readonly string[]): string {
  let result = message;
  for (const secret of secrets) {
    if (secret) {
      result = result.split(secret).join(REDACTED);
    }
  }
  return result;
}

/**
 * Classify an error into the kind vocabulary
 */
export function kindOf(error: unknown): FailureKind {
  if (error instanceof UnknownToolError) return 'UnknownTool';
  if (error instanceof ForbiddenError) return 'Forbidden';
  if (error instanceof ValidationError) return 'InvalidArgument';
  if (error instanceof AuthenticationError || error instanceof SessionExpiredError) return 'Auth';
  return 'Backend';
}

function messageOf(error: unknown): string {
  if (!(error instanceof PortalMcpError)) {
    return UNEXPECTED_FAILURE_MESSAGE;
  }

  const detail = error instanceof BackendError ? error.data?.detail : undefined;
  return typeof detail === 'string' && detail !== ''
    ? `${error.message}: ${detail}`
    : error.message;
}

/**
 * Pure mapping from an outcome to an envelope. Secrets are scrubbed from
 * every failure message.
 */
export function toEnvelope<T>(outcome: Outcome<T>, secrets: readonly string[] = []): ResultEnvelope<T> {
  if (outcome.ok) {
    return success(outcome.value);
  }
  return failure(kindOf(outcome.error), redact(messageOf(outcome.error), secrets));
}

export function toWire(envelope: ResultEnvelope): WireEnvelope {
  if (envelope.ok) {
    return { result: envelope.payload === undefined ? null : envelope.payload };
  }
  return { error: { kind: envelope.kind, message: envelope.message } };
}

export function serializeEnvelope(envelope: ResultEnvelope): string {
  return JSON.stringify(toWire(envelope));
}

/**
 * Parse a wire envelope back into its tagged form
 *
 * @throws {Error} when the text is not a well-formed envelope
 */
export function parseEnvelope(text: string): ResultEnvelope {
  const document: unknown = JSON.parse(text);
  if (typeof document !== 'object' || document === null || Array.isArray(document)) {
    throw new Error('Envelope must be a JSON object');
  }

  const hasResult = 'result' in document;
  const hasError = 'error' in document;
  if (hasResult === hasError) {
    throw new Error('Envelope must carry exactly one of "result" or "error"');
  }

  if ('result' in document) {
    return success(document.result);
  }

  const error = 'error' in document ? document.error : undefined;
  if (typeof error !== 'object' || error === null || !('kind' in error) || !('message' in error)) {
    throw new Error('Envelope error must carry "kind" and "message"');
  }
  const { kind, message } = error;
  if (!isFailureKind(kind) || typeof message !== 'string') {
    throw new Error('Envelope error has an unknown kind or a non-string message');
  }
  return failure(kind, message);
}

/**
 * HTTP status for an envelope on the plain HTTP transport
 */
export function httpStatusOf(envelope: ResultEnvelope): number {
  if (envelope.ok) {
    return 200;
  }
  switch (envelope.kind) {
    case 'InvalidArgument':
      return 400;
    case 'Auth':
      return 401;
    case 'Forbidden':
      return 403;
    case 'UnknownTool':
      return 404;
    case 'Backend':
      return 502;
  }
}
