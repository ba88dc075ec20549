import * as functions from "firebase-functions/v1";

export type ErrorCode =
  | 'permission-denied'
  | 'not-found'
  | 'unavailable'
  | 'deadline-exceeded'
  | 'failed-precondition'
  | 'resource-exhausted'
  | 'invalid-argument'
  | 'unauthenticated';

export type ErrorKind =
  | 'AccessDeniedError'
  | 'UnknownUserError'
  | 'NotFoundError'
  | 'PersistenceError'
  | 'CompletionServiceError'
  | 'TurnInProgressError'
  | 'PromptTooLargeError'
  | 'InvalidRequestError';

/**
 * Base class for every failure the assistant reports to its callers.
 * `kind` survives serialization, so the client can tell failures apart
 * even when two kinds share an HTTPS error code.
 */
export abstract class AssistantError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class AccessDeniedError extends AssistantError {
  readonly kind = 'AccessDeniedError';
  readonly code = 'permission-denied';

  constructor(readonly requestedUserId: string) {
    super(`Access to records of another user is not allowed`);
  }
}

export class UnknownUserError extends AssistantError {
  readonly kind = 'UnknownUserError';
  readonly code = 'not-found';

  constructor(readonly userId: string) {
    super(`No billing account for user ${userId}`);
  }
}

export class NotFoundError extends AssistantError {
  readonly kind = 'NotFoundError';
  readonly code = 'not-found';
}

export class PersistenceError extends AssistantError {
  readonly kind = 'PersistenceError';
  readonly code = 'unavailable';
}

export class CompletionServiceError extends AssistantError {
  readonly kind = 'CompletionServiceError';
  readonly code: ErrorCode;

  constructor(message: string, readonly timedOut = false, options?: { cause?: unknown }) {
    super(message, options);
    this.code = timedOut ? 'deadline-exceeded' : 'unavailable';
  }
}

export class TurnInProgressError extends AssistantError {
  readonly kind = 'TurnInProgressError';
  readonly code = 'failed-precondition';

  constructor(readonly userId: string) {
    super(`A turn is already in progress for user ${userId}`);
  }
}

export class PromptTooLargeError extends AssistantError {
  readonly kind = 'PromptTooLargeError';
  readonly code = 'resource-exhausted';

  constructor(readonly length: number, readonly limit: number) {
    super(`Prompt of ${length} characters exceeds the limit of ${limit}`);
  }
}

export class InvalidRequestError extends AssistantError {
  readonly kind = 'InvalidRequestError';
  readonly code = 'invalid-argument';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

// Callables rethrow through here so the client receives a typed HttpsError
export function toHttpsError(error: unknown): functions.https.HttpsError {
  if (error instanceof functions.https.HttpsError) {
    return error;
  }
  if (error instanceof AssistantError) {
    return new functions.https.HttpsError(error.code, error.message, { kind: error.kind });
  }
  return new functions.https.HttpsError('internal', errorMessage(error));
}

export function requireAuth(context: functions.https.CallableContext): string {
  const uid = context.auth?.uid;
  if (!uid) {
    throw new functions.https.HttpsError('unauthenticated', 'Sign in to use the billing assistant');
  }
  return uid;
}
