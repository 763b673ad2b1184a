/**
 * Error taxonomy shared by the REST routes and the WebSocket gateway.
 *
 * Every error carries a machine-readable `code` and the HTTP status it maps
 * to. Over WebSocket only the message is sent.
 *
 * @module lib/errors
 */
import type { Permission } from '@switchboard/shared/permissions';

export type ChatErrorCode =
  | 'AUTHENTICATION_FAILED'
  | 'PERMISSION_DENIED'
  | 'VALIDATION_FAILED'
  | 'NOT_FOUND'
  | 'CONFLICT';

export class ChatError extends Error {
  constructor(
    message: string,
    public readonly code: ChatErrorCode,
    public readonly status: number,
  ) {
    super(message);
    this.name = 'ChatError';
  }
}

export class AuthenticationError extends ChatError {
  constructor(message = 'Invalid or missing authentication credentials') {
    super(message, 'AUTHENTICATION_FAILED', 401);
    this.name = 'AuthenticationError';
  }
}

export class AuthorizationError extends ChatError {
  constructor(
    message: string,
    public readonly permission: Permission,
  ) {
    super(message, 'PERMISSION_DENIED', 403);
    this.name = 'AuthorizationError';
  }
}

export class ValidationError extends ChatError {
  constructor(message: string, status = 400) {
    super(message, 'VALIDATION_FAILED', status);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends ChatError {
  constructor(message: string) {
    super(message, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends ChatError {
  constructor(message: string) {
    super(message, 'CONFLICT', 409);
    this.name = 'ConflictError';
  }
}
