// =============================================================
// File: server/lib/errors.ts
// Description: Error kinds raised by the ledger services.
//   Each carries an HTTP status and a stable machine code so
//   routes can translate them.
//   Anything that is not an AppError is a storage failure and
//   is wrapped in StorageError at the service boundary.
// =============================================================

import type { ChangeRequestStatus } from '../../shared/types';

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'UNAUTHORIZED'
  | 'FORBIDDEN'
  | 'NOT_FOUND'
  | 'INSUFFICIENT_STOCK'
  | 'INVALID_STATE_TRANSITION'
  | 'STORAGE_ERROR';

export class AppError extends Error {
  readonly statusCode: number;
  readonly code: ErrorCode;

  constructor(message: string, statusCode: number, code: ErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400, 'VALIDATION_ERROR');
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Authentication required') {
    super(message, 401, 'UNAUTHORIZED');
  }
}

export class ForbiddenError extends AppError {
  constructor(message: string) {
    super(message, 403, 'FORBIDDEN');
  }
}

export class NotFoundError extends AppError {
  readonly entity: string;
  readonly entityId: number | string;

  constructor(entity: string, id: number | string) {
    super(`${entity} ${id} not found`, 404, 'NOT_FOUND');
    this.entity = entity;
    this.entityId = id;
  }
}

export class InsufficientStockError extends AppError {
  readonly fruit: string;
  readonly requested: number;
  readonly available: number;
  readonly shortfall: number;

  constructor(fruit: string, requested: number, available: number) {
    const shortfall = requested - available;
    super(
      `Insufficient stock for ${fruit}. Available: ${available}, Requested: ${requested}, Short by ${shortfall}`,
      409,
      'INSUFFICIENT_STOCK'
    );
    this.fruit = fruit;
    this.requested = requested;
    this.available = available;
    this.shortfall = shortfall;
  }
}

export class InvalidStateTransitionError extends AppError {
  readonly currentStatus: ChangeRequestStatus;

  constructor(requestId: number, currentStatus: ChangeRequestStatus) {
    super(`Request ${requestId} already ${currentStatus}`, 409, 'INVALID_STATE_TRANSITION');
    this.currentStatus = currentStatus;
  }
}

export class StorageError extends AppError {
  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Storage failure during ${operation}: ${detail}`, 503, 'STORAGE_ERROR', { cause });
  }
}

/** Pass domain errors through; wrap everything else as a storage failure. */
export function toAppError(operation: string, error: unknown): AppError {
  if (error instanceof AppError) return error;
  return new StorageError(operation, error);
}
