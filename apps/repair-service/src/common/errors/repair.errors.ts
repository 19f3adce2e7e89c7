import { HttpException, HttpStatus } from '@nestjs/common';

export enum RepairErrorCode {
  NOT_FOUND = 'NOT_FOUND',
  FORBIDDEN = 'FORBIDDEN',
  INVALID_STATE = 'INVALID_STATE',
  NO_ELIGIBLE_STAFF = 'NO_ELIGIBLE_STAFF',
  NO_AUDIT_HISTORY = 'NO_AUDIT_HISTORY',
  STORE_UNAVAILABLE = 'STORE_UNAVAILABLE',
  ORDER_UPDATE_FAILED = 'ORDER_UPDATE_FAILED',
}

export type ErrorContext = Record<string, string | number | boolean | null | undefined>;

/**
 * Base class for every failure the repair core reports. Extends HttpException
 * so a Nest HTTP layer maps it to a status without glue code.
 */
export abstract class RepairError extends HttpException {
  protected constructor(
    readonly code: RepairErrorCode,
    message: string,
    status: HttpStatus,
    readonly context: ErrorContext = {},
    cause?: unknown,
  ) {
    super({ statusCode: status, code, message, context }, status, { cause });
  }
}

export class NotFoundError extends RepairError {
  constructor(entity: string, id: string, context: ErrorContext = {}) {
    super(RepairErrorCode.NOT_FOUND, `${entity} with ID ${id} not found`, HttpStatus.NOT_FOUND, {
      entity,
      id,
      ...context,
    });
  }
}

export class ForbiddenError extends RepairError {
  constructor(message: string, context: ErrorContext = {}) {
    super(RepairErrorCode.FORBIDDEN, message, HttpStatus.FORBIDDEN, context);
  }
}

export class InvalidStateError extends RepairError {
  constructor(message: string, context: ErrorContext = {}) {
    super(RepairErrorCode.INVALID_STATE, message, HttpStatus.CONFLICT, context);
  }
}

export class NoEligibleStaffError extends RepairError {
  constructor(orderId: string, jobType: string, excludeStaffId?: string) {
    super(
      RepairErrorCode.NO_ELIGIBLE_STAFF,
      `No eligible staff found for type ${jobType}` +
        (excludeStaffId ? ` excluding staff ID ${excludeStaffId}` : ''),
      HttpStatus.UNPROCESSABLE_ENTITY,
      { orderId, jobType, excludeStaffId },
    );
  }
}

export class NoAuditHistoryError extends RepairError {
  constructor(tableName?: string, recordId?: string) {
    super(
      RepairErrorCode.NO_AUDIT_HISTORY,
      tableName && recordId
        ? `No audit history for ${tableName} record ${recordId}`
        : 'Audit log is empty',
      HttpStatus.NOT_FOUND,
      { tableName, recordId },
    );
  }
}

export class StoreUnavailableError extends RepairError {
  constructor(operation: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      RepairErrorCode.STORE_UNAVAILABLE,
      `Store operation '${operation}' failed: ${reason}`,
      HttpStatus.SERVICE_UNAVAILABLE,
      { operation },
      cause,
    );
  }
}

export class OrderUpdateFailedError extends RepairError {
  constructor(orderId: string, status: string | null, reason: string) {
    super(
      RepairErrorCode.ORDER_UPDATE_FAILED,
      `Failed to update repair order status for order ID ${orderId}: ${reason}`,
      HttpStatus.CONFLICT,
      { orderId, status },
    );
  }
}

export function isRepairError(error: unknown): error is RepairError {
  return error instanceof RepairError;
}
