// src/account/exceptions/account-operation.exception.ts
import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * Motivos por los que se puede rechazar una operación sobre una cuenta.
 */
export enum AccountErrorKind {
  INVALID_AMOUNT = 'InvalidAmount',
  ACCOUNT_FROZEN = 'AccountFrozen',
  COUNTERPARTY_FROZEN = 'CounterpartyFrozen',
  INSUFFICIENT_FUNDS = 'InsufficientFunds',
  INVALID_TARGET = 'InvalidTarget',
  LOCK_TIMEOUT = 'LockTimeout',
}

/**
 * Clase base de todos los rechazos de una operación sobre una cuenta.
 *
 * Las operaciones no las lanzan: las devuelven dentro de un `OperationResult`
 * fallido. Extienden `HttpException` para que una app NestJS pueda relanzarlas
 * (ver `unwrap`) y responder con el status correcto.
 */
export abstract class AccountOperationException extends HttpException {
  protected constructor(
    readonly kind: AccountErrorKind,
    message: string,
    status: HttpStatus,
    readonly retryable = false,
  ) {
    super({ statusCode: status, message, error: kind, retryable }, status);
  }
}
