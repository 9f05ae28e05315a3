// src/account/exceptions/invalid-amount.exception.ts
import { HttpStatus } from '@nestjs/common';
import {
  AccountErrorKind,
  AccountOperationException,
} from './account-operation.exception';

/**
 * Excepción para un monto de depósito, retiro o transferencia que no es un
 * número finito mayor que cero, o que desbordaría el balance.
 *
 * HTTP Status: 400 BAD REQUEST
 */
export class InvalidAmountException extends AccountOperationException {
  constructor(
    operation: string,
    readonly amount: number,
    message = `${operation} amount must be positive, got ${amount}`,
  ) {
    super(AccountErrorKind.INVALID_AMOUNT, message, HttpStatus.BAD_REQUEST);
  }

  static overflow(
    operation: string,
    amount: number,
    accountName: string,
  ): InvalidAmountException {
    return new InvalidAmountException(
      operation,
      amount,
      `${operation} of ${amount} would overflow the balance of account '${accountName}'`,
    );
  }
}
