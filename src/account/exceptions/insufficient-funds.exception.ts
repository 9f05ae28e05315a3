// src/account/exceptions/insufficient-funds.exception.ts
import { HttpStatus } from '@nestjs/common';
import {
  AccountErrorKind,
  AccountOperationException,
} from './account-operation.exception';

/**
 * Excepción para un retiro o una transferencia que dejaría el saldo en
 * negativo.
 *
 * HTTP Status: 422 UNPROCESSABLE ENTITY
 *
 * Esta es una excepción NO RECUPERABLE:
 * - No debe reintentarse automáticamente
 * - Indica violación de regla de negocio
 * - El cliente debe ajustar el monto o depositar fondos primero
 */
export class InsufficientFundsException extends AccountOperationException {
  constructor(
    accountName: string,
    readonly requested: number,
    readonly available: number,
  ) {
    super(
      AccountErrorKind.INSUFFICIENT_FUNDS,
      `Insufficient funds in account '${accountName}': requested ${requested}, available ${available}`,
      HttpStatus.UNPROCESSABLE_ENTITY,
    );
  }
}
