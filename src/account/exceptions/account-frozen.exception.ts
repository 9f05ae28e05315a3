// src/account/exceptions/account-frozen.exception.ts
import { HttpStatus } from '@nestjs/common';
import {
  AccountErrorKind,
  AccountOperationException,
} from './account-operation.exception';

/**
 * Excepción para una operación sobre una cuenta congelada.
 *
 * HTTP Status: 409 CONFLICT
 *
 * Esta es una excepción NO RECUPERABLE:
 * - No debe reintentarse automáticamente
 * - Un administrador tiene que descongelar la cuenta
 */
export class AccountFrozenException extends AccountOperationException {
  constructor(accountName: string) {
    super(
      AccountErrorKind.ACCOUNT_FROZEN,
      `Account '${accountName}' is frozen`,
      HttpStatus.CONFLICT,
    );
  }
}
