// src/account/exceptions/counterparty-frozen.exception.ts
import { HttpStatus } from '@nestjs/common';
import {
  AccountErrorKind,
  AccountOperationException,
} from './account-operation.exception';

/**
 * Excepción lanzada cuando la cuenta destino de una transferencia está
 * congelada.
 *
 * HTTP Status: 409 CONFLICT
 */
export class CounterpartyFrozenException extends AccountOperationException {
  constructor(counterpartyName: string) {
    super(
      AccountErrorKind.COUNTERPARTY_FROZEN,
      `Target account '${counterpartyName}' is frozen`,
      HttpStatus.CONFLICT,
    );
  }
}
