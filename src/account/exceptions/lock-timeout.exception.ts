// src/account/exceptions/lock-timeout.exception.ts
import { HttpStatus } from '@nestjs/common';
import {
  AccountErrorKind,
  AccountOperationException,
} from './account-operation.exception';

/**
 * Excepción lanzada cuando no se pudo tomar el lock de una cuenta a tiempo.
 *
 * HTTP Status: 503 SERVICE UNAVAILABLE
 *
 * Esta excepción indica:
 * - Otra operación retuvo la cuenta más tiempo que la espera configurada
 * - No se modificó nada, el cliente PUEDE reintentar la operación
 */
export class LockTimeoutException extends AccountOperationException {
  constructor(accountName: string, timeoutMs: number) {
    super(
      AccountErrorKind.LOCK_TIMEOUT,
      `Could not lock account '${accountName}' within ${timeoutMs}ms`,
      HttpStatus.SERVICE_UNAVAILABLE,
      true,
    );
  }
}
