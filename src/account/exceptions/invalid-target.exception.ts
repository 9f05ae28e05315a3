// src/account/exceptions/invalid-target.exception.ts
import { HttpStatus } from '@nestjs/common';
import {
  AccountErrorKind,
  AccountOperationException,
} from './account-operation.exception';

/**
 * Excepción lanzada cuando una cuenta intenta transferirse a sí misma.
 *
 * HTTP Status: 400 BAD REQUEST
 */
export class InvalidTargetException extends AccountOperationException {
  constructor(accountName: string) {
    super(
      AccountErrorKind.INVALID_TARGET,
      `Account '${accountName}' cannot transfer to itself`,
      HttpStatus.BAD_REQUEST,
    );
  }
}
