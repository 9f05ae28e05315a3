// src/account/services/transaction-executor.service.ts
import { Injectable, Logger } from '@nestjs/common';

import { Account } from '../entities/account.entity';
import { LockTimeoutException } from '../exceptions/lock-timeout.exception';
import { failed, OperationResult } from '../types/operation-result';
import { AccountLockService } from './account-lock.service';

/**
 * Servicio responsable de ejecutar operaciones sobre cuentas.
 *
 * Cada operación corre como una sección crítica sobre todas las cuentas que
 * toca: primero se toman los locks (en orden global), luego se ejecuta la
 * operación síncrona y por último se liberan, pase lo que pase.
 */
@Injectable()
export class TransactionExecutor {
  private readonly logger = new Logger(TransactionExecutor.name);

  constructor(private readonly lockService: AccountLockService) {}

  /**
   * Ejecuta `operation` con las cuentas bloqueadas.
   *
   * Un timeout al tomar los locks se devuelve como fallo `LockTimeout`, sin
   * haber tocado ninguna cuenta.
   */
  async execute(
    label: string,
    accounts: readonly Account[],
    operation: () => OperationResult,
    timeoutMs?: number,
  ): Promise<OperationResult> {
    const lease = await this.lockService.acquireAll(accounts, timeoutMs);
    if (!lease.acquired) {
      this.logger.warn(
        `${label} aborted: lock timeout on ${lease.account.name}`,
      );
      return failed(
        new LockTimeoutException(lease.account.name, lease.timeoutMs),
      );
    }

    try {
      const result = operation();
      if (result.success) {
        this.logger.debug(`${label} committed`);
      } else {
        this.logger.warn(`${label} rejected: ${result.error.message}`);
      }
      return result;
    } finally {
      lease.release();
    }
  }
}
