// src/account/account.service.ts
import { Injectable, Logger } from '@nestjs/common';

import { Account } from './entities/account.entity';
import { TransactionRecord } from './entities/transaction.entity';
import { TransactionExecutor } from './services/transaction-executor.service';
import { OperationResult, succeeded } from './types/operation-result';

/**
 * Servicio principal de cuentas.
 *
 * No guarda ninguna cuenta: quien llama es dueño de cada `Account` que abre.
 * Las operaciones que cambian estado pasan por `TransactionExecutor`, que las
 * serializa por cuenta.
 */
@Injectable()
export class AccountsService {
  private readonly logger = new Logger(AccountsService.name);

  constructor(private readonly transactionExecutor: TransactionExecutor) {}

  /**
   * Abre una cuenta nueva con balance 0, sin congelar y sin historial.
   */
  openAccount(name: string): Account {
    const account = new Account(name);
    this.logger.log(`Opened account ${name} (${account.id})`);
    return account;
  }

  deposit(account: Account, amount: number): Promise<OperationResult> {
    return this.transactionExecutor.execute(
      `Deposit of ${amount} into ${account.name}`,
      [account],
      () => account.deposit(amount),
    );
  }

  withdraw(account: Account, amount: number): Promise<OperationResult> {
    return this.transactionExecutor.execute(
      `Withdrawal of ${amount} from ${account.name}`,
      [account],
      () => account.withdraw(amount),
    );
  }

  /**
   * Transfiere entre dos cuentas. Ambas quedan bloqueadas durante toda la
   * operación.
   */
  transfer(
    from: Account,
    to: Account,
    amount: number,
  ): Promise<OperationResult> {
    return this.transactionExecutor.execute(
      `Transfer of ${amount} from ${from.name} to ${to.name}`,
      [from, to],
      () => from.transfer(to, amount),
    );
  }

  /**
   * El freeze espera a que terminen las operaciones en curso sobre la cuenta.
   */
  freeze(account: Account): Promise<OperationResult> {
    return this.transactionExecutor.execute(
      `Freeze of ${account.name}`,
      [account],
      () => {
        account.freeze();
        return succeeded();
      },
    );
  }

  unfreeze(account: Account): Promise<OperationResult> {
    return this.transactionExecutor.execute(
      `Unfreeze of ${account.name}`,
      [account],
      () => {
        account.unfreeze();
        return succeeded();
      },
    );
  }

  getBalance(account: Account): number {
    return account.getBalance();
  }

  getTransactionHistory(account: Account): TransactionRecord[] {
    return account.getTransactionHistory();
  }
}
