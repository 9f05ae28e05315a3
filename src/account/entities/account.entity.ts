import { v4 as uuid } from 'uuid';

import { AccountLock } from '../locks/account-lock';
import { AccountFrozenException } from '../exceptions/account-frozen.exception';
import { CounterpartyFrozenException } from '../exceptions/counterparty-frozen.exception';
import { InsufficientFundsException } from '../exceptions/insufficient-funds.exception';
import { InvalidAmountException } from '../exceptions/invalid-amount.exception';
import { InvalidTargetException } from '../exceptions/invalid-target.exception';
import { failed, OperationResult, succeeded } from '../types/operation-result';
import { TransactionHistory } from './transaction-history';
import {
  createTransactionRecord,
  TransactionRecord,
  TransactionType,
} from './transaction.entity';

function isPositiveAmount(amount: number): boolean {
  return Number.isFinite(amount) && amount > 0;
}

function overflows(balance: number, amount: number): boolean {
  return !Number.isFinite(balance + amount);
}

/**
 * A single-currency account.
 *
 * Every operation validates first and mutates last, inside one synchronous
 * call, so a rejected operation leaves balance and history untouched and no
 * caller can observe a half-applied transfer.
 */
export class Account {
  /** Stable identity, used to order lock acquisition */
  readonly id: string = uuid();

  /** Serializes asynchronous callers, see AccountLockService */
  readonly lock = new AccountLock();

  private balance = 0;
  private frozen = false;
  private readonly history = new TransactionHistory();

  constructor(readonly name: string) {}

  deposit(amount: number): OperationResult {
    if (this.frozen) {
      return failed(new AccountFrozenException(this.name));
    }
    if (!isPositiveAmount(amount)) {
      return failed(new InvalidAmountException('Deposit', amount));
    }
    if (overflows(this.balance, amount)) {
      return failed(
        InvalidAmountException.overflow('Deposit', amount, this.name),
      );
    }

    this.balance += amount;
    this.record(TransactionType.DEPOSIT, amount, 'Deposit successful');
    return succeeded();
  }

  withdraw(amount: number): OperationResult {
    if (this.frozen) {
      return failed(new AccountFrozenException(this.name));
    }
    if (!isPositiveAmount(amount)) {
      return failed(new InvalidAmountException('Withdraw', amount));
    }
    if (amount > this.balance) {
      return failed(
        new InsufficientFundsException(this.name, amount, this.balance),
      );
    }

    this.balance -= amount;
    this.record(TransactionType.WITHDRAW, amount, 'Withdrawal successful');
    return succeeded();
  }

  /**
   * Moves `amount` to `counterparty`, writing one record on each side.
   */
  transfer(counterparty: Account, amount: number): OperationResult {
    if (counterparty === this) {
      return failed(new InvalidTargetException(this.name));
    }
    if (this.frozen) {
      return failed(new AccountFrozenException(this.name));
    }
    if (counterparty.frozen) {
      return failed(new CounterpartyFrozenException(counterparty.name));
    }
    if (!isPositiveAmount(amount)) {
      return failed(new InvalidAmountException('Transfer', amount));
    }
    if (amount > this.balance) {
      return failed(
        new InsufficientFundsException(this.name, amount, this.balance),
      );
    }
    if (overflows(counterparty.balance, amount)) {
      return failed(
        InvalidAmountException.overflow('Transfer', amount, counterparty.name),
      );
    }

    this.balance -= amount;
    counterparty.balance += amount;
    this.record(
      TransactionType.TRANSFER_OUT,
      amount,
      `Transferred to ${counterparty.name}`,
    );
    counterparty.record(
      TransactionType.TRANSFER_IN,
      amount,
      `Received from ${this.name}`,
    );
    return succeeded();
  }

  freeze(): void {
    this.frozen = true;
  }

  unfreeze(): void {
    this.frozen = false;
  }

  isFrozen(): boolean {
    return this.frozen;
  }

  getBalance(): number {
    return this.balance;
  }

  getTransactionHistory(): TransactionRecord[] {
    return this.history.snapshot();
  }

  private record(type: TransactionType, amount: number, note: string): void {
    this.history.append(
      createTransactionRecord(type, amount, this.balance, note),
    );
  }
}
