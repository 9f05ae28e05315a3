/**
 * The type of transaction.
 */
export enum TransactionType {
  /** Deposit funds into the account */
  DEPOSIT = 'deposit',
  /** Withdraw funds from the account */
  WITHDRAW = 'withdraw',
  /** Funds sent to another account */
  TRANSFER_OUT = 'transfer_out',
  /** Funds received from another account */
  TRANSFER_IN = 'transfer_in',
}

/**
 * One entry of an account's audit trail. Records are frozen when created.
 */
export interface TransactionRecord {
  /**
   * The type of the transaction
   * @example 'deposit'
   */
  readonly type: TransactionType;

  /** The amount moved, always positive */
  readonly amount: number;

  /** The balance of the account AFTER this transaction */
  readonly balanceAfter: number;

  /**
   * Human readable note
   * @example 'Transferred to Bob'
   */
  readonly note: string;
}

export function createTransactionRecord(
  type: TransactionType,
  amount: number,
  balanceAfter: number,
  note: string,
): TransactionRecord {
  return Object.freeze({ type, amount, balanceAfter, note });
}
