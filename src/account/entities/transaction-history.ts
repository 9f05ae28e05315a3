import { TransactionRecord } from './transaction.entity';

/**
 * Append-only log of an account's transactions, in commit order.
 */
export class TransactionHistory {
  private readonly records: TransactionRecord[] = [];

  append(record: TransactionRecord): void {
    this.records.push(record);
  }

  get length(): number {
    return this.records.length;
  }

  /**
   * Returns a copy; mutating it does not touch the log.
   */
  snapshot(): TransactionRecord[] {
    return [...this.records];
  }
}
