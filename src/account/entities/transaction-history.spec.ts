import { TransactionHistory } from './transaction-history';
import { createTransactionRecord, TransactionType } from './transaction.entity';

describe('TransactionHistory', () => {
  it('should keep records in insertion order', () => {
    const history = new TransactionHistory();
    const first = createTransactionRecord(
      TransactionType.DEPOSIT,
      10,
      10,
      'Deposit successful',
    );
    const second = createTransactionRecord(
      TransactionType.WITHDRAW,
      4,
      6,
      'Withdrawal successful',
    );

    history.append(first);
    history.append(second);

    expect(history.length).toBe(2);
    expect(history.snapshot()).toEqual([first, second]);
  });

  it('should return an independent snapshot each time', () => {
    const history = new TransactionHistory();
    history.append(
      createTransactionRecord(TransactionType.DEPOSIT, 1, 1, 'Deposit successful'),
    );

    const snapshot = history.snapshot();
    snapshot.length = 0;

    expect(history.length).toBe(1);
    expect(history.snapshot()).not.toBe(history.snapshot());
  });
});
