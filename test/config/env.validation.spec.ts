import { ConfigModule } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { validate } from 'config/env.validation';
import ledgerConfig, { DEFAULT_LOCK_TIMEOUT_MS } from 'config/ledger.config';
import { AccountsModule } from 'src/account/account.module';
import { AccountLockService } from 'src/account/services/account-lock.service';

describe('Environment validation', () => {
  it('should accept an environment without ledger settings', () => {
    expect(() => validate({ NODE_ENV: 'test' })).not.toThrow();
  });

  it('should convert the lock timeout to a number', () => {
    const config = validate({ LEDGER_LOCK_TIMEOUT_MS: '250' });

    expect(config.LEDGER_LOCK_TIMEOUT_MS).toBe(250);
  });

  it.each(['0', '-5', 'soon', '1.5'])(
    'should reject %p as a lock timeout',
    (value) => {
      expect(() => validate({ LEDGER_LOCK_TIMEOUT_MS: value })).toThrow(
        /Invalid environment/,
      );
    },
  );
});

describe('ledgerConfig', () => {
  afterEach(() => {
    delete process.env.LEDGER_LOCK_TIMEOUT_MS;
  });

  it('should default the lock timeout', () => {
    delete process.env.LEDGER_LOCK_TIMEOUT_MS;

    expect(ledgerConfig()).toEqual({ lockTimeoutMs: DEFAULT_LOCK_TIMEOUT_MS });
  });

  it('should read the lock timeout from the environment', () => {
    process.env.LEDGER_LOCK_TIMEOUT_MS = '1200';

    expect(ledgerConfig()).toEqual({ lockTimeoutMs: 1200 });
  });

  it('should treat an empty value as unset', () => {
    process.env.LEDGER_LOCK_TIMEOUT_MS = '';

    expect(ledgerConfig().lockTimeoutMs).toBe(DEFAULT_LOCK_TIMEOUT_MS);
  });

  it.each(['never', '1.5', '10ms', '0', '-5'])(
    'should refuse %p instead of guessing a timeout',
    (value) => {
      process.env.LEDGER_LOCK_TIMEOUT_MS = value;

      expect(() => ledgerConfig()).toThrow(
        `LEDGER_LOCK_TIMEOUT_MS must be a positive integer, got '${value}'`,
      );
    },
  );
});

describe('AccountsModule configuration', () => {
  afterEach(() => {
    delete process.env.LEDGER_LOCK_TIMEOUT_MS;
  });

  it('should fail to start outside AppModule with a bad lock timeout', async () => {
    process.env.LEDGER_LOCK_TIMEOUT_MS = '10ms';

    await expect(
      Test.createTestingModule({
        imports: [ConfigModule.forRoot(), AccountsModule],
      }).compile(),
    ).rejects.toThrow(
      "LEDGER_LOCK_TIMEOUT_MS must be a positive integer, got '10ms'",
    );
  });

  it('should use a valid lock timeout outside AppModule', async () => {
    process.env.LEDGER_LOCK_TIMEOUT_MS = '40';

    const module = await Test.createTestingModule({
      imports: [ConfigModule.forRoot(), AccountsModule],
    }).compile();

    expect(module.get(AccountLockService).defaultTimeoutMs).toBe(40);
    await module.close();
  });
});
