// config/ledger.config.ts
import { registerAs } from '@nestjs/config';

export const DEFAULT_LOCK_TIMEOUT_MS = 5000;

export interface LedgerConfig {
  /** Max time an operation waits for each account lock */
  lockTimeoutMs: number;
}

function parseTimeout(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') {
    return DEFAULT_LOCK_TIMEOUT_MS;
  }

  const value = raw.trim();
  const parsed = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new Error(
      `LEDGER_LOCK_TIMEOUT_MS must be a positive integer, got '${raw}'`,
    );
  }
  return parsed;
}

export default registerAs(
  'ledger',
  (): LedgerConfig => ({
    lockTimeoutMs: parseTimeout(process.env.LEDGER_LOCK_TIMEOUT_MS),
  }),
);
