import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';

import ledgerConfig from '../../../config/ledger.config';
import { Account } from '../entities/account.entity';
import { ReleaseFn } from '../locks/account-lock';

export type LockLease =
  | { acquired: true; release: ReleaseFn }
  | { acquired: false; account: Account; timeoutMs: number };

function byId(a: Account, b: Account): number {
  if (a.id === b.id) return 0;
  return a.id < b.id ? -1 : 1;
}

/**
 * Servicio que toma los locks de todas las cuentas que toca una operación.
 *
 * Siempre en orden ascendente de `id`, sin importar el orden en que lleguen,
 * así dos transferencias A→B y B→A simultáneas no pueden esperarse en ciclo.
 */
@Injectable()
export class AccountLockService {
  private readonly logger = new Logger(AccountLockService.name);
  readonly defaultTimeoutMs: number;

  constructor(
    @Inject(ledgerConfig.KEY)
    config: ConfigType<typeof ledgerConfig>,
  ) {
    this.defaultTimeoutMs = config.lockTimeoutMs;
  }

  /**
   * Todo o nada: si un lock vence, se liberan los que ya se tenían antes de
   * devolver. `timeoutMs` limita la espera de cada lock.
   */
  async acquireAll(
    accounts: readonly Account[],
    timeoutMs: number = this.defaultTimeoutMs,
  ): Promise<LockLease> {
    const ordered = [...new Set(accounts)].sort(byId);
    const held: ReleaseFn[] = [];

    for (const account of ordered) {
      const release = await account.lock.acquire(timeoutMs);
      if (!release) {
        this.releaseAll(held);
        this.logger.debug(
          `Timed out after ${timeoutMs}ms waiting for account ${account.name} (${account.id})`,
        );
        return { acquired: false, account, timeoutMs };
      }
      held.push(release);
    }

    return { acquired: true, release: () => this.releaseAll(held) };
  }

  private releaseAll(held: ReleaseFn[]): void {
    for (let i = held.length - 1; i >= 0; i--) {
      held[i]();
    }
  }
}
