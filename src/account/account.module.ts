// src/account/account.module.ts
import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import ledgerConfig from '../../config/ledger.config';
import { AccountsService } from './account.service';
import { AccountLockService } from './services/account-lock.service';
import { TransactionExecutor } from './services/transaction-executor.service';

/**
 * Módulo de cuentas.
 *
 * Registra su propia configuración, así que funciona también fuera de
 * AppModule.
 */
@Module({
  imports: [ConfigModule.forFeature(ledgerConfig)],
  providers: [AccountsService, TransactionExecutor, AccountLockService],
  exports: [AccountsService],
})
export class AccountsModule {}
