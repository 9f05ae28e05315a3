import 'reflect-metadata';

export { AppModule } from './app.module';
export { AccountsModule } from './account/account.module';
export { AccountsService } from './account/account.service';
export { Account } from './account/entities/account.entity';
export type { TransactionRecord } from './account/entities/transaction.entity';
export { TransactionType } from './account/entities/transaction.entity';
export * from './account/exceptions';
export type { OperationResult } from './account/types/operation-result';
export {
  failed,
  failureKind,
  succeeded,
  unwrap,
} from './account/types/operation-result';
