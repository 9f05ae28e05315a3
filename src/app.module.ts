// src/app.module.ts
import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { validate } from '../config/env.validation';
import ledgerConfig from '../config/ledger.config';
import { AccountsModule } from './account/account.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [ledgerConfig],
      envFilePath: ['.env.local', '.env'],
      validate,
    }),
    AccountsModule,
  ],
})
export class AppModule {}
