// src/app.module.ts
import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { validateEnv } from './cleaning/cleaning.config';
import { CleaningModule } from './cleaning/cleaning.module';
import { LoggingModule } from './shared/lib/logging/logging.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate: validateEnv }),
    LoggingModule,
    CleaningModule,
  ],
})
export class AppModule {}
