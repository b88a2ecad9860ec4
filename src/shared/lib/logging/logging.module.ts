import { Module } from '@nestjs/common';
import { CorpusLoggerService } from './corpus-logger.service';

@Module({
  providers: [
    {
      provide: 'JOB_NAME',
      useValue: process.env.JOB_NAME || 'corpus-cleaner',
    },
    {
      provide: 'APP_NAME',
      useValue: process.env.APP_NAME || 'indic-corpus',
    },
    {
      provide: 'LOKI_HOST',
      useValue: process.env.LOKI_HOST || '',
    },
    CorpusLoggerService,
    {
      provide: 'LOGGER_SERVICE',
      useExisting: CorpusLoggerService,
    },
  ],
  exports: [
    'LOGGER_SERVICE', // main abstraction
    CorpusLoggerService, // if you want to inject class directly
    'JOB_NAME',
    'APP_NAME',
  ],
})
export class LoggingModule {}
