import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { WinstonLoggerAdapter } from './winston-logger.adapter';

@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    WinstonLoggerAdapter,
    {
      provide: 'ILoggerPort',
      useExisting: WinstonLoggerAdapter,
    },
  ],
  exports: ['ILoggerPort', WinstonLoggerAdapter],
})
export class LoggerModule {}
