import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_INTERCEPTOR } from '@nestjs/core';
import llmConfig from '@config/llm.config';
import scoringConfig from '@config/scoring.config';
import { HealthModule } from './infrastructure/health/health.module';
import { LlmModule } from './infrastructure/llm/llm.module';
import { LoggerModule } from './infrastructure/logging/logger.module';
import { LoggingInterceptor } from './infrastructure/logging/logging.interceptor';
import { ScoringModule } from './infrastructure/scoring/scoring.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
      load: [llmConfig, scoringConfig],
    }),
    LoggerModule,
    LlmModule,
    HealthModule,
    ScoringModule,
  ],
  providers: [
    {
      provide: APP_INTERCEPTOR,
      useClass: LoggingInterceptor,
    },
  ],
})
export class AppModule {}
