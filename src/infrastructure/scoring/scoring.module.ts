import { Module } from '@nestjs/common';
import { ApplicationModule } from '@application/application.module';
import { ScoringController } from './scoring.controller';

@Module({
  imports: [ApplicationModule],
  controllers: [ScoringController],
})
export class ScoringModule {}
