import { Controller, Get } from '@nestjs/common';

export interface HealthResponse {
  status: string;
  timestamp: string;
  uptime: number;
  service: string;
}

@Controller('health')
export class HealthController {
  @Get()
  check(): HealthResponse {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      service: 'resume-scoring',
    };
  }
}
