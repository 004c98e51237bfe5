import { Controller, Get, HttpStatus, Res } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { Response } from 'express';
import { HealthService, Readiness, SERVICE_NAME } from './health.service';

@ApiTags('health')
@Controller()
export class HealthController {
  constructor(private readonly healthService: HealthService) {}

  @Get('healthz')
  @ApiOperation({ summary: 'Liveness probe' })
  @ApiResponse({ status: 200, description: 'Process is up' })
  healthz(): { service: string; ok: true } {
    return { service: SERVICE_NAME, ok: true };
  }

  @Get('readyz')
  @ApiOperation({
    summary: 'Readiness probe',
    description: 'Pings the database, reports row counts and the embedding model state.',
  })
  @ApiResponse({ status: 200, description: 'Ready to serve searches' })
  @ApiResponse({ status: 503, description: 'Database unreachable or model not loaded' })
  async readyz(@Res({ passthrough: true }) res: Response): Promise<Readiness> {
    const readiness = await this.healthService.readiness();
    res.status(readiness.ready ? HttpStatus.OK : HttpStatus.SERVICE_UNAVAILABLE);
    return readiness;
  }
}
