import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';

import { HealthService } from './health.service';
import type { AppHealthStatus } from './health.types';

@ApiTags('Health')
@Controller('health')
export class HealthController {
  public constructor(private readonly healthService: HealthService) {}

  @Get()
  @ApiOperation({ summary: 'Database, notifier and poll cycle status' })
  public async getHealthStatus(): Promise<AppHealthStatus> {
    return this.healthService.getHealthStatus();
  }
}
