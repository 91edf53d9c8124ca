import { Controller, Get, Header, NotFoundException, Res } from '@nestjs/common';
import { ApiExcludeController } from '@nestjs/swagger';
import type { Response } from 'express';

import { MetricsCollectorService } from './metrics-collector.service';
import { MetricsService } from './metrics.service';
import { AppConfigService } from '../config/app-config.service';

@ApiExcludeController()
@Controller('metrics')
export class MetricsController {
  public constructor(
    private readonly metricsService: MetricsService,
    private readonly metricsCollectorService: MetricsCollectorService,
    private readonly appConfigService: AppConfigService,
  ) {}

  /** Prometheus exposition; sampled gauges are refreshed before rendering. */
  @Get()
  @Header('Cache-Control', 'no-store')
  public async scrape(@Res() response: Response): Promise<void> {
    if (!this.appConfigService.metricsEnabled) {
      throw new NotFoundException('Metrics are disabled');
    }

    this.metricsCollectorService.collect();
    const body: string = await this.metricsService.getMetrics();

    response.type(this.metricsService.getContentType()).send(body);
  }
}
