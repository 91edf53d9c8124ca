import { NotFoundException } from '@nestjs/common';
import type { Response } from 'express';
import { describe, expect, it, vi } from 'vitest';

import type { MetricsCollectorService } from './metrics-collector.service';
import { MetricsController } from './metrics.controller';
import { MetricsService } from './metrics.service';
import type { AppConfigService } from '../config/app-config.service';

const createController = (
  metricsEnabled: boolean,
  collect: () => void,
): { controller: MetricsController; metricsService: MetricsService } => {
  const metricsService: MetricsService = new MetricsService();
  const controller: MetricsController = new MetricsController(
    metricsService,
    { collect } as unknown as MetricsCollectorService,
    { metricsEnabled } as unknown as AppConfigService,
  );

  return { controller, metricsService };
};

describe('MetricsController', (): void => {
  it('refreshes sampled gauges and writes the exposition', async (): Promise<void> => {
    const collect = vi.fn();
    const { controller, metricsService } = createController(true, collect);
    metricsService.notificationIntentsTotal.inc({ kind: 'wallet_transfer' });
    const send = vi.fn();
    const type = vi.fn().mockReturnValue({ send });

    await controller.scrape({ type } as unknown as Response);

    expect(collect).toHaveBeenCalledTimes(1);
    expect(type).toHaveBeenCalledWith(metricsService.getContentType());
    expect(send).toHaveBeenCalledWith(
      expect.stringContaining('notification_intents_total{kind="wallet_transfer"} 1'),
    );
  });

  it('responds not found when metrics are disabled', async (): Promise<void> => {
    const collect = vi.fn();
    const { controller } = createController(false, collect);

    await expect(controller.scrape({} as unknown as Response)).rejects.toBeInstanceOf(
      NotFoundException,
    );
    expect(collect).not.toHaveBeenCalled();
  });
});
