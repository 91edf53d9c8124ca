import { NotFoundException } from '@nestjs/common';
import { describe, expect, it, vi } from 'vitest';

import { WhaleAlertController } from './whale-alert.controller';
import type { TrackingService } from '../../tracking/tracking.service';
import { USDC_MINT } from '../../../../test/helpers/solana-addresses';

describe('WhaleAlertController', (): void => {
  it('answers 404 when the user has no whale alert', (): void => {
    const controller: WhaleAlertController = new WhaleAlertController({
      getWhaleConfig: vi.fn().mockReturnValue(null),
    } as unknown as TrackingService);

    expect(() => controller.getConfig('42')).toThrow(NotFoundException);
  });

  it('replaces the config and leaves a missing threshold to the default', async (): Promise<void> => {
    const updateWhaleConfig = vi.fn().mockResolvedValue({
      userId: '42',
      tokenMints: [USDC_MINT],
      thresholdAmount: 50_000,
      enabled: true,
      updatedAt: new Date('2024-03-01T12:00:00.000Z'),
    });
    const controller: WhaleAlertController = new WhaleAlertController({
      updateWhaleConfig,
    } as unknown as TrackingService);

    const result = await controller.replaceConfig('42', { tokenMints: [USDC_MINT], enabled: true });

    expect(updateWhaleConfig).toHaveBeenCalledWith('42', {
      tokenMints: [USDC_MINT],
      thresholdAmount: null,
      enabled: true,
    });
    expect(result).toEqual({
      userId: '42',
      tokenMints: [USDC_MINT],
      thresholdAmount: 50_000,
      enabled: true,
      updatedAt: '2024-03-01T12:00:00.000Z',
    });
  });
});
