import { BadRequestException } from '@nestjs/common';
import { describe, expect, it } from 'vitest';

import { ZodValidationPipe } from './zod-validation.pipe';
import { trackWalletSchema } from '../dto/track-wallet.dto';
import { topHoldersQuerySchema } from '../dto/top-holders-query.dto';
import { userIdSchema } from '../dto/user-id.dto';
import { whaleAlertConfigSchema } from '../dto/whale-alert-config.dto';

describe('ZodValidationPipe', (): void => {
  it('returns parsed data with defaults applied', (): void => {
    const pipe = new ZodValidationPipe(topHoldersQuerySchema);

    expect(pipe.transform({})).toEqual({ count: 5 });
    expect(pipe.transform({ count: '12' })).toEqual({ count: 12 });
  });

  it('rejects a negative threshold with the field path in the message', (): void => {
    const pipe = new ZodValidationPipe(whaleAlertConfigSchema);

    try {
      pipe.transform({ tokenMints: [], thresholdAmount: -5, enabled: true });
      expect.fail('Should have thrown');
    } catch (error: unknown) {
      expect(error).toBeInstanceOf(BadRequestException);
      expect(error instanceof BadRequestException ? error.message : '').toContain(
        'Validation failed: thresholdAmount:',
      );
    }
  });

  it('rejects a missing enabled flag', (): void => {
    const pipe = new ZodValidationPipe(whaleAlertConfigSchema);

    expect(() => pipe.transform({ tokenMints: [] })).toThrow(BadRequestException);
  });

  it('reports route parameter issues under the parameter name', (): void => {
    const pipe = new ZodValidationPipe(userIdSchema);

    expect(() => pipe.transform('', { type: 'param', data: 'userId' })).toThrow(
      /^Validation failed: userId: /,
    );
  });

  it('joins nested body issues by their path', (): void => {
    const pipe = new ZodValidationPipe(trackWalletSchema);

    expect(() => pipe.transform({}, { type: 'body' })).toThrow(/^Validation failed: address: /);
  });
});
