import { Body, Controller, Get, NotFoundException, Param, Put } from '@nestjs/common';
import { ApiBody, ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';

import type { WhaleAlertConfig } from '../../tracking/entities/subscription.interfaces';
import { TrackingService } from '../../tracking/tracking.service';
import { userIdSchema } from '../dto/user-id.dto';
import { type WhaleAlertConfigDto, whaleAlertConfigSchema } from '../dto/whale-alert-config.dto';
import type { IWhaleAlertConfigView } from '../interfaces/api-results.interfaces';
import { ZodValidationPipe } from '../pipes/zod-validation.pipe';
import {
  WHALE_ALERT_CONFIG_BODY_SCHEMA,
  WHALE_ALERT_CONFIG_RESULT_SCHEMA,
} from '../swagger/api-schemas';

const toConfigView = (config: WhaleAlertConfig): IWhaleAlertConfigView => ({
  userId: config.userId,
  tokenMints: config.tokenMints,
  thresholdAmount: config.thresholdAmount,
  enabled: config.enabled,
  updatedAt: config.updatedAt.toISOString(),
});

@ApiTags('Whale alerts')
@Controller('api/users/:userId/whale-alert')
export class WhaleAlertController {
  public constructor(private readonly trackingService: TrackingService) {}

  @Get()
  @ApiOperation({ summary: 'Get the whale alert config' })
  @ApiParam({ name: 'userId', type: 'string' })
  @ApiResponse({ status: 200, description: 'Config', schema: WHALE_ALERT_CONFIG_RESULT_SCHEMA })
  @ApiResponse({ status: 404, description: 'No whale alert configured' })
  public getConfig(
    @Param('userId', new ZodValidationPipe(userIdSchema)) userId: string,
  ): IWhaleAlertConfigView {
    const config: WhaleAlertConfig | null = this.trackingService.getWhaleConfig(userId);

    if (config === null) {
      throw new NotFoundException(`Whale alert not configured userId=${userId}`);
    }

    return toConfigView(config);
  }

  @Put()
  @ApiOperation({ summary: 'Replace the whale alert config' })
  @ApiParam({ name: 'userId', type: 'string' })
  @ApiBody({ schema: WHALE_ALERT_CONFIG_BODY_SCHEMA })
  @ApiResponse({ status: 200, description: 'Config saved', schema: WHALE_ALERT_CONFIG_RESULT_SCHEMA })
  @ApiResponse({ status: 400, description: 'Invalid mint or threshold' })
  public async replaceConfig(
    @Param('userId', new ZodValidationPipe(userIdSchema)) userId: string,
    @Body(new ZodValidationPipe(whaleAlertConfigSchema)) body: WhaleAlertConfigDto,
  ): Promise<IWhaleAlertConfigView> {
    const config: WhaleAlertConfig = await this.trackingService.updateWhaleConfig(userId, {
      tokenMints: body.tokenMints,
      thresholdAmount: body.thresholdAmount ?? null,
      enabled: body.enabled,
    });

    return toConfigView(config);
  }
}
