import {
  type ArgumentsHost,
  Catch,
  type ExceptionFilter,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';

import { WhaleWatchError, WhaleWatchErrorCode } from '../../../common/errors/whale-watch.errors';

const STATUS_BY_CODE: Readonly<Record<WhaleWatchErrorCode, HttpStatus>> = {
  [WhaleWatchErrorCode.INVALID_ADDRESS]: HttpStatus.BAD_REQUEST,
  [WhaleWatchErrorCode.INVALID_THRESHOLD]: HttpStatus.BAD_REQUEST,
  [WhaleWatchErrorCode.EMPTY_WHALE_TOKEN_LIST]: HttpStatus.BAD_REQUEST,
  [WhaleWatchErrorCode.PROVIDER_UNAVAILABLE]: HttpStatus.SERVICE_UNAVAILABLE,
  [WhaleWatchErrorCode.CONFIGURATION]: HttpStatus.INTERNAL_SERVER_ERROR,
  [WhaleWatchErrorCode.REGISTRY_INVARIANT_VIOLATION]: HttpStatus.INTERNAL_SERVER_ERROR,
};

/** Maps domain errors onto HTTP responses with a stable error code. */
@Catch(WhaleWatchError)
export class WhaleWatchExceptionFilter implements ExceptionFilter<WhaleWatchError> {
  private readonly logger: Logger = new Logger(WhaleWatchExceptionFilter.name);

  public catch(exception: WhaleWatchError, host: ArgumentsHost): void {
    const response: Response = host.switchToHttp().getResponse<Response>();
    const statusCode: HttpStatus = STATUS_BY_CODE[exception.code];

    if (statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(`request failed code=${exception.code} reason=${exception.message}`);
    }

    response.status(statusCode).json({
      statusCode,
      error: exception.code,
      message: exception.message,
    });
  }
}
