import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus } from '@nestjs/common';
import { HttpAdapterHost } from '@nestjs/core';
import {
  CalibrationInProgressException,
  EstimationException,
  InsufficientMarketDataException,
  MarketNotFoundException,
} from './estimation.exception';

export function statusFor(exception: EstimationException): HttpStatus {
  if (exception instanceof MarketNotFoundException) {
    return HttpStatus.NOT_FOUND;
  }
  if (exception instanceof InsufficientMarketDataException) {
    return HttpStatus.UNPROCESSABLE_ENTITY;
  }
  if (exception instanceof CalibrationInProgressException) {
    return HttpStatus.CONFLICT;
  }
  return HttpStatus.INTERNAL_SERVER_ERROR;
}

/**
 * Translates domain exceptions into HTTP responses.
 */
@Catch(EstimationException)
export class EstimationExceptionFilter implements ExceptionFilter {
  constructor(private readonly httpAdapterHost: HttpAdapterHost) {}

  catch(exception: EstimationException, host: ArgumentsHost): void {
    const { httpAdapter } = this.httpAdapterHost;
    const statusCode = statusFor(exception);

    httpAdapter.reply(
      host.switchToHttp().getResponse(),
      {
        statusCode,
        error: exception.name,
        message: exception.message,
        location: exception.location,
      },
      statusCode,
    );
  }
}
