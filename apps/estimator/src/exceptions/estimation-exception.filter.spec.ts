import { ArgumentsHost, HttpStatus } from '@nestjs/common';
import { HttpAdapterHost } from '@nestjs/core';
import { EstimationExceptionFilter, statusFor } from './estimation-exception.filter';
import {
  CalibrationInProgressException,
  EstimationException,
  InsufficientMarketDataException,
  MarketNotFoundException,
} from './estimation.exception';

describe('statusFor', () => {
  it('should map domain exceptions onto HTTP statuses', () => {
    expect(statusFor(new MarketNotFoundException('Nowhere'))).toBe(HttpStatus.NOT_FOUND);
    expect(statusFor(new InsufficientMarketDataException('Nyeri', ['Nairobi']))).toBe(
      HttpStatus.UNPROCESSABLE_ENTITY,
    );
    expect(statusFor(new CalibrationInProgressException())).toBe(HttpStatus.CONFLICT);
    expect(statusFor(new EstimationException('store offline'))).toBe(
      HttpStatus.INTERNAL_SERVER_ERROR,
    );
  });
});

describe('EstimationExceptionFilter', () => {
  const response = {};
  const reply = jest.fn();
  const host = {
    switchToHttp: () => ({ getResponse: () => response }),
  } as unknown as ArgumentsHost;
  const filter = new EstimationExceptionFilter({
    httpAdapter: { reply },
  } as unknown as HttpAdapterHost);

  beforeEach(() => {
    reply.mockClear();
  });

  it('should reply with the status, name, message and location', () => {
    filter.catch(new MarketNotFoundException('Nowhere'), host);

    expect(reply).toHaveBeenCalledWith(
      response,
      {
        statusCode: 404,
        error: 'MarketNotFoundException',
        message: 'Market not found in registry: Nowhere',
        location: 'Nowhere',
      },
      404,
    );
  });

  it('should describe missing price data as unprocessable', () => {
    filter.catch(new InsufficientMarketDataException('Nyeri', ['Nairobi', 'Nakuru']), host);

    expect(reply).toHaveBeenCalledWith(
      response,
      {
        statusCode: 422,
        error: 'InsufficientMarketDataException',
        message: 'No current prices available for Nyeri from markets: Nairobi, Nakuru',
        location: 'Nyeri',
      },
      422,
    );
  });
});
