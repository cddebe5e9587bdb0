import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { EstimateRequestDto } from './estimate-request.dto';
import { MarketDefinitionDto } from './market-definition.dto';
import { PriceObservationDto } from './price-observation.dto';
import { WeatherQueryDto } from './weather-query.dto';
import { isNonNegativeNumberMap } from './is-non-negative-number-map.validator';

async function failedProperties<T extends object>(
  cls: new () => T,
  plain: Record<string, unknown>,
): Promise<string[]> {
  const errors = await validate(plainToInstance(cls, plain));
  return errors.map(e => e.property);
}

describe('EstimateRequestDto', () => {
  it('should accept a minimal request', async () => {
    expect(
      await failedProperties(EstimateRequestDto, { location: 'Nyeri', logisticsMode: 'retail' }),
    ).toEqual([]);
  });

  it('should accept every optional field within range', async () => {
    expect(
      await failedProperties(EstimateRequestDto, {
        location: 'Nyeri',
        logisticsMode: 'farmgate',
        varietyGradeFactor: 1.5,
        seasonIndex: -1,
        shockIndex: 1,
        overrides: { Nairobi: 90, Nakuru: 0 },
        weatherOverride: 0,
      }),
    ).toEqual([]);
  });

  it('should reject unknown logistics modes', async () => {
    expect(
      await failedProperties(EstimateRequestDto, { location: 'Nyeri', logisticsMode: 'export' }),
    ).toEqual(['logisticsMode']);
  });

  it('should reject an empty location', async () => {
    expect(
      await failedProperties(EstimateRequestDto, { location: '', logisticsMode: 'wholesale' }),
    ).toEqual(['location']);
  });

  it('should reject out-of-range indices and factors', async () => {
    expect(
      await failedProperties(EstimateRequestDto, {
        location: 'Nyeri',
        logisticsMode: 'wholesale',
        varietyGradeFactor: 2.5,
        seasonIndex: 1.2,
        shockIndex: -3,
        weatherOverride: 1.5,
      }),
    ).toEqual(['varietyGradeFactor', 'seasonIndex', 'shockIndex', 'weatherOverride']);
  });

  it('should reject negative override prices with a descriptive message', async () => {
    const errors = await validate(
      plainToInstance(EstimateRequestDto, {
        location: 'Nyeri',
        logisticsMode: 'wholesale',
        overrides: { Nairobi: -5 },
      }),
    );

    expect(errors).toHaveLength(1);
    expect(errors[0].constraints).toEqual({
      isNonNegativeNumberMap: 'overrides must map names to non-negative numbers',
    });
  });
});

describe('isNonNegativeNumberMap', () => {
  it('should accept an empty map', () => {
    expect(isNonNegativeNumberMap({})).toBe(true);
  });

  it('should reject arrays, null and non-numeric values', () => {
    expect(isNonNegativeNumberMap([1, 2])).toBe(false);
    expect(isNonNegativeNumberMap(null)).toBe(false);
    expect(isNonNegativeNumberMap({ Nairobi: '90' })).toBe(false);
    expect(isNonNegativeNumberMap({ Nairobi: Number.POSITIVE_INFINITY })).toBe(false);
  });
});

describe('PriceObservationDto', () => {
  it('should accept an observation with an ISO timestamp', async () => {
    expect(
      await failedProperties(PriceObservationDto, {
        market: 'Nakuru',
        price: 85.5,
        observedAt: '2024-03-30T08:00:00Z',
        source: 'survey',
      }),
    ).toEqual([]);
  });

  it('should reject negative prices and malformed timestamps', async () => {
    expect(
      await failedProperties(PriceObservationDto, {
        market: 'Nakuru',
        price: -1,
        observedAt: 'yesterday',
      }),
    ).toEqual(['price', 'observedAt']);
  });

  it('should reject ISO week dates, which do not resolve to an instant', async () => {
    const errors = await validate(
      plainToInstance(PriceObservationDto, {
        market: 'Hilltop',
        price: 90,
        observedAt: '2024-W13-1',
      }),
    );

    expect(errors).toHaveLength(1);
    expect(errors[0].constraints).toEqual({
      isTimestamp: 'observedAt must be an ISO 8601 date-time',
    });
  });
});

describe('WeatherQueryDto', () => {
  it('should convert days from a query string', async () => {
    const dto = plainToInstance(WeatherQueryDto, { location: 'Nyeri', days: '14' });

    expect(dto.days).toBe(14);
    expect(await validate(dto)).toHaveLength(0);
  });

  it('should cap days at 30', async () => {
    expect(await failedProperties(WeatherQueryDto, { location: 'Nyeri', days: '31' })).toEqual([
      'days',
    ]);
  });
});

describe('MarketDefinitionDto', () => {
  it('should reject coordinates out of range', async () => {
    expect(
      await failedProperties(MarketDefinitionDto, {
        name: 'Nyeri',
        county: 'Nyeri',
        lat: 95,
        lon: 36.9,
        frictionMap: { Nyeri: 0 },
      }),
    ).toEqual(['lat']);
  });
});
