import { MarketDefinition } from '../interfaces/market.interface';

/**
 * Test fixtures for the market registry
 */
export const testMarkets: MarketDefinition[] = [
  {
    name: 'Riverside',
    county: 'Upper Valley',
    lat: -1.1,
    lon: 36.5,
    frictionMap: { Riverside: 0, Hilltop: 50, Lakeview: 20, Portside: 200 },
  },
  {
    name: 'Hilltop',
    county: 'Highlands',
    lat: -0.4,
    lon: 36.9,
    frictionMap: { Riverside: 50, Hilltop: 0, Lakeview: 30 },
  },
  {
    name: 'Lakeview',
    county: 'Lakes',
    lat: -0.3,
    lon: 36.1,
    frictionMap: { Riverside: 20, Hilltop: 30, Lakeview: 0 },
  },
  {
    name: 'Portside',
    county: 'Coast',
    lat: -4.0,
    lon: 39.6,
    frictionMap: { Riverside: 200, Portside: 0 },
  },
];

export const testConfig: Record<string, unknown> = {
  REFERENCE_MARKETS: 'Riverside,Hilltop,Lakeview',
  CALIBRATION_WINDOW_DAYS: 30,
  CALIBRATION_MIN_SAMPLES: 10,
  PRICE_UNITS: 'KES/kg',
};

/**
 * ConfigService stand-in backed by a plain object
 */
export function createConfigServiceMock(overrides: Record<string, unknown> = {}) {
  const config: Record<string, unknown> = { ...testConfig, ...overrides };
  return {
    get: jest.fn((key: string, defaultValue?: unknown) => config[key] ?? defaultValue),
  };
}

export const DAY_MS = 24 * 60 * 60 * 1000;

/** Fixed reference time for history-based tests */
export const NOW = new Date('2024-03-31T12:00:00.000Z');

/** Noon UTC `daysAgo` days before {@link NOW} */
export function daysAgo(days: number): number {
  return NOW.getTime() - days * DAY_MS;
}
