/**
 * Registry entry for a market.
 */
export interface MarketDefinition {
  name: string;
  county: string;
  lat: number;
  lon: number;

  /** Transport friction from this market to each destination location */
  frictionMap: Record<string, number>;
}
