import { Injectable } from '@nestjs/common';
import {
  HealthCheckError,
  HealthIndicator,
  HealthIndicatorResult,
} from '@nestjs/terminus';
import { MarketRegistryService } from '../../services/market-registry.service';

/**
 * Up when every reference market is in the registry; estimates cannot be
 * served otherwise.
 */
@Injectable()
export class MarketRegistryHealthIndicator extends HealthIndicator {
  constructor(private readonly registry: MarketRegistryService) {
    super();
  }

  async isHealthy(key: string): Promise<HealthIndicatorResult> {
    const references = this.registry.getReferenceMarkets();
    const missing = references.filter(name => !this.registry.has(name));
    const details = {
      markets: this.registry.list().length,
      referenceMarkets: references.length,
    };

    if (references.length > 0 && missing.length === 0) {
      return this.getStatus(key, true, details);
    }

    throw new HealthCheckError(
      'Market registry check failed',
      this.getStatus(key, false, {
        ...details,
        message:
          missing.length > 0
            ? `Reference markets not registered: ${missing.join(', ')}`
            : 'No reference markets configured',
      }),
    );
  }
}
