import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { readFileSync } from 'fs';
import defaultMarkets from '../../data/markets.json';
import { DEFAULT_FRICTION } from '../config/estimator.config';
import { parseList } from '../config/env.validation';
import { MarketDefinitionDto } from '../dto/market-definition.dto';
import { MarketNotFoundException } from '../exceptions';
import { MarketDefinition } from '../interfaces/market.interface';

/**
 * Reference data for markets: coordinates and transport friction to each
 * destination. Loaded from MARKETS_FILE, or the bundled market list.
 */
@Injectable()
export class MarketRegistryService implements OnModuleInit {
  private readonly logger = new Logger(MarketRegistryService.name);
  private readonly markets = new Map<string, MarketDefinition>();
  private readonly referenceMarkets: string[];

  constructor(private readonly configService: ConfigService) {
    this.referenceMarkets = parseList(
      this.configService.get<string>('REFERENCE_MARKETS', 'Nairobi,Nakuru,Nyeri'),
    );
  }

  onModuleInit(): void {
    const file = this.configService.get<string>('MARKETS_FILE');
    const raw: unknown = file ? JSON.parse(readFileSync(file, 'utf8')) : defaultMarkets;
    this.register(parseMarketDefinitions(raw));
    this.logger.log(
      `Market registry loaded ${this.markets.size} markets from ${file ?? 'bundled list'}; ` +
        `reference markets: ${this.referenceMarkets.join(', ')}`,
    );
  }

  /**
   * Add or replace market definitions
   */
  register(definitions: MarketDefinition[]): void {
    for (const definition of definitions) {
      this.markets.set(definition.name, {
        ...definition,
        frictionMap: { ...definition.frictionMap },
      });
    }
  }

  has(name: string): boolean {
    return this.markets.has(name);
  }

  /**
   * @throws MarketNotFoundException for names missing from the registry
   */
  get(name: string): MarketDefinition {
    const market = this.markets.get(name);
    if (!market) {
      throw new MarketNotFoundException(name);
    }
    return market;
  }

  list(): MarketDefinition[] {
    return Array.from(this.markets.values());
  }

  /**
   * Markets whose prices feed every estimate
   */
  getReferenceMarkets(): string[] {
    return [...this.referenceMarkets];
  }

  /**
   * Friction from each market to `location`. A market without an entry for
   * the location gets {@link DEFAULT_FRICTION}.
   *
   * @throws MarketNotFoundException if any market is unknown
   */
  distancesTo(location: string, markets: string[]): Record<string, number> {
    const distances: Record<string, number> = {};
    for (const name of markets) {
      distances[name] = this.get(name).frictionMap[location] ?? DEFAULT_FRICTION;
    }
    return distances;
  }
}

/**
 * Validate a raw market list (parsed JSON) into definitions.
 */
export function parseMarketDefinitions(raw: unknown): MarketDefinition[] {
  if (!Array.isArray(raw)) {
    throw new Error('Market list must be a JSON array');
  }

  return raw.map((entry: unknown, index) => {
    const dto = plainToInstance(MarketDefinitionDto, entry);
    const errors = validateSync(dto);
    if (errors.length > 0) {
      const details = errors
        .map(error => Object.values(error.constraints ?? {}).join(', '))
        .join('; ');
      throw new Error(`Invalid market definition at index ${index}: ${details}`);
    }
    return dto;
  });
}
