import { Injectable } from '@nestjs/common';
import {
  baseKey,
  ModelStateStore,
  SigmaRecord,
  sigmaKey,
} from '../interfaces/model-state.interface';

/**
 * Process-local model state. Used when no Redis is configured and in tests.
 */
@Injectable()
export class InMemoryModelStateStore implements ModelStateStore {
  private readonly bases = new Map<string, number>();
  private readonly sigmas = new Map<string, SigmaRecord>();

  async getBase(location: string): Promise<number | null> {
    return this.bases.get(baseKey(location)) ?? null;
  }

  async setBase(location: string, base: number): Promise<void> {
    this.bases.set(baseKey(location), base);
  }

  async getSigma(location: string): Promise<SigmaRecord | null> {
    const record = this.sigmas.get(sigmaKey(location));
    return record ? { ...record } : null;
  }

  async setSigma(location: string, record: SigmaRecord): Promise<void> {
    this.sigmas.set(sigmaKey(location), { ...record });
  }
}
