import { Injectable } from '@nestjs/common';
import { CalibrationReport } from '../interfaces/calibration.interface';
import { LocationEstimate } from '../interfaces/location-estimate.interface';

export interface DebugSnapshotDto {
  estimates: Record<string, LocationEstimate>;
  lastCalibration: CalibrationReport | null;
  updatedAt: number;
}

/**
 * In-memory record of the latest estimate per location and the latest
 * calibration report, used by the debug endpoint.
 */
@Injectable()
export class DebugService {
  private lastEstimates: Map<string, LocationEstimate> = new Map();
  private lastCalibration: CalibrationReport | null = null;
  private updatedAt = 0;

  setLastEstimate(location: string, estimate: LocationEstimate): void {
    this.lastEstimates.set(location, estimate);
    this.updatedAt = Date.now();
  }

  setLastCalibration(report: CalibrationReport): void {
    this.lastCalibration = report;
    this.updatedAt = Date.now();
  }

  getSnapshot(): DebugSnapshotDto {
    const estimates: Record<string, LocationEstimate> = {};
    for (const [location, value] of this.lastEstimates) {
      estimates[location] = value;
    }
    return {
      estimates,
      lastCalibration: this.lastCalibration,
      updatedAt: this.updatedAt,
    };
  }
}
