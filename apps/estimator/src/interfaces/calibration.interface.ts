/**
 * One replayed day: the observed price against what the estimator would
 * have said on that day.
 */
export interface ResidualPair {
  actual: number;
  estimated: number;
}

export interface CalibrationOptions {
  /** Number of past days to replay, starting from yesterday (default: 30) */
  trailingWindowDays?: number;

  /** Minimum valid days required before sigma is written (default: 10) */
  minSamples?: number;

  /** Reference time for the window (default: now) */
  now?: Date;
}

export type CalibrationOutcome =
  | {
      status: 'updated';
      location: string;
      sigma: number;
      samples: number;
      lastUpdated: string;
    }
  | {
      status: 'skipped';
      location: string;
      reason: 'insufficient-data';
      samples: number;
    }
  | {
      status: 'failed';
      location: string;
      error: string;
    };

export type CalibrationStatus = CalibrationOutcome['status'];

/**
 * Result of calibrating a batch of locations.
 */
export interface CalibrationReport {
  startedAt: string;
  finishedAt: string;
  outcomes: CalibrationOutcome[];

  /** Locations whose sigma was written */
  updated: string[];
  skipped: string[];
  failed: string[];
}
