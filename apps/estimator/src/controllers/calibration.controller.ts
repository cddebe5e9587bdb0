import {
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Inject,
  NotFoundException,
  Param,
  Post,
} from '@nestjs/common';
import { CalibrationReport } from '../interfaces/calibration.interface';
import {
  MODEL_STATE_STORE,
  ModelStateStore,
  SigmaRecord,
} from '../interfaces/model-state.interface';
import { CalibrationService } from '../services/calibration.service';

/**
 * - POST /calibration/run               - Recalibrate every configured location now.
 * - GET  /calibration/status            - Whether a run is in flight, and the locations it covers.
 * - GET  /calibration/sigma/:location   - Persisted sigma for a location.
 */
@Controller('calibration')
export class CalibrationController {
  constructor(
    private readonly calibrationService: CalibrationService,
    @Inject(MODEL_STATE_STORE) private readonly state: ModelStateStore,
  ) {}

  @Post('run')
  @HttpCode(HttpStatus.OK)
  async run(): Promise<CalibrationReport> {
    return this.calibrationService.calibrateAll();
  }

  @Get('status')
  @HttpCode(HttpStatus.OK)
  status(): { running: boolean; locations: string[] } {
    return {
      running: this.calibrationService.isRunning(),
      locations: this.calibrationService.getLocations(),
    };
  }

  @Get('sigma/:location')
  @HttpCode(HttpStatus.OK)
  async getSigma(
    @Param('location') location: string,
  ): Promise<SigmaRecord & { location: string }> {
    const record = await this.state.getSigma(location);
    if (!record) {
      throw new NotFoundException(`No calibrated sigma for ${location}`);
    }
    return { location, ...record };
  }
}
