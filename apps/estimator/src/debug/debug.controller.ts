import { Controller, Get, HttpCode, HttpStatus } from '@nestjs/common';
import { DebugService, DebugSnapshotDto } from './debug.service';

/**
 * Debug controller for development and troubleshooting.
 *
 * - GET /debug/estimates - Last estimate per location and last calibration report.
 */
@Controller('debug')
export class DebugController {
  constructor(private readonly debugService: DebugService) {}

  @Get('estimates')
  @HttpCode(HttpStatus.OK)
  getSnapshot(): DebugSnapshotDto {
    return this.debugService.getSnapshot();
  }
}
