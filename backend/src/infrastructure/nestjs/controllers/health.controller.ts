import { Controller, Get, HttpStatus, Res } from '@nestjs/common';
import type { Response } from 'express';
import type { HealthDto } from '../dto';
import { HealthMonitor } from '../../../application/services/HealthMonitor';

@Controller('health')
export class HealthController {
  constructor(private readonly monitor: HealthMonitor) {}

  @Get()
  async check(@Res({ passthrough: true }) res: Response): Promise<HealthDto> {
    const report = await this.monitor.check();
    res.status(report.status === 'ok' ? HttpStatus.OK : HttpStatus.SERVICE_UNAVAILABLE);
    return { ...report, checkedAt: report.checkedAt.toISOString() };
  }
}
