import { Controller, Get, HttpCode, HttpStatus, Res } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { Response } from 'express';
import { HealthCheckService } from './health.service';
import { HealthLivenessDto, HealthReadinessDto } from './dto/health-check.dto';
import { Public } from '../auth/decorators/public.decorator';
import { SkipPictureCheck } from '../../common/decorators/skip-picture-check.decorator';

/**
 * Health endpoints are excluded from request logging.
 */
@ApiTags('Health')
@Controller('health')
@Public()
@SkipPictureCheck()
export class HealthController {
  constructor(private readonly healthCheckService: HealthCheckService) {}

  /**
   * Liveness: the process is up.
   */
  @Get()
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Liveness probe' })
  getLiveness(): HealthLivenessDto {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    };
  }

  /**
   * Readiness: 503 when the database is unreachable.
   */
  @Get('ready')
  @ApiOperation({ summary: 'Readiness probe' })
  @ApiResponse({ status: 200, description: 'Ready' })
  @ApiResponse({ status: 503, description: 'A critical dependency is unhealthy' })
  async getReadiness(@Res({ passthrough: true }) res: Response): Promise<HealthReadinessDto> {
    const checks = await this.healthCheckService.checkReadiness();
    const ready = this.healthCheckService.isReady(checks);

    if (!ready) {
      res.status(HttpStatus.SERVICE_UNAVAILABLE);
    }

    return {
      status: ready ? 'ready' : 'not_ready',
      timestamp: new Date().toISOString(),
      checks,
    };
  }
}
