import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DataSource } from 'typeorm';
import { EmailNotificationService } from '../email/services/email-notification.service';
import { HealthProbeResult, ProbeStatus } from './dto/health-check.dto';

export const DEFAULT_PROBE_TIMEOUT_MS = 5000;

/**
 * HealthCheckService
 *
 * Readiness probes for the database and the mail settings. Probes run in
 * parallel; each database query is bounded by HEALTH_PROBE_TIMEOUT_MS.
 */
@Injectable()
export class HealthCheckService {
  private readonly probeTimeout: number;

  // Response time categorization for the database probe
  private readonly thresholds = {
    database: { degraded: 100, unhealthy: 500 },
  };

  constructor(
    private readonly dataSource: DataSource,
    private readonly emailService: EmailNotificationService,
    configService: ConfigService,
  ) {
    const timeout = Number(configService.get<string>('HEALTH_PROBE_TIMEOUT_MS'));
    this.probeTimeout = timeout > 0 ? timeout : DEFAULT_PROBE_TIMEOUT_MS;
  }

  async checkReadiness(): Promise<Record<string, HealthProbeResult>> {
    const [database, mail] = await Promise.all([this.probeDatabase(), this.probeMail()]);
    return { database, mail };
  }

  /**
   * Mail that cannot be sent degrades the service but does not take it
   * out of rotation.
   */
  isReady(checks: Record<string, HealthProbeResult>): boolean {
    return Object.values(checks).every((check) => check.status !== 'unhealthy');
  }

  private async withTimeout<T>(probe: Promise<T>): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new Error('Probe timeout')), this.probeTimeout);
    });
    try {
      return await Promise.race([probe, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * PostgreSQL probe: SELECT 1 via TypeORM DataSource.
   * Healthy: < 100ms, Degraded: < 500ms, Unhealthy: timeout or error.
   */
  private async probeDatabase(): Promise<HealthProbeResult> {
    const startTime = Date.now();
    try {
      await this.withTimeout(this.dataSource.query('SELECT 1'));
      const responseTimeMs = Date.now() - startTime;

      let status: ProbeStatus = 'healthy';
      if (responseTimeMs >= this.thresholds.database.unhealthy) {
        status = 'unhealthy';
      } else if (responseTimeMs >= this.thresholds.database.degraded) {
        status = 'degraded';
      }

      return { status, responseTimeMs, lastChecked: new Date().toISOString() };
    } catch (error) {
      return {
        status: 'unhealthy',
        responseTimeMs: Date.now() - startTime,
        error: error instanceof Error ? error.message : 'Database probe failed',
        lastChecked: new Date().toISOString(),
      };
    }
  }

  private async probeMail(): Promise<HealthProbeResult> {
    const check = this.emailService.checkConfiguration();
    return {
      status: check.valid ? 'healthy' : 'degraded',
      responseTimeMs: 0,
      error: check.valid ? undefined : check.errors.join('; '),
      lastChecked: new Date().toISOString(),
    };
  }
}
