import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { DataSource } from 'typeorm';
import { HealthCheckService } from '../health.service';
import { EmailNotificationService } from '../../email/services/email-notification.service';

describe('HealthCheckService', () => {
  let service: HealthCheckService;

  const mockDataSource = {
    query: jest.fn(),
  };

  const mockEmailService = {
    checkConfiguration: jest.fn(),
  };

  const mockConfigService = {
    get: jest.fn(() => undefined),
  };

  beforeEach(async () => {
    mockDataSource.query.mockResolvedValue([{ '?column?': 1 }]);
    mockEmailService.checkConfiguration.mockReturnValue({ valid: true, errors: [], warnings: [] });

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        HealthCheckService,
        { provide: DataSource, useValue: mockDataSource },
        { provide: EmailNotificationService, useValue: mockEmailService },
        { provide: ConfigService, useValue: mockConfigService },
      ],
    }).compile();

    service = module.get<HealthCheckService>(HealthCheckService);
  });

  it('should report healthy database and mail', async () => {
    const checks = await service.checkReadiness();

    expect(mockDataSource.query).toHaveBeenCalledWith('SELECT 1');
    expect(checks.database.status).toBe('healthy');
    expect(checks.mail.status).toBe('healthy');
    expect(service.isReady(checks)).toBe(true);
  });

  it('should mark the service not ready when the database fails', async () => {
    mockDataSource.query.mockRejectedValue(new Error('connection refused'));

    const checks = await service.checkReadiness();

    expect(checks.database).toEqual(
      expect.objectContaining({ status: 'unhealthy', error: 'connection refused' }),
    );
    expect(service.isReady(checks)).toBe(false);
  });

  it('should only degrade on invalid mail settings', async () => {
    mockEmailService.checkConfiguration.mockReturnValue({
      valid: false,
      errors: ['SMTP_HOST is not set', 'SMTP_FROM is not set'],
      warnings: [],
    });

    const checks = await service.checkReadiness();

    expect(checks.mail).toEqual(
      expect.objectContaining({
        status: 'degraded',
        error: 'SMTP_HOST is not set; SMTP_FROM is not set',
      }),
    );
    expect(service.isReady(checks)).toBe(true);
  });
});
