import { Module } from '@nestjs/common';
import { EmailModule } from '../email/email.module';
import { HealthController } from './health.controller';
import { HealthCheckService } from './health.service';

@Module({
  imports: [EmailModule],
  controllers: [HealthController],
  providers: [HealthCheckService],
})
export class HealthModule {}
