import { Module, NestModule, MiddlewareConsumer } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ScheduleModule } from '@nestjs/schedule';
import { APP_GUARD, APP_INTERCEPTOR } from '@nestjs/core';
import { DatabaseModule } from './database/database.module';
import { buildTypeOrmOptions } from './database/typeorm.config';
import { LoggingModule } from './modules/logging/logging.module';
import { CorrelationIdMiddleware } from './modules/logging/middleware/correlation-id.middleware';
import { RequestLoggingInterceptor } from './modules/logging/interceptors/request-logging.interceptor';
import { EmailModule } from './modules/email/email.module';
import { AuthModule } from './modules/auth/auth.module';
import { JwtAuthGuard } from './modules/auth/guards/jwt-auth.guard';
import { MembersModule } from './modules/members/members.module';
import { DepartmentsModule } from './modules/departments/departments.module';
import { ContactModule } from './modules/contact/contact.module';
import { ContentModule } from './modules/content/content.module';
import { HealthModule } from './modules/health/health.module';
import { PictureDeadlineGuard } from './common/guards/picture-deadline.guard';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
    }),
    ScheduleModule.forRoot(), // Picture reminder cron
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: buildTypeOrmOptions,
    }),
    DatabaseModule,
    LoggingModule,
    EmailModule,
    AuthModule,
    MembersModule,
    DepartmentsModule,
    ContactModule,
    ContentModule,
    HealthModule,
  ],
  providers: [
    // Guards run in registration order: authenticate, then enforce the picture deadline
    {
      provide: APP_GUARD,
      useClass: JwtAuthGuard,
    },
    {
      provide: APP_GUARD,
      useClass: PictureDeadlineGuard,
    },
    {
      provide: APP_INTERCEPTOR,
      useClass: RequestLoggingInterceptor,
    },
  ],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer) {
    consumer.apply(CorrelationIdMiddleware).forRoutes('*');
  }
}
