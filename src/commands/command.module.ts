import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { buildTypeOrmOptions } from '../database/typeorm.config';
import { DatabaseModule } from '../database/database.module';
import { EmailModule } from '../modules/email/email.module';
import { MembersModule } from '../modules/members/members.module';
import { DepartmentsModule } from '../modules/departments/departments.module';

const configModule = ConfigModule.forRoot({
  isGlobal: true,
  envFilePath: '.env',
});

/**
 * Mail commands: no database connection.
 */
@Module({
  imports: [configModule, EmailModule],
})
export class MailCommandModule {}

@Module({
  imports: [
    configModule,
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: buildTypeOrmOptions,
    }),
    DatabaseModule,
    EmailModule,
    MembersModule,
    DepartmentsModule,
  ],
})
export class DataCommandModule {}
