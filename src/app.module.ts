import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import configuration from './config/configuration';
import { DatabaseModule } from './database/database.module';
import { EmailModule } from './email/email.module';
import { ParserModule } from './parser/parser.module';
import { DetectorModule } from './detector/detector.module';
import { SchedulerModule } from './scheduler/scheduler.module';
import { WebhookModule } from './webhook/webhook.module';
import { AppController } from './app.controller';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
      envFilePath: ['.env.local', '.env'],
    }),
    // Modules globaux en premier
    WebhookModule,
    // Autres modules
    DatabaseModule,
    EmailModule,
    ParserModule,
    DetectorModule,
    SchedulerModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
