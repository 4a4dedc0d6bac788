import { Module, Global } from '@nestjs/common';
import { WebhookService } from './webhook.service';
import { WebhookController } from './webhook.controller';
import { NOTIFICATION_SINK } from '../common/interfaces';

@Global()
@Module({
  providers: [WebhookService, { provide: NOTIFICATION_SINK, useExisting: WebhookService }],
  controllers: [WebhookController],
  exports: [WebhookService, NOTIFICATION_SINK],
})
export class WebhookModule {}
