import { Module } from '@nestjs/common';
import { EmailService } from './email.service';
import { MAIL_SOURCE } from '../common/interfaces';

@Module({
  providers: [EmailService, { provide: MAIL_SOURCE, useExisting: EmailService }],
  exports: [MAIL_SOURCE],
})
export class EmailModule {}
