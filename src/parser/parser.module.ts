import { Module } from '@nestjs/common';
import { AttachmentClassifierService } from './attachment-classifier.service';
import { EXTRACTORS, defaultExtractors } from './extractors';

@Module({
  providers: [
    AttachmentClassifierService,
    { provide: EXTRACTORS, useValue: defaultExtractors },
  ],
  exports: [AttachmentClassifierService],
})
export class ParserModule {}
