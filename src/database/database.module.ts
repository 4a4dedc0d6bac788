import { Module } from '@nestjs/common';
import { DedupStoreService } from './dedup-store.service';

@Module({
  providers: [DedupStoreService],
  exports: [DedupStoreService],
})
export class DatabaseModule {}
