import { Module } from '@nestjs/common';
import { ParserModule } from '../parser/parser.module';
import { MessageEvaluatorService } from './message-evaluator.service';

@Module({
  imports: [ParserModule],
  providers: [MessageEvaluatorService],
  exports: [MessageEvaluatorService],
})
export class DetectorModule {}
