import { Module } from '@nestjs/common';
import { BullModule } from '@nestjs/bullmq';
import { QUEUE_NAMES } from './queue.constants';

@Module({
  imports: [BullModule.registerQueue({ name: QUEUE_NAMES.RECOMMENDATIONS })],
  exports: [BullModule],
})
export class QueueModule {}
