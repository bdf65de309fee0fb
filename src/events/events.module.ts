import { Global, Module } from '@nestjs/common';
import { EventLogService } from './event-log.service';
import { EventsController } from './events.controller';

/**
 * EventsModule (Global)
 *
 * 모든 도메인 서비스가 EventLogService로 신호를 남긴다.
 */
@Global()
@Module({
  controllers: [EventsController],
  providers: [EventLogService],
  exports: [EventLogService],
})
export class EventsModule {}
