import { Controller, Get, Query } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { EventQueryDto } from './dto/event-query.dto';
import { EventLogService } from './event-log.service';

/**
 * Events Controller
 *
 * 커밋된 이벤트 로그 조회 API
 */
@ApiTags('events')
@Controller('events')
export class EventsController {
  constructor(private readonly eventLog: EventLogService) {}

  /**
   * GET /events?type=Transfer&limit=50
   */
  @Get()
  @ApiOperation({
    summary: '이벤트 로그 조회',
    description: '커밋된 이벤트를 발생 순서대로 조회합니다.',
  })
  @ApiResponse({ status: 200, description: '이벤트 목록' })
  getEvents(@Query() query: EventQueryDto) {
    const events = this.eventLog.recent(query.limit ?? 100, query.type);
    return {
      total: this.eventLog.count,
      events,
    };
  }
}
