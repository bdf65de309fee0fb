import { ClockService } from '../../src/common/clock/clock.service';
import { Timestamp } from '../../src/common/types/common.types';

export const GENESIS_TIME = 1_700_000_000;

/**
 * 테스트용 시계: 직접 진행시킬 때만 시간이 흐른다
 */
export class ManualClock extends ClockService {
  private current: Timestamp;

  constructor(start: Timestamp = GENESIS_TIME) {
    super();
    this.current = start;
  }

  now(): Timestamp {
    return this.current;
  }

  advance(seconds: number): void {
    this.current += seconds;
  }

  set(timestamp: Timestamp): void {
    this.current = timestamp;
  }
}
