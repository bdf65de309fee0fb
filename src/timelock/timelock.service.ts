import { Injectable, Logger } from '@nestjs/common';
import { ClockService } from '../common/clock/clock.service';
import { TIMELOCK_PERIOD } from '../common/constants/token.constants';
import { TimelockNotElapsedError } from '../common/errors/ledger.errors';
import { Hash, Timestamp } from '../common/types/common.types';
import { EventLogService } from '../events/event-log.service';
import { JournaledMap } from '../state/journaled-map';
import { StateManager } from '../state/state-manager';

export type TimelockStatus =
  | { status: 'ready'; expiry: Timestamp }
  | { status: 'pending'; expiry: Timestamp };

/**
 * Timelock Service
 *
 * 민감한 액션 (pause, upgrade)의 실행을 지연시킨다.
 *
 * 동작:
 * 1. 첫 호출: 만료 시각 = now + delay 기록, pending 반환 (상태 변경 없음)
 * 2. 만료 전 재호출: TimelockNotExpired
 * 3. 만료 시각 이후 재호출: ready
 *
 * 만료 시각은 한 번 기록되면 바뀌지 않는다.
 */
@Injectable()
export class TimelockService {
  private readonly logger = new Logger(TimelockService.name);
  private readonly expiries: JournaledMap<Timestamp>;

  constructor(
    stateManager: StateManager,
    private readonly clock: ClockService,
    private readonly eventLog: EventLogService,
  ) {
    this.expiries = stateManager.createMap<Timestamp>('timelock.expiries');
  }

  ensureElapsed(
    actionId: Hash,
    delay: number = TIMELOCK_PERIOD,
  ): TimelockStatus {
    const id = actionId.toLowerCase();
    const now = this.clock.now();
    const expiry = this.expiries.get(id);

    if (expiry === undefined) {
      const newExpiry = now + delay;
      this.expiries.set(id, newExpiry);
      this.eventLog.emit('TimelockSet', { actionId: id, expiry: newExpiry });
      this.logger.log(
        `Timelock set for ${id}, executable at ${new Date(newExpiry * 1000).toISOString()}`,
      );
      return { status: 'pending', expiry: newExpiry };
    }

    if (now < expiry) {
      throw new TimelockNotElapsedError(expiry);
    }

    return { status: 'ready', expiry };
  }

  getExpiry(actionId: Hash): Timestamp | undefined {
    return this.expiries.get(actionId.toLowerCase());
  }
}
