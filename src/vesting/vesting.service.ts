import { Injectable, Logger } from '@nestjs/common';
import { ClockService } from '../common/clock/clock.service';
import { ZERO_ADDRESS } from '../common/constants/token.constants';
import {
  InvariantViolationError,
  NothingToDoError,
} from '../common/errors/ledger.errors';
import { Address, normalizeAddress } from '../common/types/common.types';
import { EventLogService } from '../events/event-log.service';
import { LedgerService } from '../ledger/ledger.service';
import { JournaledMap } from '../state/journaled-map';
import { StateManager } from '../state/state-manager';
import { VestingSchedule } from './entities/vesting-schedule.entity';

/**
 * Vesting Service
 *
 * 클리프가 있는 선형 베스팅.
 *
 * vestedAmount:
 * - now < start + cliff: 0
 * - now >= start + duration: total
 * - 그 사이: total × (now − start) / duration (내림)
 *
 * release는 누구나 호출할 수 있고, 토큰은 항상 수혜자에게 새로 발행된다.
 */
@Injectable()
export class VestingService {
  private readonly logger = new Logger(VestingService.name);
  private readonly schedules: JournaledMap<VestingSchedule>;

  constructor(
    stateManager: StateManager,
    private readonly ledgerService: LedgerService,
    private readonly clock: ClockService,
    private readonly eventLog: EventLogService,
  ) {
    this.schedules = stateManager.createMap<VestingSchedule>(
      'vesting.schedules',
    );
  }

  /**
   * 베스팅 스케줄 생성 (제네시스에서만 호출)
   */
  grant(
    beneficiary: Address,
    amount: bigint,
    duration: number,
    cliffDuration: number,
  ): VestingSchedule {
    const account = normalizeAddress(beneficiary);

    if (account === ZERO_ADDRESS) {
      throw new InvariantViolationError(
        'ZeroAddress',
        'Beneficiary cannot be the zero address',
      );
    }
    if (amount <= 0n) {
      throw new InvariantViolationError('ZeroAmount', 'Amount must be > 0');
    }
    if (duration <= 0) {
      throw new InvariantViolationError(
        'InvalidDuration',
        'Duration must be > 0',
      );
    }
    if (cliffDuration > duration) {
      throw new InvariantViolationError(
        'InvalidCliff',
        'Cliff must be <= duration',
      );
    }
    if ((this.schedules.get(account)?.totalAmount ?? 0n) > 0n) {
      throw new InvariantViolationError(
        'ScheduleExists',
        'Vesting schedule already exists',
      );
    }

    const schedule: VestingSchedule = {
      totalAmount: amount,
      releasedAmount: 0n,
      startTime: this.clock.now(),
      duration,
      cliffDuration,
    };
    this.schedules.set(account, schedule);

    this.eventLog.emit('VestingScheduleCreated', {
      beneficiary: account,
      amount,
      startTime: schedule.startTime,
      duration,
      cliffDuration,
    });
    return schedule;
  }

  getVestingSchedule(beneficiary: Address): VestingSchedule | undefined {
    return this.schedules.get(normalizeAddress(beneficiary));
  }

  vestedAmount(beneficiary: Address): bigint {
    const schedule = this.getVestingSchedule(beneficiary);
    if (!schedule) {
      return 0n;
    }

    const now = this.clock.now();
    if (now < schedule.startTime + schedule.cliffDuration) {
      return 0n;
    }
    if (now >= schedule.startTime + schedule.duration) {
      return schedule.totalAmount;
    }

    return (
      (schedule.totalAmount * BigInt(now - schedule.startTime)) /
      BigInt(schedule.duration)
    );
  }

  releasableAmount(beneficiary: Address): bigint {
    const schedule = this.getVestingSchedule(beneficiary);
    if (!schedule) {
      return 0n;
    }
    return this.vestedAmount(beneficiary) - schedule.releasedAmount;
  }

  /**
   * 베스팅된 미지급분 발행
   *
   * releasedAmount를 먼저 갱신한 뒤 발행한다.
   */
  release(beneficiary: Address): bigint {
    const account = normalizeAddress(beneficiary);
    const schedule = this.getVestingSchedule(account);
    const unreleased = this.releasableAmount(account);

    if (!schedule || unreleased === 0n) {
      throw new NothingToDoError(
        'NothingToRelease',
        'No tokens are available for release',
      );
    }

    this.schedules.set(account, {
      ...schedule,
      releasedAmount: schedule.releasedAmount + unreleased,
    });
    this.ledgerService.mint(account, unreleased);

    this.eventLog.emit('TokensReleased', {
      beneficiary: account,
      amount: unreleased,
    });
    this.logger.log(`Released ${unreleased} wei to ${account}`);
    return unreleased;
  }
}
