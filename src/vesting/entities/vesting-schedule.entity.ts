import { Timestamp } from '../../common/types/common.types';

/**
 * 베스팅 스케줄
 *
 * 불변식: releasedAmount <= vestedAmount(now) <= totalAmount
 */
export interface VestingSchedule {
  readonly totalAmount: bigint;
  readonly releasedAmount: bigint;
  readonly startTime: Timestamp;
  readonly duration: number;
  readonly cliffDuration: number;
}
