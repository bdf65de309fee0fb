import { Timestamp } from '../../common/types/common.types';

/**
 * 주소별 스테이킹 포지션
 *
 * - amount가 0이면 Unstaked 상태 (레코드는 남아 미청구 보상을 보관할 수 있음)
 * - since: 첫 스테이킹 시각 (이후 추가 스테이킹으로 바뀌지 않음)
 * - rewards: 정산되었지만 아직 청구하지 않은 보상
 * - rewardPerTokenPaid: 마지막 정산 시점의 rewardPerToken
 */
export interface StakePosition {
  readonly amount: bigint;
  readonly since: Timestamp;
  readonly rewards: bigint;
  readonly rewardPerTokenPaid: bigint;
}

/**
 * 전역 스테이킹 상태
 */
export interface StakingPoolState {
  readonly totalStaked: bigint;
  readonly rewardPerTokenStored: bigint;
  readonly lastUpdateTime: Timestamp;
  /** 하루 동안 분배되는 보상 (wei) */
  readonly rewardRate: bigint;
  readonly performanceFeeRate: number;
}

export interface StakingInfo {
  readonly amount: bigint;
  readonly since: Timestamp;
  readonly pendingRewards: bigint;
}

export interface RewardClaim {
  readonly reward: bigint;
  readonly performanceFee: bigint;
  readonly netReward: bigint;
}
