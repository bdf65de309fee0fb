import { Injectable, Logger } from '@nestjs/common';
import { ClockService } from '../common/clock/clock.service';
import {
  DEFAULT_PERFORMANCE_FEE_RATE,
  DEFAULT_REWARD_RATE,
  MAX_PERFORMANCE_FEE_RATE,
  REWARD_SCALE,
  SECONDS_PER_DAY,
} from '../common/constants/token.constants';
import {
  InsufficientFundsError,
  InvariantViolationError,
} from '../common/errors/ledger.errors';
import { Address, normalizeAddress } from '../common/types/common.types';
import { mulBasisPoints } from '../common/utils/math.util';
import { EventLogService } from '../events/event-log.service';
import { FeeService } from '../fee/fee.service';
import { LedgerService } from '../ledger/ledger.service';
import { SystemAccountsService } from '../ledger/system-accounts.service';
import { JournaledCell, JournaledMap } from '../state/journaled-map';
import { StateManager } from '../state/state-manager';
import {
  RewardClaim,
  StakePosition,
  StakingInfo,
  StakingPoolState,
} from './entities/stake.entity';

const EMPTY_POSITION: StakePosition = {
  amount: 0n,
  since: 0,
  rewards: 0n,
  rewardPerTokenPaid: 0n,
};

/**
 * Staking Service
 *
 * 보상 누적 방식 (reward-per-token):
 * - rewardPerToken += (rewardRate × 경과초 / 86400) × 1e18 / totalStaked
 * - earned = amount × (rewardPerToken − paid) / 1e18 + rewards
 * - totalStaked = 0 이면 누적값 유지 (그 기간의 보상은 분배되지 않음)
 *
 * 자금 흐름:
 * - 스테이킹 원금: 호출자 ↔ 토큰 인스턴스 주소 (self), 수수료 면제 여부와
 *   무관하게 원장에서 직접 이동
 * - 보상: 스테이킹 풀 지갑 → 호출자 (성과 수수료는 팀 지갑으로)
 *
 * 스테이킹 영향을 주는 모든 진입점은 accrue()를 먼저 호출한다.
 */
@Injectable()
export class StakingService {
  private readonly logger = new Logger(StakingService.name);
  private readonly positions: JournaledMap<StakePosition>;
  private readonly pool: JournaledCell<StakingPoolState>;

  constructor(
    stateManager: StateManager,
    private readonly ledgerService: LedgerService,
    private readonly feeService: FeeService,
    private readonly systemAccounts: SystemAccountsService,
    private readonly clock: ClockService,
    private readonly eventLog: EventLogService,
  ) {
    this.positions = stateManager.createMap<StakePosition>(
      'staking.positions',
    );
    this.pool = stateManager.createCell<StakingPoolState>('staking.pool');
  }

  initialize(): void {
    this.pool.set({
      totalStaked: 0n,
      rewardPerTokenStored: 0n,
      lastUpdateTime: this.clock.now(),
      rewardRate: DEFAULT_REWARD_RATE,
      performanceFeeRate: DEFAULT_PERFORMANCE_FEE_RATE,
    });
  }

  getPoolState(): StakingPoolState {
    return this.pool.getOr({
      totalStaked: 0n,
      rewardPerTokenStored: 0n,
      lastUpdateTime: this.clock.now(),
      rewardRate: DEFAULT_REWARD_RATE,
      performanceFeeRate: DEFAULT_PERFORMANCE_FEE_RATE,
    });
  }

  getTotalStaked(): bigint {
    return this.getPoolState().totalStaked;
  }

  getRewardRate(): bigint {
    return this.getPoolState().rewardRate;
  }

  getPerformanceFeeRate(): number {
    return this.getPoolState().performanceFeeRate;
  }

  getPosition(account: Address): StakePosition {
    return this.positions.get(normalizeAddress(account)) ?? EMPTY_POSITION;
  }

  /**
   * 현재 시각 기준 rewardPerToken (상태 변경 없음)
   */
  rewardPerToken(): bigint {
    const state = this.getPoolState();
    if (state.totalStaked === 0n) {
      return state.rewardPerTokenStored;
    }

    const elapsed = BigInt(
      Math.max(this.clock.now() - state.lastUpdateTime, 0),
    );
    const distributed = (state.rewardRate * elapsed) / BigInt(SECONDS_PER_DAY);
    return (
      state.rewardPerTokenStored +
      (distributed * REWARD_SCALE) / state.totalStaked
    );
  }

  /**
   * 청구 가능한 보상 (상태 변경 없음)
   */
  earned(account: Address): bigint {
    const position = this.getPosition(account);
    const delta = this.rewardPerToken() - position.rewardPerTokenPaid;
    return (position.amount * delta) / REWARD_SCALE + position.rewards;
  }

  getStakingInfo(account: Address): StakingInfo {
    const position = this.getPosition(account);
    return {
      amount: position.amount,
      since: position.since,
      pendingRewards: this.earned(account),
    };
  }

  /**
   * 전역 누적: rewardPerTokenStored 갱신, lastUpdateTime = now
   */
  accrue(): void {
    const state = this.getPoolState();
    this.pool.set({
      ...state,
      rewardPerTokenStored: this.rewardPerToken(),
      lastUpdateTime: this.clock.now(),
    });
  }

  stake(caller: Address, amount: bigint): StakePosition {
    const account = normalizeAddress(caller);

    if (amount <= 0n) {
      throw new InvariantViolationError('ZeroAmount', 'Cannot stake 0');
    }
    if (this.ledgerService.balanceOf(account) < amount) {
      throw new InsufficientFundsError(
        'InsufficientBalance',
        'Insufficient balance to stake',
      );
    }

    const settled = this.settle(account);
    const position: StakePosition = {
      ...settled,
      amount: settled.amount + amount,
      since: settled.since === 0 ? this.clock.now() : settled.since,
    };
    this.positions.set(account, position);
    this.updateTotalStaked(amount);

    const { self } = this.systemAccounts.get();
    this.ledgerService.move(account, self, amount);
    this.eventLog.emit('Staked', { account, amount });
    return position;
  }

  /**
   * 인출: 상태를 먼저 갱신한 뒤 잔액 이동
   */
  withdraw(caller: Address, amount: bigint): StakePosition {
    const account = normalizeAddress(caller);

    if (amount <= 0n) {
      throw new InvariantViolationError('ZeroAmount', 'Cannot withdraw 0');
    }

    const settled = this.settle(account);
    if (settled.amount < amount) {
      throw new InsufficientFundsError(
        'InsufficientStake',
        'Insufficient staked amount',
      );
    }

    const position: StakePosition = {
      ...settled,
      amount: settled.amount - amount,
    };
    this.positions.set(account, position);
    this.updateTotalStaked(-amount);

    const { self } = this.systemAccounts.get();
    this.ledgerService.move(self, account, amount);
    this.eventLog.emit('Withdrawn', { account, amount });
    return position;
  }

  /**
   * 보상 청구
   *
   * 보상이 0이면 아무 일도 하지 않는다 (에러 아님).
   */
  claimRewards(caller: Address): RewardClaim {
    const account = normalizeAddress(caller);
    const settled = this.settle(account);
    const reward = settled.rewards;

    if (reward === 0n) {
      return { reward: 0n, performanceFee: 0n, netReward: 0n };
    }

    const { stakingPool, teamWallet } = this.systemAccounts.get();
    if (this.ledgerService.balanceOf(stakingPool) < reward) {
      throw new InsufficientFundsError(
        'InsufficientPoolBalance',
        'Insufficient staking pool balance',
      );
    }

    this.positions.set(account, { ...settled, rewards: 0n });

    const performanceFee = mulBasisPoints(
      reward,
      this.getPerformanceFeeRate(),
    );
    const netReward = reward - performanceFee;

    if (netReward > 0n) {
      this.feeService.applyTransfer(stakingPool, account, netReward);
      this.eventLog.emit('FeeCollected', {
        payer: stakingPool,
        payee: account,
        amount: netReward,
        feeType: 'STAKING_REWARD',
      });
    }
    if (performanceFee > 0n) {
      this.feeService.applyTransfer(stakingPool, teamWallet, performanceFee);
      this.eventLog.emit('FeeCollected', {
        payer: stakingPool,
        payee: teamWallet,
        amount: performanceFee,
        feeType: 'PERFORMANCE_FEE',
      });
    }

    this.eventLog.emit('RewardPaid', {
      account,
      reward: netReward,
      fee: performanceFee,
    });
    return { reward, performanceFee, netReward };
  }

  /**
   * 보상률 변경 (변경 전까지의 보상은 이전 비율로 누적)
   */
  setRewardRate(rewardRate: bigint): void {
    if (rewardRate < 0n) {
      throw new InvariantViolationError(
        'InvalidRewardRate',
        'Reward rate must not be negative',
      );
    }

    this.accrue();
    this.pool.set({ ...this.getPoolState(), rewardRate });
    this.eventLog.emit('RewardRateUpdated', { rewardRate });
    this.logger.log(`Reward rate updated: ${rewardRate} wei/day`);
  }

  setPerformanceFeeRate(performanceFeeRate: number): void {
    if (
      !Number.isInteger(performanceFeeRate) ||
      performanceFeeRate < 0 ||
      performanceFeeRate > MAX_PERFORMANCE_FEE_RATE
    ) {
      throw new InvariantViolationError(
        'PerformanceFeeTooHigh',
        'Performance fee cannot exceed 20%',
      );
    }

    this.pool.set({ ...this.getPoolState(), performanceFeeRate });
    this.eventLog.emit('PerformanceFeeRateUpdated', { performanceFeeRate });
  }

  /**
   * accrue 후 호출자의 보상을 정산한 포지션 반환 (저장까지 함)
   */
  private settle(account: Address): StakePosition {
    this.accrue();

    const rewardPerTokenStored = this.getPoolState().rewardPerTokenStored;
    const position = this.getPosition(account);
    const settled: StakePosition = {
      ...position,
      rewards: this.earned(account),
      rewardPerTokenPaid: rewardPerTokenStored,
    };

    this.positions.set(account, settled);
    return settled;
  }

  private updateTotalStaked(delta: bigint): void {
    const state = this.getPoolState();
    this.pool.set({ ...state, totalStaked: state.totalStaked + delta });
  }
}
