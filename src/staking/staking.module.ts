import { Module } from '@nestjs/common';
import { FeeModule } from '../fee/fee.module';
import { LedgerModule } from '../ledger/ledger.module';
import { RewardAccrualScheduler } from './reward-accrual.scheduler';
import { StakingService } from './staking.service';

/**
 * Staking Module
 *
 * 구성:
 * - StakingService: 스테이킹/인출/보상 청구
 * - RewardAccrualScheduler: 주기적 전역 누적 (@nestjs/schedule)
 */
@Module({
  imports: [LedgerModule, FeeModule],
  providers: [StakingService, RewardAccrualScheduler],
  exports: [StakingService],
})
export class StakingModule {}
