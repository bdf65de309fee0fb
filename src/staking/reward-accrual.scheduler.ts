import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnApplicationShutdown,
} from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import { APP_CONFIG, AppConfig } from '../common/config/app.config';
import { SystemAccountsService } from '../ledger/system-accounts.service';
import { OperationRunner } from '../state/operation-runner';
import { StakingService } from './staking.service';

/**
 * Reward Accrual Scheduler
 *
 * 보상은 누적 시점의 지분 비율로 나뉘므로 주기적으로 전역 accrue()를
 * 호출한다 (ACCRUAL_INTERVAL_MS, 0이면 비활성화).
 *
 * 토큰이 아직 배포되지 않았으면 건너뛴다.
 */
@Injectable()
export class RewardAccrualScheduler
  implements OnApplicationBootstrap, OnApplicationShutdown
{
  static readonly INTERVAL_NAME = 'reward-accrual';

  private readonly logger = new Logger(RewardAccrualScheduler.name);

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    private readonly schedulerRegistry: SchedulerRegistry,
    private readonly runner: OperationRunner,
    private readonly stakingService: StakingService,
    private readonly systemAccounts: SystemAccountsService,
  ) {}

  onApplicationBootstrap(): void {
    if (this.config.accrualIntervalMs === 0) {
      this.logger.log('Reward accrual scheduler disabled');
      return;
    }

    const interval = setInterval(
      () => this.tick(),
      this.config.accrualIntervalMs,
    );
    this.schedulerRegistry.addInterval(
      RewardAccrualScheduler.INTERVAL_NAME,
      interval,
    );
  }

  onApplicationShutdown(): void {
    if (
      this.schedulerRegistry.doesExist(
        'interval',
        RewardAccrualScheduler.INTERVAL_NAME,
      )
    ) {
      this.schedulerRegistry.deleteInterval(
        RewardAccrualScheduler.INTERVAL_NAME,
      );
    }
  }

  /**
   * 한 번의 전역 누적
   *
   * @returns 누적을 실행했으면 true
   */
  tick(): boolean {
    if (!this.systemAccounts.isInitialized()) {
      return false;
    }

    try {
      this.runner.execute('accrue', () => this.stakingService.accrue());
      return true;
    } catch (error: unknown) {
      this.logger.error(
        `Reward accrual failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      return false;
    }
  }
}
