import { Injectable, Logger } from '@nestjs/common';
import { ReentrancyGuard } from '../common/concurrency/reentrancy.guard';
import { ZERO_ADDRESS } from '../common/constants/token.constants';
import {
  AlreadyDoneError,
  InvariantViolationError,
} from '../common/errors/ledger.errors';
import { Address, normalizeAddress } from '../common/types/common.types';
import { ActionKind, ActionParam } from '../consensus/entities/action-kind';
import { ActionOutcome } from '../consensus/entities/action-outcome';
import { PrivilegedActionService } from '../consensus/privileged-action.service';
import { EventLogService } from '../events/event-log.service';
import { FeeRates } from '../fee/entities/fee.entity';
import { FeeService } from '../fee/fee.service';
import { GovernanceService } from '../governance/governance.service';
import { LedgerService } from '../ledger/ledger.service';
import { SystemAccountsService } from '../ledger/system-accounts.service';
import { StakingService } from '../staking/staking.service';
import { OperationRunner } from '../state/operation-runner';
import { ValidatorService } from '../validator/validator.service';
import { ActionReference, LogicVersion } from './entities/token.entity';
import { UpgradeService } from './upgrade.service';

/**
 * TokenAdminService
 *
 * 특권 변경 작업 (모두 합의 게이트, pause/upgrade는 타임락 포함).
 *
 * 역할:
 * - owner: 수수료, 밸리데이터, 보상, 거버넌스 수수료, pause/unpause
 * - treasury: buybackAndBurn
 * - validator: upgradeTo
 *
 * 반환값은 ActionOutcome:
 * - applied: 변경 적용됨
 * - pending: 타임락 또는 정족수 대기 (보호 대상 상태는 그대로)
 */
@Injectable()
export class TokenAdminService {
  private readonly logger = new Logger(TokenAdminService.name);

  constructor(
    private readonly runner: OperationRunner,
    private readonly guard: ReentrancyGuard,
    private readonly privilegedActions: PrivilegedActionService,
    private readonly systemAccounts: SystemAccountsService,
    private readonly ledgerService: LedgerService,
    private readonly feeService: FeeService,
    private readonly validatorService: ValidatorService,
    private readonly stakingService: StakingService,
    private readonly governanceService: GovernanceService,
    private readonly upgradeService: UpgradeService,
    private readonly eventLog: EventLogService,
  ) {}

  setFeeRates(
    caller: Address,
    rates: FeeRates,
    reference: ActionReference = {},
  ): ActionOutcome<FeeRates> {
    const params = [rates.teamFeeRate, rates.stakingFeeRate, rates.burnFeeRate];
    return this.ownerAction('setFeeRates', params, caller, reference, () => {
      this.feeService.setFeeRates(rates);
      return this.feeService.getFeeRates();
    });
  }

  setFeeExemption(
    caller: Address,
    account: Address,
    exempt: boolean,
    reference: ActionReference = {},
  ): ActionOutcome<void> {
    return this.ownerAction(
      'setFeeExemption',
      [account, exempt],
      caller,
      reference,
      () => this.feeService.setFeeExemption(account, exempt),
    );
  }

  addValidator(
    caller: Address,
    validator: Address,
    reference: ActionReference = {},
  ): ActionOutcome<void> {
    return this.ownerAction(
      'addValidator',
      [validator],
      caller,
      reference,
      () => {
        this.validatorService.add(validator);
      },
    );
  }

  removeValidator(
    caller: Address,
    validator: Address,
    reference: ActionReference = {},
  ): ActionOutcome<void> {
    return this.ownerAction(
      'removeValidator',
      [validator],
      caller,
      reference,
      () => this.validatorService.remove(validator),
    );
  }

  slashValidator(
    caller: Address,
    validator: Address,
    reference: ActionReference = {},
  ): ActionOutcome<void> {
    return this.ownerAction(
      'slashValidator',
      [validator],
      caller,
      reference,
      () => this.validatorService.slash(validator),
    );
  }

  setRequiredConfirmations(
    caller: Address,
    required: number,
    reference: ActionReference = {},
  ): ActionOutcome<void> {
    return this.ownerAction(
      'setRequiredConfirmations',
      [required],
      caller,
      reference,
      () => this.validatorService.setRequiredConfirmations(required),
    );
  }

  setMaxMissedConfirmations(
    caller: Address,
    maxMissed: number,
    reference: ActionReference = {},
  ): ActionOutcome<void> {
    return this.ownerAction(
      'setMaxMissedConfirmations',
      [maxMissed],
      caller,
      reference,
      () => this.validatorService.setMaxMissedConfirmations(maxMissed),
    );
  }

  setRewardRate(
    caller: Address,
    rewardRate: bigint,
    reference: ActionReference = {},
  ): ActionOutcome<void> {
    return this.ownerAction(
      'setRewardRate',
      [rewardRate],
      caller,
      reference,
      () => this.stakingService.setRewardRate(rewardRate),
    );
  }

  setPerformanceFeeRate(
    caller: Address,
    performanceFeeRate: number,
    reference: ActionReference = {},
  ): ActionOutcome<void> {
    return this.ownerAction(
      'setPerformanceFeeRate',
      [performanceFeeRate],
      caller,
      reference,
      () => this.stakingService.setPerformanceFeeRate(performanceFeeRate),
    );
  }

  setProposalFee(
    caller: Address,
    proposalFee: bigint,
    reference: ActionReference = {},
  ): ActionOutcome<void> {
    return this.ownerAction(
      'setProposalFee',
      [proposalFee],
      caller,
      reference,
      () => this.governanceService.setProposalFee(proposalFee),
    );
  }

  setVotingFee(
    caller: Address,
    votingFee: bigint,
    reference: ActionReference = {},
  ): ActionOutcome<void> {
    return this.ownerAction(
      'setVotingFee',
      [votingFee],
      caller,
      reference,
      () => this.governanceService.setVotingFee(votingFee),
    );
  }

  /**
   * 일시 정지 (타임락 → 합의)
   */
  pause(caller: Address, reference: ActionReference = {}): ActionOutcome<void> {
    return this.runner.execute('pause', () => {
      this.systemAccounts.assertOwner(caller);
      if (this.ledgerService.isPaused()) {
        throw new AlreadyDoneError('AlreadyPaused', 'Pausable: paused');
      }

      return this.privilegedActions.execute(
        { kind: 'pause', params: [], caller, ...reference },
        () => {
          this.ledgerService.setPaused(true);
          this.eventLog.emit('Paused', { account: normalizeAddress(caller) });
          this.logger.warn('Ledger paused');
        },
      );
    });
  }

  unpause(
    caller: Address,
    reference: ActionReference = {},
  ): ActionOutcome<void> {
    return this.runner.execute('unpause', () => {
      this.systemAccounts.assertOwner(caller);
      if (!this.ledgerService.isPaused()) {
        throw new AlreadyDoneError('NotPaused', 'Pausable: not paused');
      }

      return this.privilegedActions.execute(
        { kind: 'unpause', params: [], caller, ...reference },
        () => {
          this.ledgerService.setPaused(false);
          this.eventLog.emit('Unpaused', {
            account: normalizeAddress(caller),
          });
          this.logger.log('Ledger unpaused');
        },
      );
    });
  }

  /**
   * 트레저리 잔액 소각 (treasury 전용, 재진입 금지)
   */
  buybackAndBurn(
    caller: Address,
    amount: bigint,
    reference: ActionReference = {},
  ): ActionOutcome<bigint> {
    return this.runner.execute('buybackAndBurn', () =>
      this.guard.run(() => {
        this.systemAccounts.assertTreasury(caller);
        if (amount <= 0n) {
          throw new InvariantViolationError(
            'ZeroAmount',
            'Amount must be greater than 0',
          );
        }

        return this.privilegedActions.execute(
          { kind: 'buybackAndBurn', params: [amount], caller, ...reference },
          () => {
            const treasury = this.systemAccounts.get().treasuryWallet;
            this.feeService.applyTransfer(treasury, ZERO_ADDRESS, amount);
            this.eventLog.emit('BuybackAndBurn', { account: treasury, amount });
            return this.ledgerService.totalSupply();
          },
        );
      }),
    );
  }

  upgradeTo(
    caller: Address,
    logicAddress: Address,
    reference: ActionReference = {},
  ): ActionOutcome<LogicVersion> {
    return this.runner.execute('upgrade', () =>
      this.upgradeService.authorizeUpgrade(caller, logicAddress, reference),
    );
  }

  private ownerAction<T>(
    kind: ActionKind,
    params: readonly ActionParam[],
    caller: Address,
    reference: ActionReference,
    apply: () => T,
  ): ActionOutcome<T> {
    return this.runner.execute(kind, () => {
      this.systemAccounts.assertOwner(caller);
      return this.privilegedActions.execute(
        { kind, params, caller, ...reference },
        apply,
      );
    });
  }
}
