import { Injectable, Logger } from '@nestjs/common';
import { ClockService } from '../common/clock/clock.service';
import { ReentrancyGuard } from '../common/concurrency/reentrancy.guard';
import {
  INITIAL_SUPPLY,
  STAKING_POOL_ALLOCATION_RATE,
  TEAM_VESTING_ALLOCATION_RATE,
  TEAM_VESTING_CLIFF,
  TEAM_VESTING_DURATION,
  ZERO_ADDRESS,
} from '../common/constants/token.constants';
import { InvariantViolationError } from '../common/errors/ledger.errors';
import {
  Address,
  Hash,
  isValidAddress,
  normalizeAddress,
  Timestamp,
} from '../common/types/common.types';
import { mulBasisPoints } from '../common/utils/math.util';
import { formatToken, TOKEN_DECIMALS } from '../common/utils/units.util';
import { ConsensusService } from '../consensus/consensus.service';
import { ActionKind, ActionParam } from '../consensus/entities/action-kind';
import { ActionRecord } from '../consensus/entities/action.entity';
import { FeeBreakdown } from '../fee/entities/fee.entity';
import { FeeService } from '../fee/fee.service';
import {
  BalanceSnapshot,
  Proposal,
} from '../governance/entities/governance.entity';
import { GovernanceService } from '../governance/governance.service';
import { SystemAccounts } from '../ledger/entities/system-accounts.entity';
import { LedgerService } from '../ledger/ledger.service';
import { SystemAccountsService } from '../ledger/system-accounts.service';
import { RewardClaim, StakePosition } from '../staking/entities/stake.entity';
import { StakingService } from '../staking/staking.service';
import { OperationRunner } from '../state/operation-runner';
import { ValidatorService } from '../validator/validator.service';
import { VestingService } from '../vesting/vesting.service';
import { TokenInfo } from './entities/token.entity';
import { UpgradeService } from './upgrade.service';

export interface InitializeTokenParams {
  accounts: SystemAccounts;
  name: string;
  symbol: string;
  logicAddress: Address;
}

/**
 * Token Service
 *
 * 토큰 인스턴스의 진입점 (오케스트레이터).
 *
 * 역할:
 * - 초기화 (제네시스 배분, 밸리데이터, 수수료 면제, 팀 베스팅)
 * - ERC-20 표면 (transfer, transferFrom, approve)
 * - 스테이킹 / 베스팅 / 거버넌스 호출 위임
 * - 액션 확인, 미확인 기록
 *
 * 모든 공개 작업은 OperationRunner로 실행되어 전부 적용되거나
 * 전부 취소된다. 자금을 움직이는 스테이킹/베스팅 작업은
 * ReentrancyGuard로 감싼다.
 *
 * 특권 변경 작업은 TokenAdminService가 담당한다.
 */
@Injectable()
export class TokenService {
  private readonly logger = new Logger(TokenService.name);

  constructor(
    private readonly runner: OperationRunner,
    private readonly guard: ReentrancyGuard,
    private readonly systemAccounts: SystemAccountsService,
    private readonly ledgerService: LedgerService,
    private readonly feeService: FeeService,
    private readonly validatorService: ValidatorService,
    private readonly consensusService: ConsensusService,
    private readonly stakingService: StakingService,
    private readonly vestingService: VestingService,
    private readonly governanceService: GovernanceService,
    private readonly upgradeService: UpgradeService,
    private readonly clock: ClockService,
  ) {}

  /**
   * 토큰 초기화 (한 번만)
   *
   * 1. 시스템 계정, 메타데이터 기록
   * 2. 수수료 면제: self, treasury, team, pool
   * 3. 밸리데이터: owner 한 명, 정족수 1
   * 4. 발행: 스테이킹 풀 10%, 트레저리 90%
   * 5. 팀 베스팅: 발행 총량의 10%, 730일, 클리프 180일
   *
   * 호출하는 쪽 (TokenFactoryService)이 OperationRunner 안에서 실행한다.
   */
  initialize(params: InitializeTokenParams): void {
    const accounts = this.normalizeAccounts(params.accounts);

    this.systemAccounts.initialize(accounts, {
      name: params.name,
      symbol: params.symbol,
      decimals: TOKEN_DECIMALS,
      deployedAt: this.clock.now(),
    });

    this.feeService.initialize([
      accounts.self,
      accounts.treasuryWallet,
      accounts.teamWallet,
      accounts.stakingPool,
    ]);
    this.validatorService.initialize(accounts.owner);
    this.stakingService.initialize();
    this.governanceService.initialize();
    this.upgradeService.initialize(params.logicAddress);

    const poolAllocation = mulBasisPoints(
      INITIAL_SUPPLY,
      STAKING_POOL_ALLOCATION_RATE,
    );
    this.ledgerService.mint(accounts.stakingPool, poolAllocation);
    this.ledgerService.mint(
      accounts.treasuryWallet,
      INITIAL_SUPPLY - poolAllocation,
    );

    this.vestingService.grant(
      accounts.teamWallet,
      mulBasisPoints(INITIAL_SUPPLY, TEAM_VESTING_ALLOCATION_RATE),
      TEAM_VESTING_DURATION,
      TEAM_VESTING_CLIFF,
    );

    this.logger.log(
      `Token initialized: ${params.symbol} at ${accounts.self}, supply ${formatToken(INITIAL_SUPPLY, params.symbol)}`,
    );
  }

  isInitialized(): boolean {
    return this.systemAccounts.isInitialized();
  }

  getInfo(): TokenInfo {
    const metadata = this.systemAccounts.getMetadata();
    const totalSupply = this.ledgerService.totalSupply();
    const pool = this.stakingService.getPoolState();

    return {
      name: metadata.name,
      symbol: metadata.symbol,
      decimals: metadata.decimals,
      totalSupply,
      totalSupplyFormatted: formatToken(totalSupply, metadata.symbol),
      paused: this.ledgerService.isPaused(),
      accounts: this.systemAccounts.get(),
      feeRates: this.feeService.getFeeRates(),
      transactionFeeRate: this.feeService.getTransactionFeeRate(),
      totalStaked: pool.totalStaked,
      rewardRate: pool.rewardRate,
      performanceFeeRate: pool.performanceFeeRate,
      validatorCount: this.validatorService.count(),
      requiredConfirmations: this.validatorService.getRequiredConfirmations(),
      logic: this.upgradeService.getCurrent(),
    };
  }

  balanceOf(account: Address): bigint {
    return this.ledgerService.balanceOf(account);
  }

  allowance(owner: Address, spender: Address): bigint {
    return this.ledgerService.allowance(owner, spender);
  }

  // ERC-20

  transfer(caller: Address, to: Address, amount: bigint): FeeBreakdown {
    return this.runner.execute('transfer', () => {
      this.assertRecipient(to);
      return this.feeService.applyTransfer(caller, to, amount);
    });
  }

  approve(caller: Address, spender: Address, amount: bigint): void {
    this.runner.execute('approve', () =>
      this.ledgerService.approve(caller, spender, amount),
    );
  }

  transferFrom(
    caller: Address,
    from: Address,
    to: Address,
    amount: bigint,
  ): FeeBreakdown {
    return this.runner.execute('transferFrom', () => {
      this.assertRecipient(to);
      this.ledgerService.spendAllowance(from, caller, amount);
      return this.feeService.applyTransfer(from, to, amount);
    });
  }

  // 스테이킹

  stake(caller: Address, amount: bigint): StakePosition {
    return this.runner.execute('stake', () =>
      this.guard.run(() => this.stakingService.stake(caller, amount)),
    );
  }

  withdraw(caller: Address, amount: bigint): StakePosition {
    return this.runner.execute('withdraw', () =>
      this.guard.run(() => this.stakingService.withdraw(caller, amount)),
    );
  }

  claimRewards(caller: Address): RewardClaim {
    return this.runner.execute('claimRewards', () =>
      this.guard.run(() => this.stakingService.claimRewards(caller)),
    );
  }

  accrueRewards(): void {
    this.runner.execute('accrue', () => this.stakingService.accrue());
  }

  // 베스팅

  releaseVested(beneficiary: Address): bigint {
    return this.runner.execute('release', () =>
      this.guard.run(() => this.vestingService.release(beneficiary)),
    );
  }

  // 거버넌스

  createProposal(caller: Address): Proposal {
    return this.runner.execute('createProposal', () =>
      this.governanceService.createProposal(caller),
    );
  }

  vote(caller: Address, proposalId: number): Proposal {
    return this.runner.execute('vote', () =>
      this.governanceService.vote(proposalId, caller),
    );
  }

  snapshot(caller: Address): BalanceSnapshot {
    return this.runner.execute('snapshot', () => {
      this.systemAccounts.assertOwner(caller);
      return this.governanceService.snapshot();
    });
  }

  // 합의

  confirmAction(caller: Address, actionId: Hash): ActionRecord {
    return this.runner.execute('confirm', () =>
      this.consensusService.confirm(actionId, caller),
    );
  }

  /**
   * 액션 ID 할당 (다른 밸리데이터와 공유할 ID를 미리 만든다)
   */
  proposeAction(
    caller: Address,
    kind: ActionKind,
    params: readonly ActionParam[],
  ): ActionRecord {
    return this.runner.execute('propose', () =>
      this.consensusService.propose(kind, params, caller),
    );
  }

  deriveActionId(
    kind: ActionKind,
    params: readonly ActionParam[],
    timestamp: Timestamp,
  ): Hash {
    return this.consensusService.deriveActionId(kind, params, timestamp);
  }

  /**
   * actionId를 확인하지 않은 모든 밸리데이터의 미확인 횟수 +1 (owner)
   */
  recordMissedConfirmations(caller: Address, actionId: Hash): Address[] {
    return this.runner.execute('recordMissedConfirmations', () => {
      this.systemAccounts.assertOwner(caller);
      return this.validatorService.recordMissed(actionId.toLowerCase(), (v) =>
        this.consensusService.hasConfirmed(actionId, v),
      );
    });
  }

  private assertRecipient(to: Address): void {
    if (normalizeAddress(to) === ZERO_ADDRESS) {
      throw new InvariantViolationError(
        'ZeroAddress',
        'ERC20: transfer to the zero address',
      );
    }
  }

  private normalizeAccounts(accounts: SystemAccounts): SystemAccounts {
    const roles: Array<keyof SystemAccounts> = [
      'self',
      'owner',
      'teamWallet',
      'stakingPool',
      'treasuryWallet',
    ];
    for (const role of roles) {
      const address = accounts[role];
      if (
        !isValidAddress(address) ||
        normalizeAddress(address) === ZERO_ADDRESS
      ) {
        throw new InvariantViolationError(
          'ZeroAddress',
          `Invalid ${role} address`,
        );
      }
    }

    return {
      self: normalizeAddress(accounts.self),
      owner: normalizeAddress(accounts.owner),
      teamWallet: normalizeAddress(accounts.teamWallet),
      stakingPool: normalizeAddress(accounts.stakingPool),
      treasuryWallet: normalizeAddress(accounts.treasuryWallet),
    };
  }
}
