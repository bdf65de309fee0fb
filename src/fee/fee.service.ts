import { Injectable, Logger } from '@nestjs/common';
import {
  DEFAULT_BURN_FEE_RATE,
  DEFAULT_STAKING_FEE_RATE,
  DEFAULT_TEAM_FEE_RATE,
  MAX_TOTAL_FEE_RATE,
  ZERO_ADDRESS,
} from '../common/constants/token.constants';
import {
  InsufficientFundsError,
  InvariantViolationError,
} from '../common/errors/ledger.errors';
import { Address, normalizeAddress } from '../common/types/common.types';
import { isBasisPoints, mulBasisPoints } from '../common/utils/math.util';
import { EventLogService } from '../events/event-log.service';
import { LedgerService } from '../ledger/ledger.service';
import { SystemAccountsService } from '../ledger/system-accounts.service';
import { JournaledCell, JournaledMap } from '../state/journaled-map';
import { StateManager } from '../state/state-manager';
import { FeeBreakdown, FeeRates } from './entities/fee.entity';

/**
 * Fee Service
 *
 * 모든 잔액 이동이 거치는 수수료 엔진.
 *
 * applyTransfer 정책:
 * - amount = 0: 수수료 없이 그대로 이동
 * - from 또는 to가 0 주소: 발행/소각 (수수료 없음)
 * - from 또는 to가 면제 대상: 수수료 없이 전액 이동
 * - 그 외: 팀/스테이킹/소각 수수료를 각각 반올림 계산
 *   - 팀 수수료 → 팀 지갑, 스테이킹 수수료 → 스테이킹 풀
 *   - 소각 수수료는 총 공급량에서 제거
 *   - 0이 아닌 수수료마다 FeeCollected 이벤트
 *   - 수신자는 netAmount만 받음
 */
@Injectable()
export class FeeService {
  private readonly logger = new Logger(FeeService.name);
  private readonly rates: JournaledCell<FeeRates>;
  private readonly exemptions: JournaledMap<boolean>;

  constructor(
    stateManager: StateManager,
    private readonly ledgerService: LedgerService,
    private readonly systemAccounts: SystemAccountsService,
    private readonly eventLog: EventLogService,
  ) {
    this.rates = stateManager.createCell<FeeRates>('fee.rates');
    this.exemptions = stateManager.createMap<boolean>('fee.exemptions');
  }

  /**
   * 제네시스: 기본 수수료율 100/100/100, 시스템 계정 면제
   */
  initialize(exempt: readonly Address[]): void {
    this.rates.set({
      teamFeeRate: DEFAULT_TEAM_FEE_RATE,
      stakingFeeRate: DEFAULT_STAKING_FEE_RATE,
      burnFeeRate: DEFAULT_BURN_FEE_RATE,
    });
    for (const account of exempt) {
      this.exemptions.set(normalizeAddress(account), true);
    }
  }

  getFeeRates(): FeeRates {
    return this.rates.getOr({
      teamFeeRate: DEFAULT_TEAM_FEE_RATE,
      stakingFeeRate: DEFAULT_STAKING_FEE_RATE,
      burnFeeRate: DEFAULT_BURN_FEE_RATE,
    });
  }

  /**
   * 전체 전송 수수료율 (세 수수료율의 합)
   */
  getTransactionFeeRate(): number {
    const { teamFeeRate, stakingFeeRate, burnFeeRate } = this.getFeeRates();
    return teamFeeRate + stakingFeeRate + burnFeeRate;
  }

  isExempt(account: Address): boolean {
    return this.exemptions.get(normalizeAddress(account)) ?? false;
  }

  getExemptAccounts(): Address[] {
    return this.exemptions
      .entries()
      .filter(([, exempt]) => exempt)
      .map(([account]) => account);
  }

  /**
   * 수수료율 변경 (세 값을 한 번에)
   */
  setFeeRates(rates: FeeRates): void {
    const { teamFeeRate, stakingFeeRate, burnFeeRate } = rates;

    if (![teamFeeRate, stakingFeeRate, burnFeeRate].every(isBasisPoints)) {
      throw new InvariantViolationError(
        'InvalidFeeRate',
        'Fee rates must be integers between 0 and 10000',
      );
    }
    if (teamFeeRate + stakingFeeRate + burnFeeRate > MAX_TOTAL_FEE_RATE) {
      throw new InvariantViolationError(
        'FeeTooHigh',
        'Total fee cannot exceed 5%',
      );
    }

    this.rates.set({ teamFeeRate, stakingFeeRate, burnFeeRate });
    this.eventLog.emit('FeeRatesUpdated', {
      teamFeeRate,
      stakingFeeRate,
      burnFeeRate,
    });
    this.logger.log(
      `Fee rates updated: team=${teamFeeRate} staking=${stakingFeeRate} burn=${burnFeeRate}`,
    );
  }

  setFeeExemption(account: Address, exempt: boolean): void {
    const target = normalizeAddress(account);
    if (target === ZERO_ADDRESS) {
      throw new InvariantViolationError(
        'ZeroAddress',
        'Cannot set exemption for the zero address',
      );
    }

    this.exemptions.set(target, exempt);
    this.eventLog.emit('FeeExemptionUpdated', { account: target, exempt });
  }

  /**
   * 수수료 계산 (상태 변경 없음)
   */
  quote(amount: bigint): FeeBreakdown {
    const { teamFeeRate, stakingFeeRate, burnFeeRate } = this.getFeeRates();

    const teamFee = mulBasisPoints(amount, teamFeeRate);
    const stakingFee = mulBasisPoints(amount, stakingFeeRate);
    const burnFee = mulBasisPoints(amount, burnFeeRate);
    const totalFee = teamFee + stakingFee + burnFee;

    return {
      amount,
      teamFee,
      stakingFee,
      burnFee,
      totalFee,
      netAmount: amount - totalFee,
    };
  }

  /**
   * 수수료 정책을 적용한 잔액 이동
   *
   * @returns 실제 적용된 수수료 분해 (면제/발행/소각이면 수수료 0)
   */
  applyTransfer(from: Address, to: Address, amount: bigint): FeeBreakdown {
    const sender = normalizeAddress(from);
    const recipient = normalizeAddress(to);
    if (amount < 0n) {
      throw new InvariantViolationError(
        'NegativeAmount',
        'Amount must not be negative',
      );
    }

    const noFee: FeeBreakdown = {
      amount,
      teamFee: 0n,
      stakingFee: 0n,
      burnFee: 0n,
      totalFee: 0n,
      netAmount: amount,
    };

    if (sender === ZERO_ADDRESS) {
      this.ledgerService.mint(recipient, amount);
      return noFee;
    }
    if (recipient === ZERO_ADDRESS) {
      this.ledgerService.burn(sender, amount);
      return noFee;
    }
    if (amount === 0n || this.isExempt(sender) || this.isExempt(recipient)) {
      this.ledgerService.move(sender, recipient, amount);
      return noFee;
    }

    const balance = this.ledgerService.balanceOf(sender);
    if (balance < amount) {
      throw new InsufficientFundsError(
        'InsufficientBalance',
        `Insufficient balance. Current: ${balance}, Required: ${amount}`,
      );
    }

    const fees = this.quote(amount);
    const { teamWallet, stakingPool } = this.systemAccounts.get();

    if (fees.teamFee > 0n) {
      this.ledgerService.move(sender, teamWallet, fees.teamFee);
      this.eventLog.emit('FeeCollected', {
        payer: sender,
        payee: teamWallet,
        amount: fees.teamFee,
        feeType: 'TEAM_FEE',
      });
    }
    if (fees.stakingFee > 0n) {
      this.ledgerService.move(sender, stakingPool, fees.stakingFee);
      this.eventLog.emit('FeeCollected', {
        payer: sender,
        payee: stakingPool,
        amount: fees.stakingFee,
        feeType: 'STAKING_FEE',
      });
    }
    if (fees.burnFee > 0n) {
      this.ledgerService.burn(sender, fees.burnFee);
      this.eventLog.emit('FeeCollected', {
        payer: sender,
        payee: null,
        amount: fees.burnFee,
        feeType: 'BURN_FEE',
      });
    }

    // 수신 훅이 수수료 정산이 끝난 상태를 보도록 본 금액은 마지막에 이동
    this.ledgerService.move(sender, recipient, fees.netAmount);

    return fees;
  }
}
