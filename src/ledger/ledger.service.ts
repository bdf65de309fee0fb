import { Injectable } from '@nestjs/common';
import { ZERO_ADDRESS } from '../common/constants/token.constants';
import {
  InsufficientFundsError,
  InvariantViolationError,
} from '../common/errors/ledger.errors';
import { Address, normalizeAddress } from '../common/types/common.types';
import { EventLogService } from '../events/event-log.service';
import { JournaledCell, JournaledMap } from '../state/journaled-map';
import { StateManager } from '../state/state-manager';

/**
 * 수신 훅에 전달되는 입금 정보
 */
export interface ReceivedTransfer {
  from: Address;
  to: Address;
  amount: bigint;
}

/**
 * 수신 훅
 *
 * 잔액이 입금된 직후 호출된다. 수신자가 "컨트랙트"처럼 반응할 수 있게
 * 해 주며, 훅 안에서 다시 원장 작업을 호출할 수도 있다.
 */
export type ReceiveHook = (transfer: ReceivedTransfer) => void;

/**
 * LedgerService
 *
 * 잔액, 총 공급량, allowance, 일시정지 상태를 관리하는 원장.
 *
 * 규칙:
 * - 잔액은 절대 음수가 될 수 없음 (InsufficientFunds)
 * - 0 주소로는 이동/발행 불가, 0 주소에서는 소각 불가
 * - 일시정지 중에는 move/mint/burn 모두 실패 (TokenPaused)
 * - sum(잔액) == totalSupply
 */
@Injectable()
export class LedgerService {
  private readonly balances: JournaledMap<bigint>;
  private readonly allowances: JournaledMap<bigint>;
  private readonly supply: JournaledCell<bigint>;
  private readonly pausedFlag: JournaledCell<boolean>;
  private readonly receiveHooks = new Map<Address, ReceiveHook>();

  constructor(
    stateManager: StateManager,
    private readonly eventLog: EventLogService,
  ) {
    this.balances = stateManager.createMap<bigint>('ledger.balances');
    this.allowances = stateManager.createMap<bigint>('ledger.allowances');
    this.supply = stateManager.createCell<bigint>('ledger.supply');
    this.pausedFlag = stateManager.createCell<boolean>('ledger.paused');
  }

  balanceOf(address: Address): bigint {
    return this.balances.get(normalizeAddress(address)) ?? 0n;
  }

  totalSupply(): bigint {
    return this.supply.getOr(0n);
  }

  /**
   * 잔액이 0보다 큰 모든 보유자
   */
  holders(): Array<[Address, bigint]> {
    return this.balances.entries().filter(([, balance]) => balance > 0n);
  }

  isPaused(): boolean {
    return this.pausedFlag.getOr(false);
  }

  setPaused(paused: boolean): void {
    this.pausedFlag.set(paused);
  }

  /**
   * 잔액 이동 (수수료 없음)
   *
   * 동작:
   * 1. from 차감
   * 2. to 입금
   * 3. Transfer 이벤트
   * 4. to의 수신 훅 호출
   */
  move(from: Address, to: Address, amount: bigint): void {
    this.assertNotPaused();
    const sender = normalizeAddress(from);
    const recipient = normalizeAddress(to);

    if (sender === ZERO_ADDRESS) {
      throw new InvariantViolationError(
        'ZeroAddress',
        'ERC20: transfer from the zero address',
      );
    }
    if (recipient === ZERO_ADDRESS) {
      throw new InvariantViolationError(
        'ZeroAddress',
        'ERC20: transfer to the zero address',
      );
    }

    this.debit(sender, amount);
    this.credit(recipient, amount);
    this.eventLog.emit('Transfer', { from: sender, to: recipient, amount });
    this.notify(sender, recipient, amount);
  }

  /**
   * 발행: 총 공급량 증가
   */
  mint(to: Address, amount: bigint): void {
    this.assertNotPaused();
    const recipient = normalizeAddress(to);

    if (recipient === ZERO_ADDRESS) {
      throw new InvariantViolationError(
        'ZeroAddress',
        'ERC20: mint to the zero address',
      );
    }

    this.supply.set(this.totalSupply() + amount);
    this.credit(recipient, amount);
    this.eventLog.emit('Transfer', {
      from: ZERO_ADDRESS,
      to: recipient,
      amount,
    });
    this.notify(ZERO_ADDRESS, recipient, amount);
  }

  /**
   * 소각: 총 공급량 감소
   */
  burn(from: Address, amount: bigint): void {
    this.assertNotPaused();
    const holder = normalizeAddress(from);

    if (holder === ZERO_ADDRESS) {
      throw new InvariantViolationError(
        'ZeroAddress',
        'ERC20: burn from the zero address',
      );
    }

    this.debit(holder, amount);
    this.supply.set(this.totalSupply() - amount);
    this.eventLog.emit('Transfer', { from: holder, to: ZERO_ADDRESS, amount });
  }

  approve(owner: Address, spender: Address, amount: bigint): void {
    const holder = normalizeAddress(owner);
    const delegate = normalizeAddress(spender);

    if (holder === ZERO_ADDRESS || delegate === ZERO_ADDRESS) {
      throw new InvariantViolationError(
        'ZeroAddress',
        'ERC20: approve with the zero address',
      );
    }

    this.allowances.set(this.allowanceKey(holder, delegate), amount);
    this.eventLog.emit('Approval', {
      owner: holder,
      spender: delegate,
      amount,
    });
  }

  allowance(owner: Address, spender: Address): bigint {
    return (
      this.allowances.get(
        this.allowanceKey(normalizeAddress(owner), normalizeAddress(spender)),
      ) ?? 0n
    );
  }

  /**
   * allowance 차감 (transferFrom)
   */
  spendAllowance(owner: Address, spender: Address, amount: bigint): void {
    const current = this.allowance(owner, spender);
    if (current < amount) {
      throw new InsufficientFundsError(
        'InsufficientAllowance',
        'ERC20: insufficient allowance',
      );
    }
    this.approve(owner, spender, current - amount);
  }

  /**
   * @returns 훅 해제 함수
   */
  registerReceiveHook(address: Address, hook: ReceiveHook): () => void {
    const target = normalizeAddress(address);
    this.receiveHooks.set(target, hook);
    return () => {
      if (this.receiveHooks.get(target) === hook) {
        this.receiveHooks.delete(target);
      }
    };
  }

  private assertNotPaused(): void {
    if (this.isPaused()) {
      throw new InvariantViolationError('TokenPaused', 'Pausable: paused');
    }
  }

  private debit(address: Address, amount: bigint): void {
    if (amount < 0n) {
      throw new InvariantViolationError(
        'NegativeAmount',
        'Amount must not be negative',
      );
    }

    const balance = this.balanceOf(address);
    if (balance < amount) {
      throw new InsufficientFundsError(
        'InsufficientBalance',
        `Insufficient balance. Current: ${balance}, Required: ${amount}`,
      );
    }
    this.balances.set(address, balance - amount);
  }

  private credit(address: Address, amount: bigint): void {
    if (amount < 0n) {
      throw new InvariantViolationError(
        'NegativeAmount',
        'Amount must not be negative',
      );
    }
    this.balances.set(address, this.balanceOf(address) + amount);
  }

  private notify(from: Address, to: Address, amount: bigint): void {
    const hook = this.receiveHooks.get(to);
    if (hook) {
      hook({ from, to, amount });
    }
  }

  private allowanceKey(owner: Address, spender: Address): string {
    return `${owner}:${spender}`;
  }
}
