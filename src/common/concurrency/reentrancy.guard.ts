import { Injectable } from '@nestjs/common';
import { ReentrancyError } from '../errors/ledger.errors';

/**
 * ReentrancyGuard
 *
 * 자금을 움직이는 외부 진입점(stake, withdraw, claimRewards, release,
 * buybackAndBurn)을 감싸는 배타적 가드.
 *
 * 동작:
 * - 진입 시 잠금, 종료 시 (성공/실패 무관) 해제
 * - 잠긴 상태에서 다시 진입하면 ReentrancyError
 * - 수신 훅(receive hook)에서 다시 호출하는 경우가 여기에 걸린다
 */
@Injectable()
export class ReentrancyGuard {
  private entered = false;

  run<T>(operation: () => T): T {
    if (this.entered) {
      throw new ReentrancyError();
    }

    this.entered = true;
    try {
      return operation();
    } finally {
      this.entered = false;
    }
  }

  get locked(): boolean {
    return this.entered;
  }
}
