import { Address, Timestamp } from '../../common/types/common.types';

/**
 * 거버넌스 수수료 (팀 지갑으로 납부)
 */
export interface GovernanceFees {
  readonly proposalFee: bigint;
  readonly votingFee: bigint;
}

/**
 * 제안 레코드
 *
 * 투표 집계나 실행은 하지 않는다. 제안과 투표는 수수료를 걷는 기록이다.
 */
export interface Proposal {
  readonly id: number;
  readonly proposer: Address;
  readonly createdAt: Timestamp;
  readonly voteCount: number;
}

/**
 * 잔액 스냅샷
 */
export interface BalanceSnapshot {
  readonly id: number;
  readonly takenAt: Timestamp;
  readonly totalSupply: bigint;
  readonly balances: Readonly<Record<Address, bigint>>;
}
