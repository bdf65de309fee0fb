import { Address, Hash, Timestamp } from '../../common/types/common.types';
import { ActionKind, ActionParam } from './action-kind';

/**
 * 특권 호출 요청
 *
 * 액션 레코드 결정 순서:
 * 1. actionId가 있으면: 기존 레코드 (종류와 파라미터가 일치해야 함)
 * 2. timestamp가 있으면: (kind, params, timestamp)로 계산한 ID
 * 3. 둘 다 없으면: 현재 시각으로 새 ID 할당
 */
export interface PrivilegedRequest {
  kind: ActionKind;
  params: readonly ActionParam[];
  caller: Address;
  actionId?: Hash;
  timestamp?: Timestamp;
}

export interface AppliedOutcome<T> {
  status: 'applied';
  actionId: Hash;
  result: T;
}

/**
 * 타임락 대기: executableAt 이후 같은 actionId로 다시 호출
 */
export interface TimelockPendingOutcome {
  status: 'pending';
  reason: 'timelock';
  actionId: Hash;
  executableAt: Timestamp;
}

/**
 * 합의 대기: 다른 밸리데이터의 확인 후 다시 호출
 */
export interface ConsensusPendingOutcome {
  status: 'pending';
  reason: 'consensus';
  actionId: Hash;
  confirmations: number;
  requiredConfirmations: number;
}

export type PendingOutcome = TimelockPendingOutcome | ConsensusPendingOutcome;

export type ActionOutcome<T> = AppliedOutcome<T> | PendingOutcome;
