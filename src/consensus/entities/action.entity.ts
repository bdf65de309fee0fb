import { Address, Hash, Timestamp } from '../../common/types/common.types';
import { ActionKind } from './action-kind';

/**
 * 특권 액션 레코드
 *
 * - kind / params: 액션이 무엇을 하는지. 확인이 먼저 들어와 암묵적으로
 *   생성된 레코드는 특권 호출이 도착할 때까지 null
 * - confirmations: 확인한 밸리데이터 목록 (중복 없음)
 * - confirmed: 한 번 true가 되면 다시 false로 돌아가지 않음
 * - executedAt: 실행된 액션은 다시 실행할 수 없음
 */
export interface ActionRecord {
  readonly id: Hash;
  readonly kind: ActionKind | null;
  readonly params: readonly string[] | null;
  readonly proposer: Address | null;
  readonly createdAt: Timestamp;
  readonly confirmations: readonly Address[];
  readonly confirmed: boolean;
  readonly executedAt: Timestamp | null;
}

export type ActionStatus = 'open' | 'confirmed' | 'executed' | 'expired';
