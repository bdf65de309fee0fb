import { StateChange } from '../../state/state.types';

/**
 * State Repository Interface
 *
 * 원장 상태의 영구 저장소.
 *
 * 저장 구조:
 * - Key: "namespace:key" (예: "ledger.balances:0xabc...")
 * - Value: bigint 지원 JSON 문자열
 *
 * 구현체:
 * - StateMemoryRepository: 프로세스 메모리 (기본값, 테스트)
 * - StateLevelDBRepository: LevelDB (classic-level)
 */
export abstract class IStateRepository {
  /**
   * 저장소 열기
   */
  abstract initialize(): Promise<void>;

  /**
   * 저장된 모든 항목 조회 (시작 시 상태 복원용)
   */
  abstract loadAll(): Promise<Array<[string, string]>>;

  /**
   * 변경사항 일괄 반영 (value가 null이면 삭제)
   */
  abstract writeBatch(changes: StateChange[]): Promise<void>;

  abstract close(): Promise<void>;
}
