import { Address, Timestamp } from '../../common/types/common.types';

/**
 * Validator 레코드
 *
 * - position: 밸리데이터 목록에서의 위치 (삭제 시 swap-and-pop으로 갱신)
 * - missedConfirmations: 확인하지 않은 액션 수 (슬래싱 기준)
 */
export interface ValidatorRecord {
  readonly address: Address;
  readonly position: number;
  readonly missedConfirmations: number;
  readonly addedAt: Timestamp;
}

/**
 * 정족수 설정
 *
 * 불변식: 1 <= requiredConfirmations <= validatorCount
 */
export interface ValidatorSettings {
  readonly requiredConfirmations: number;
  readonly maxMissedConfirmations: number;
}

export interface ValidatorStats extends ValidatorSettings {
  readonly validatorCount: number;
}
