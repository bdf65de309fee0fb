/**
 * 원장 도메인 에러
 *
 * 모든 도메인 실패는 LedgerError의 하위 클래스로 표현한다.
 * - category: 실패의 종류 (HTTP 상태 코드 매핑, 테스트 검증에 사용)
 * - code: 안정적인 식별자 (예: 'FeeTooHigh', 'AlreadyConfirmed')
 *
 * 합의 대기(pending)는 에러가 아니다. 특권 액션은 ActionOutcome을 반환한다.
 */
export type LedgerErrorCategory =
  | 'AuthorizationError'
  | 'TimelockNotElapsed'
  | 'InvariantViolation'
  | 'InsufficientFunds'
  | 'AlreadyDone'
  | 'NothingToDo'
  | 'ReentrancyDetected'
  | 'NotFound';

export abstract class LedgerError extends Error {
  abstract readonly category: LedgerErrorCategory;

  constructor(
    readonly code: string,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * 호출자에게 필요한 역할이 없음 (owner / validator / treasury)
 */
export class AuthorizationError extends LedgerError {
  readonly category = 'AuthorizationError';
}

/**
 * 타임락 만료 시각 이전의 재호출
 */
export class TimelockNotElapsedError extends LedgerError {
  readonly category = 'TimelockNotElapsed';

  constructor(readonly expiry: number) {
    super('TimelockNotExpired', 'Timelock not expired');
  }
}

/**
 * 불변식 위반 (잘못된 인자, 상한 초과, 정족수 규칙 위반 등)
 */
export class InvariantViolationError extends LedgerError {
  readonly category = 'InvariantViolation';
}

export class InsufficientFundsError extends LedgerError {
  readonly category = 'InsufficientFunds';
}

/**
 * 이미 처리된 요청 (중복 확인, 중복 투표, 중복 초기화 등)
 */
export class AlreadyDoneError extends LedgerError {
  readonly category = 'AlreadyDone';
}

export class NothingToDoError extends LedgerError {
  readonly category = 'NothingToDo';
}

export class ReentrancyError extends LedgerError {
  readonly category = 'ReentrancyDetected';

  constructor() {
    super('ReentrantCall', 'ReentrancyGuard: reentrant call');
  }
}

export class NotFoundError extends LedgerError {
  readonly category = 'NotFound';
}
