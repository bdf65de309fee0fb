import { tokenToWei } from '../utils/units.util';

/**
 * 토큰 프로토콜 상수
 *
 * 모든 비율(rate)은 basis points (1 bps = 0.01%) 단위.
 * 모든 시간은 초 단위.
 */

export const BASIS_POINTS = 10_000;

/**
 * 전송 수수료 합계 상한: 500 bps (5%)
 */
export const MAX_TOTAL_FEE_RATE = 500;

export const DEFAULT_TEAM_FEE_RATE = 100;
export const DEFAULT_STAKING_FEE_RATE = 100;
export const DEFAULT_BURN_FEE_RATE = 100;

/**
 * 스테이킹 보상 청구 시 팀 지갑으로 가는 성과 수수료
 */
export const DEFAULT_PERFORMANCE_FEE_RATE = 1_000;
export const MAX_PERFORMANCE_FEE_RATE = 2_000;

export const SECONDS_PER_DAY = 86_400;

/**
 * 보상 누적 계산의 고정소수점 스케일 (1e18)
 */
export const REWARD_SCALE = 10n ** 18n;

/**
 * 하루 동안 전체 스테이커에게 분배되는 보상량: 100 tokens
 */
export const DEFAULT_REWARD_RATE = tokenToWei(100);

/**
 * 발행 총량: 3,000,000,000 tokens
 *
 * 제네시스 배분:
 * - 스테이킹 풀 10%
 * - 트레저리 나머지 (90%)
 * - 팀 베스팅 10%는 발행 총량과 별도로 release 시점에 발행
 */
export const INITIAL_SUPPLY = tokenToWei(3_000_000_000);
export const STAKING_POOL_ALLOCATION_RATE = 1_000;
export const TEAM_VESTING_ALLOCATION_RATE = 1_000;

export const TEAM_VESTING_DURATION = 730 * SECONDS_PER_DAY;
export const TEAM_VESTING_CLIFF = 180 * SECONDS_PER_DAY;

/**
 * 타임락 대기 시간: 1일
 */
export const TIMELOCK_PERIOD = SECONDS_PER_DAY;

/**
 * 액션 유효 기간: 생성 후 7일이 지나면 확인/실행 불가
 */
export const ACTION_TTL = 7 * SECONDS_PER_DAY;

export const DEFAULT_REQUIRED_CONFIRMATIONS = 1;
export const DEFAULT_MAX_MISSED_CONFIRMATIONS = 10;

/**
 * 거버넌스 수수료 (팀 지갑으로 납부)
 */
export const DEFAULT_PROPOSAL_FEE = tokenToWei(10);
export const DEFAULT_VOTING_FEE = tokenToWei(1);

export const ZERO_ADDRESS = '0x' + '0'.repeat(40);

export const DEFAULT_TOKEN_NAME = 'Quorum Ledger Token';
export const DEFAULT_TOKEN_SYMBOL = 'QRM';
