import { Address } from '../../common/types/common.types';

/**
 * 시스템 계정
 *
 * - self: 토큰 인스턴스 자신의 주소 (스테이킹 예치금 보관)
 * - owner: 관리자 (특권 액션 요청)
 * - teamWallet: 팀 수수료, 성과 수수료, 거버넌스 수수료 수령
 * - stakingPool: 스테이킹 수수료 수령, 보상 지급
 * - treasuryWallet: 제네시스 물량 보관, 바이백 소각
 */
export interface SystemAccounts {
  readonly self: Address;
  readonly owner: Address;
  readonly teamWallet: Address;
  readonly stakingPool: Address;
  readonly treasuryWallet: Address;
}

/**
 * 토큰 메타데이터
 */
export interface TokenMetadata {
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;
  readonly deployedAt: number;
}
