import { BASIS_POINTS } from '../constants/token.constants';

const BASIS = BigInt(BASIS_POINTS);
const HALF_BASIS = BASIS / 2n;

/**
 * amount × rate / 10000, 반올림(half-up)
 *
 * 수수료, 성과 수수료, 제네시스 배분 계산에 공통으로 사용한다.
 *
 * @example
 * mulBasisPoints(1000n, 100) // 10n
 * mulBasisPoints(50n, 100)   // 1n  (0.5 → 1)
 * mulBasisPoints(49n, 100)   // 0n  (0.49 → 0)
 */
export function mulBasisPoints(amount: bigint, rate: number): bigint {
  return (amount * BigInt(rate) + HALF_BASIS) / BASIS;
}

/**
 * 0 이상 10000 이하의 정수인지 확인
 */
export function isBasisPoints(rate: number): boolean {
  return Number.isInteger(rate) && rate >= 0 && rate <= BASIS_POINTS;
}
