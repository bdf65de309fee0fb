/**
 * 전송 수수료율 (basis points)
 *
 * 불변식: teamFeeRate + stakingFeeRate + burnFeeRate <= 500
 */
export interface FeeRates {
  readonly teamFeeRate: number;
  readonly stakingFeeRate: number;
  readonly burnFeeRate: number;
}

/**
 * 전송 한 건의 수수료 분해
 *
 * amount = netAmount + teamFee + stakingFee + burnFee
 */
export interface FeeBreakdown {
  readonly amount: bigint;
  readonly teamFee: bigint;
  readonly stakingFee: bigint;
  readonly burnFee: bigint;
  readonly totalFee: bigint;
  readonly netAmount: bigint;
}
