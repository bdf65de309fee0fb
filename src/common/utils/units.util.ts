/**
 * 단위 변환 유틸리티
 *
 * 토큰 단위 체계 (decimals = 18):
 * - 1 token = 1,000,000,000,000,000,000 wei (10^18)
 * - 모든 내부 계산은 wei 단위 bigint로 수행
 */

export const TOKEN_DECIMALS = 18;
export const WEI_PER_TOKEN = 10n ** BigInt(TOKEN_DECIMALS);

/**
 * token → wei 변환
 *
 * @example
 * tokenToWei(1) // 1000000000000000000n
 * tokenToWei('1.5') // 1500000000000000000n
 */
export function tokenToWei(amount: number | string | bigint): bigint {
  if (typeof amount === 'bigint') {
    return amount * WEI_PER_TOKEN;
  }

  let amountStr: string;
  if (typeof amount === 'number') {
    // 과학적 표기법을 일반 표기법으로 변환
    amountStr = amount.toLocaleString('en-US', {
      useGrouping: false,
      minimumFractionDigits: 0,
      maximumFractionDigits: TOKEN_DECIMALS,
    });
  } else {
    amountStr = amount;
  }

  if (amountStr.includes('.')) {
    const [integer, decimal] = amountStr.split('.');
    // 소수점 이하 18자리까지만 허용
    const paddedDecimal = decimal
      .padEnd(TOKEN_DECIMALS, '0')
      .slice(0, TOKEN_DECIMALS);

    return BigInt(integer || '0') * WEI_PER_TOKEN + BigInt(paddedDecimal);
  }

  return BigInt(amountStr) * WEI_PER_TOKEN;
}

/**
 * wei → token 변환
 *
 * @example
 * weiToToken(1500000000000000000n) // "1.5"
 * weiToToken(3000000000000000000000000000n) // "3000000000"
 */
export function weiToToken(
  wei: bigint,
  decimals: number = TOKEN_DECIMALS,
): string {
  const negative = wei < 0n;
  const weiStr = (negative ? -wei : wei)
    .toString()
    .padStart(TOKEN_DECIMALS + 1, '0');

  const integerPart = weiStr.slice(0, -TOKEN_DECIMALS) || '0';
  const decimalPart = weiStr.slice(-TOKEN_DECIMALS);

  // decimals만큼만 표시 (뒤의 0 제거)
  const trimmedDecimal = decimalPart.slice(0, decimals).replace(/0+$/, '');
  const sign = negative ? '-' : '';

  if (trimmedDecimal === '') {
    return `${sign}${integerPart}`;
  }

  return `${sign}${integerPart}.${trimmedDecimal}`;
}

/**
 * 금액 포맷팅 (로그, 조회 응답용)
 *
 * @example
 * formatToken(1500000000000000000n, 'QRM') // "1.5 QRM"
 */
export function formatToken(amount: bigint, symbol: string): string {
  return `${weiToToken(amount)} ${symbol}`;
}
