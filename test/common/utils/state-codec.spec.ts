import {
  decodeState,
  encodeState,
} from '../../../src/common/utils/state-codec';

describe('state-codec', () => {
  it('bigint를 $bigint 상자로 저장해야 함', () => {
    expect(encodeState({ amount: 10n, label: 'x' })).toBe(
      '{"amount":{"$bigint":"10"},"label":"x"}',
    );
  });

  it('중첩된 bigint를 복원해야 함', () => {
    const decoded = decodeState<{ balances: Record<string, bigint> }>(
      '{"balances":{"0xa":{"$bigint":"5"},"0xb":{"$bigint":"0"}}}',
    );

    expect(decoded.balances['0xa']).toBe(5n);
    expect(decoded.balances['0xb']).toBe(0n);
  });

  it('다른 키가 섞인 객체는 상자로 보지 않아야 함', () => {
    const decoded = decodeState<{ $bigint: string; extra: number }>(
      '{"$bigint":"5","extra":1}',
    );

    expect(decoded).toEqual({ $bigint: '5', extra: 1 });
  });
});
