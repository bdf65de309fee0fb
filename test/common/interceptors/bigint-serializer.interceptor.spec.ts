import { CallHandler } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { lastValueFrom, of } from 'rxjs';
import {
  BigIntSerializerInterceptor,
  toWire,
} from '../../../src/common/interceptors/bigint-serializer.interceptor';

describe('BigIntSerializerInterceptor', () => {
  it('toWire: 중첩된 bigint를 문자열로 바꿔야 함', () => {
    expect(
      toWire({
        amount: 10n,
        list: [1n, { fee: 2n }],
        nested: { total: 3n, label: 'ok', empty: null },
      }),
    ).toEqual({
      amount: '10',
      list: ['1', { fee: '2' }],
      nested: { total: '3', label: 'ok', empty: null },
    });
  });

  it('핸들러 결과에 적용해야 함', async () => {
    const interceptor = new BigIntSerializerInterceptor();
    const handler: CallHandler = { handle: () => of({ balance: 5n }) };

    const result = await lastValueFrom(
      interceptor.intercept(new ExecutionContextHost([]), handler),
    );

    expect(result).toEqual({ balance: '5' });
  });
});
