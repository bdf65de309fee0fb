import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import type { Request } from 'express';
import { AuthorizationError } from '../errors/ledger.errors';
import {
  Address,
  isValidAddress,
  normalizeAddress,
} from '../types/common.types';

export const CALLER_HEADER = 'x-caller-address';

/**
 * 요청 헤더에서 호출자 주소 추출
 *
 * 개발용 원장이라 서명 검증 없이 헤더 값을 그대로 신뢰한다.
 */
export function readCaller(request: Pick<Request, 'headers'>): Address {
  const header = request.headers[CALLER_HEADER];
  const value = Array.isArray(header) ? header[0] : header;

  if (!value || !isValidAddress(value)) {
    throw new AuthorizationError(
      'MissingCaller',
      `Header ${CALLER_HEADER} must carry a valid address`,
    );
  }

  return normalizeAddress(value);
}

/**
 * @Caller() 파라미터 데코레이터
 *
 * @example
 * transfer(@Caller() caller: Address, @Body() dto: TransferDto)
 */
export const Caller = createParamDecorator(
  (_data: unknown, context: ExecutionContext): Address =>
    readCaller(context.switchToHttp().getRequest<Request>()),
);
