import { HttpStatus } from '@nestjs/common';
import { toWire } from '../../common/interceptors/bigint-serializer.interceptor';
import { ActionOutcome } from '../../consensus/entities/action-outcome';
import { ActionReference } from '../entities/token.entity';

/**
 * sendOutcome이 쓰는 응답 객체의 부분 (express Response)
 */
export interface OutcomeResponse {
  status(code: number): { json(body: unknown): unknown };
}

/**
 * 특권 액션 결과 응답
 *
 * - applied: 200
 * - pending (timelock / consensus): 202
 */
export function sendOutcome<T>(
  response: OutcomeResponse,
  outcome: ActionOutcome<T>,
): void {
  const statusCode =
    outcome.status === 'pending' ? HttpStatus.ACCEPTED : HttpStatus.OK;
  response.status(statusCode).json(toWire(outcome));
}

export function toReference(dto: ActionReference): ActionReference {
  return { actionId: dto.actionId, timestamp: dto.timestamp };
}
