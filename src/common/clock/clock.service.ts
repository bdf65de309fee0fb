import { Injectable } from '@nestjs/common';
import { Timestamp } from '../types/common.types';

/**
 * ClockService
 *
 * 현재 시각(초)을 제공한다. 스테이킹 누적, 베스팅, 타임락, 액션 만료가
 * 모두 이 값을 기준으로 계산된다.
 *
 * 테스트에서는 수동으로 시간을 진행시키는 구현으로 교체한다.
 */
@Injectable()
export class ClockService {
  now(): Timestamp {
    return Math.floor(Date.now() / 1000);
  }
}
