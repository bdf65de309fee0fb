import { Injectable } from '@nestjs/common';
import { ClockService } from '../common/clock/clock.service';
import { JournaledCell, JournaledMap } from '../state/journaled-map';
import { StateManager } from '../state/state-manager';
import {
  LedgerEventPayloads,
  LedgerEventRecord,
  LedgerEventType,
} from './ledger-event.types';

/**
 * EventLogService
 *
 * 원장의 모든 신호 (Transfer, FeeCollected, ActionConfirmed, ...)를 기록한다.
 *
 * 이벤트도 저널링된 상태에 저장되므로, 되돌려진 작업이 낸 이벤트는
 * 상태 변경과 함께 사라진다.
 */
@Injectable()
export class EventLogService {
  private readonly events: JournaledMap<LedgerEventRecord>;
  private readonly sequence: JournaledCell<number>;

  constructor(
    stateManager: StateManager,
    private readonly clock: ClockService,
  ) {
    this.events = stateManager.createMap<LedgerEventRecord>('events.log');
    this.sequence = stateManager.createCell<number>('events.seq');
  }

  emit<K extends LedgerEventType>(type: K, data: LedgerEventPayloads[K]): void {
    const seq = this.sequence.getOr(0) + 1;
    const record: LedgerEventRecord<K> = {
      seq,
      type,
      timestamp: this.clock.now(),
      data,
    };

    this.sequence.set(seq);
    // 저장소 키 정렬(사전순)에서도 순서가 유지되도록 0 패딩
    this.events.set(seq.toString().padStart(12, '0'), record);
  }

  /**
   * 전체 로그 (seq 오름차순)
   */
  all(): LedgerEventRecord[] {
    return this.events
      .entries()
      .map(([, record]) => record)
      .sort((a, b) => a.seq - b.seq);
  }

  /**
   * 특정 타입의 이벤트만 조회
   */
  ofType<K extends LedgerEventType>(type: K): LedgerEventRecord<K>[] {
    return this.all().filter(
      (record): record is LedgerEventRecord<K> => record.type === type,
    );
  }

  /**
   * 최근 이벤트 조회
   *
   * @param limit - 최대 개수 (최신 기준)
   */
  recent(limit: number, type?: LedgerEventType): LedgerEventRecord[] {
    const records = type ? this.ofType(type) : this.all();
    return records.slice(Math.max(records.length - limit, 0));
  }

  get count(): number {
    return this.sequence.getOr(0);
  }
}
