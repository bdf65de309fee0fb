import { Injectable, Logger } from '@nestjs/common';
import { encodeState } from '../common/utils/state-codec';
import { JournaledCell, JournaledMap } from './journaled-map';
import { JournalSlice, StateChange } from './state.types';

/**
 * StateManager
 *
 * 역할:
 * - 원장 상태의 저널링 (checkpoint / commit / revert)
 * - 각 컴포넌트가 자기 namespace의 JournaledMap을 소유
 * - 최외곽 커밋 후 변경된 키를 영속화 계층으로 넘김
 *
 * 저널링 스택:
 * - 중첩된 checkpoint 지원 (작업 > 수신 훅에서 재진입한 작업 > ...)
 * - revert 시 해당 깊이에서 기록된 모든 변경 (이벤트 포함)이 사라짐
 */
@Injectable()
export class StateManager {
  private readonly logger = new Logger(StateManager.name);
  private readonly slices = new Map<string, JournalSlice>();
  private depth = 0;

  /**
   * namespace 전용 맵 생성
   *
   * namespace는 ':'를 포함할 수 없다 (영속화 키 구분자).
   */
  createMap<V>(namespace: string): JournaledMap<V> {
    if (namespace.includes(':')) {
      throw new Error(`Invalid namespace: ${namespace}`);
    }
    if (this.slices.has(namespace)) {
      throw new Error(`Namespace already registered: ${namespace}`);
    }

    const map = new JournaledMap<V>(this, namespace);
    this.slices.set(namespace, map);
    return map;
  }

  createCell<V>(namespace: string): JournaledCell<V> {
    return new JournaledCell(this.createMap<V>(namespace));
  }

  get journalDepth(): number {
    return this.depth;
  }

  /**
   * Checkpoint 생성: 스택에 새 레벨 추가 (중첩 지원)
   */
  checkpoint(): void {
    this.depth++;
  }

  /**
   * Checkpoint 커밋: 최상단 레벨의 변경사항을 하위 레벨에 병합
   *
   * 최외곽(깊이 1) 커밋이면 커밋된 상태에 반영된다.
   */
  commitCheckpoint(): void {
    if (this.depth === 0) {
      throw new Error('Cannot commit: journal stack is empty');
    }

    for (const slice of this.slices.values()) {
      slice.commitLayer(this.depth);
    }
    this.depth--;
  }

  /**
   * Checkpoint 되돌리기: 최상단 레벨의 변경사항 폐기
   */
  revertCheckpoint(): void {
    if (this.depth === 0) {
      throw new Error('Cannot revert: journal stack is empty');
    }

    for (const slice of this.slices.values()) {
      slice.revertLayer(this.depth);
    }
    this.depth--;
  }

  /**
   * 마지막 호출 이후 커밋된 변경사항 수집 (영속화용)
   */
  drainChanges(): StateChange[] {
    const changes: StateChange[] = [];
    for (const slice of this.slices.values()) {
      for (const { key, value } of slice.drainChanges()) {
        changes.push({
          key: `${slice.namespace}:${key}`,
          value: value === undefined ? null : encodeState(value),
        });
      }
    }
    return changes;
  }

  /**
   * 저장소에서 읽은 상태로 커밋된 base 채우기 (시작 시 한 번)
   */
  hydrate(entries: Iterable<[string, string]>): number {
    let loaded = 0;
    for (const [qualifiedKey, raw] of entries) {
      const separator = qualifiedKey.indexOf(':');
      const namespace = qualifiedKey.slice(0, separator);
      const slice = separator > 0 ? this.slices.get(namespace) : undefined;

      if (!slice) {
        this.logger.warn(`Skipping unknown state key: ${qualifiedKey}`);
        continue;
      }

      slice.hydrate(qualifiedKey.slice(separator + 1), raw);
      loaded++;
    }
    return loaded;
  }
}
