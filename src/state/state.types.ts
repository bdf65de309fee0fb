/**
 * 저널 참여자 (JournaledMap)가 구현하는 인터페이스
 *
 * StateManager가 checkpoint 깊이를 관리하고, 각 참여자는 자신의
 * 레이어 스택을 그 깊이에 맞춰 병합/폐기한다.
 */
export interface JournalSlice {
  readonly namespace: string;
  commitLayer(depth: number): void;
  revertLayer(depth: number): void;
  drainChanges(): SliceChange[];
  hydrate(key: string, raw: string): void;
}

export interface JournalDepthSource {
  readonly journalDepth: number;
}

export interface SliceChange {
  key: string;
  /** undefined = 삭제 */
  value: unknown;
}

/**
 * 영속화 단위: "namespace:key" → 직렬화된 값 (null = 삭제)
 */
export interface StateChange {
  key: string;
  value: string | null;
}
