import { decodeState } from '../common/utils/state-codec';
import { JournalDepthSource, JournalSlice, SliceChange } from './state.types';

const TOMBSTONE = Symbol('tombstone');

type Layer<V> = Map<string, V | typeof TOMBSTONE>;

/**
 * JournaledMap
 *
 * StateManager의 checkpoint 스택에 참여하는 키-값 저장소.
 *
 * 조회 순서: 레이어 스택 (최상단부터) -> 커밋된 base
 * 쓰기: 현재 깊이의 레이어에 기록, 깊이 0이면 base에 바로 기록
 *
 * 값은 불변 레코드로 취급한다. 수정할 때는 항상 새 객체로 교체.
 */
export class JournaledMap<V> implements JournalSlice {
  private readonly base = new Map<string, V>();
  private readonly layers: Layer<V>[] = [];
  private readonly dirty = new Set<string>();

  constructor(
    private readonly depthSource: JournalDepthSource,
    readonly namespace: string,
  ) {}

  get(key: string): V | undefined {
    for (let i = this.layers.length - 1; i >= 0; i--) {
      const layer = this.layers[i];
      if (layer.has(key)) {
        const value = layer.get(key);
        return value === TOMBSTONE ? undefined : value;
      }
    }
    return this.base.get(key);
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  set(key: string, value: V): void {
    const layer = this.topLayer();
    if (layer) {
      layer.set(key, value);
      return;
    }
    this.base.set(key, value);
    this.dirty.add(key);
  }

  delete(key: string): void {
    const layer = this.topLayer();
    if (layer) {
      layer.set(key, TOMBSTONE);
      return;
    }
    this.base.delete(key);
    this.dirty.add(key);
  }

  /**
   * 현재 보이는 모든 키 (base 삽입 순서, 이후 레이어에서 추가된 순서)
   */
  keys(): string[] {
    const visible = new Set(this.base.keys());
    for (const layer of this.layers) {
      for (const [key, value] of layer) {
        if (value === TOMBSTONE) {
          visible.delete(key);
        } else {
          visible.add(key);
        }
      }
    }
    return [...visible];
  }

  entries(): Array<[string, V]> {
    const result: Array<[string, V]> = [];
    for (const key of this.keys()) {
      const value = this.get(key);
      if (value !== undefined) {
        result.push([key, value]);
      }
    }
    return result;
  }

  commitLayer(depth: number): void {
    if (this.layers.length < depth) {
      return;
    }

    const top = this.layers.pop();
    if (!top) {
      return;
    }

    if (depth === 1) {
      for (const [key, value] of top) {
        if (value === TOMBSTONE) {
          this.base.delete(key);
        } else {
          this.base.set(key, value);
        }
        this.dirty.add(key);
      }
      return;
    }

    const target = this.layers[depth - 2];
    for (const [key, value] of top) {
      target.set(key, value);
    }
  }

  revertLayer(depth: number): void {
    if (this.layers.length === depth) {
      this.layers.pop();
    }
  }

  drainChanges(): SliceChange[] {
    const changes = [...this.dirty].map((key) => ({
      key,
      value: this.base.get(key),
    }));
    this.dirty.clear();
    return changes;
  }

  hydrate(key: string, raw: string): void {
    this.base.set(key, decodeState<V>(raw));
  }

  private topLayer(): Layer<V> | undefined {
    const depth = this.depthSource.journalDepth;
    if (depth === 0) {
      return undefined;
    }
    while (this.layers.length < depth) {
      this.layers.push(new Map());
    }
    return this.layers[depth - 1];
  }
}

/**
 * JournaledCell
 *
 * 단일 값을 저장하는 JournaledMap (설정값, 카운터, 플래그 등)
 */
export class JournaledCell<V> {
  private static readonly KEY = 'value';

  constructor(private readonly map: JournaledMap<V>) {}

  get(): V | undefined {
    return this.map.get(JournaledCell.KEY);
  }

  getOr(fallback: V): V {
    return this.map.get(JournaledCell.KEY) ?? fallback;
  }

  set(value: V): void {
    this.map.set(JournaledCell.KEY, value);
  }

  clear(): void {
    this.map.delete(JournaledCell.KEY);
  }
}
