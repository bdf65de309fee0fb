import { Injectable } from '@nestjs/common';
import { StateChange } from '../../state/state.types';
import { IStateRepository } from './state.repository.interface';

/**
 * StateMemoryRepository
 *
 * 프로세스 메모리에 상태를 보관한다. 재시작하면 사라진다.
 */
@Injectable()
export class StateMemoryRepository implements IStateRepository {
  private readonly entries = new Map<string, string>();

  async initialize(): Promise<void> {}

  async loadAll(): Promise<Array<[string, string]>> {
    return [...this.entries];
  }

  async writeBatch(changes: StateChange[]): Promise<void> {
    for (const { key, value } of changes) {
      if (value === null) {
        this.entries.delete(key);
      } else {
        this.entries.set(key, value);
      }
    }
  }

  async close(): Promise<void> {}

  get size(): number {
    return this.entries.size;
  }
}
