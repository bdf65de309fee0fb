import { Logger } from '@nestjs/common';
import { ClassicLevel } from 'classic-level';
import { mkdir } from 'node:fs/promises';
import { StateChange } from '../../state/state.types';
import { IStateRepository } from './state.repository.interface';

/**
 * StateLevelDBRepository
 *
 * LevelDB에 원장 상태 저장.
 *
 * - Key: "namespace:key" (utf8)
 * - Value: 직렬화된 JSON (utf8)
 * - 한 작업의 변경사항은 하나의 batch로 기록된다
 */
export class StateLevelDBRepository implements IStateRepository {
  private readonly logger = new Logger(StateLevelDBRepository.name);
  private readonly db: ClassicLevel<string, string>;

  constructor(private readonly location: string) {
    this.db = new ClassicLevel<string, string>(location, {
      keyEncoding: 'utf8',
      valueEncoding: 'utf8',
    });
  }

  async initialize(): Promise<void> {
    try {
      await mkdir(this.location, { recursive: true });
      await this.db.open();
      this.logger.log(`State LevelDB opened at ${this.location}`);
    } catch (error: unknown) {
      this.logger.error('Failed to initialize State LevelDB:', error);
      throw error;
    }
  }

  async loadAll(): Promise<Array<[string, string]>> {
    const entries: Array<[string, string]> = [];
    for await (const [key, value] of this.db.iterator()) {
      entries.push([key, value]);
    }
    return entries;
  }

  async writeBatch(changes: StateChange[]): Promise<void> {
    if (changes.length === 0) {
      return;
    }

    await this.db.batch(
      changes.map((change) =>
        change.value === null
          ? { type: 'del' as const, key: change.key }
          : { type: 'put' as const, key: change.key, value: change.value },
      ),
    );
  }

  async close(): Promise<void> {
    if (this.db.status === 'open') {
      await this.db.close();
    }
  }
}
