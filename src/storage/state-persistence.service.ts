import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { StateManager } from '../state/state-manager';
import { StateChange } from '../state/state.types';
import { IStateRepository } from './repositories/state.repository.interface';

/**
 * StatePersistenceService
 *
 * 역할:
 * - 시작 시 저장소에서 상태를 읽어 StateManager 복원
 * - 커밋된 변경사항을 저장소에 순서대로 기록
 *
 * 기록은 promise 체인으로 직렬화된다. 기록 실패는 로그로 남기고
 * 메모리 상태는 그대로 유지한다.
 */
@Injectable()
export class StatePersistenceService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(StatePersistenceService.name);
  private pending: Promise<void> = Promise.resolve();

  constructor(
    private readonly repository: IStateRepository,
    private readonly stateManager: StateManager,
  ) {}

  async onModuleInit(): Promise<void> {
    await this.repository.initialize();
    const entries = await this.repository.loadAll();
    const loaded = this.stateManager.hydrate(entries);
    if (loaded > 0) {
      this.logger.log(`Restored ${loaded} state entries`);
    }
  }

  async onModuleDestroy(): Promise<void> {
    await this.flush();
    await this.repository.close();
  }

  persist(changes: StateChange[]): void {
    if (changes.length === 0) {
      return;
    }

    this.pending = this.pending
      .then(() => this.repository.writeBatch(changes))
      .catch((error: unknown) => {
        this.logger.error(
          `Failed to persist ${changes.length} state entries`,
          error instanceof Error ? error.stack : String(error),
        );
      });
  }

  /**
   * 대기 중인 모든 기록이 끝날 때까지 대기
   */
  flush(): Promise<void> {
    return this.pending;
  }
}
