import { Injectable, Logger } from '@nestjs/common';
import { StatePersistenceService } from '../storage/state-persistence.service';
import { StateManager } from './state-manager';

/**
 * OperationRunner
 *
 * 모든 공개 작업은 이 러너를 통해 실행된다.
 *
 * 동작:
 * 1. checkpoint
 * 2. 작업 실행 (동기)
 * 3. 성공 -> commit, 실패 -> revert 후 에러 재전파
 * 4. 최외곽 작업이 커밋되면 변경사항 영속화
 *
 * 작업 중 수신 훅이 다른 작업을 호출하면 중첩 checkpoint가 열린다.
 */
@Injectable()
export class OperationRunner {
  private readonly logger = new Logger(OperationRunner.name);

  constructor(
    private readonly stateManager: StateManager,
    private readonly persistence: StatePersistenceService,
  ) {}

  execute<T>(name: string, operation: () => T): T {
    this.stateManager.checkpoint();

    let result: T;
    try {
      result = operation();
    } catch (error) {
      this.stateManager.revertCheckpoint();
      this.logger.debug(
        `${name} reverted: ${error instanceof Error ? error.message : String(error)}`,
      );
      throw error;
    }

    this.stateManager.commitCheckpoint();

    if (this.stateManager.journalDepth === 0) {
      this.persistence.persist(this.stateManager.drainChanges());
    }

    return result;
  }
}
