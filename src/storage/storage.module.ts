import { Global, Logger, Module } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../common/config/app.config';
import { StateLevelDBRepository } from './repositories/state-leveldb.repository';
import { StateMemoryRepository } from './repositories/state-memory.repository';
import { IStateRepository } from './repositories/state.repository.interface';
import { StatePersistenceService } from './state-persistence.service';

/**
 * Storage Module (Global)
 *
 * 인프라 계층. STORAGE_DRIVER 설정에 따라 저장소 구현을 선택한다.
 * - memory (기본값): StateMemoryRepository
 * - leveldb: StateLevelDBRepository (DATA_DIR)
 *
 * Export:
 * - IStateRepository
 * - StatePersistenceService
 */
@Global()
@Module({
  providers: [
    {
      provide: IStateRepository,
      useFactory: (config: AppConfig): IStateRepository => {
        if (config.storageDriver === 'leveldb') {
          return new StateLevelDBRepository(config.dataDir);
        }
        new Logger('StorageModule').log('Using in-memory state storage');
        return new StateMemoryRepository();
      },
      inject: [APP_CONFIG],
    },
    StatePersistenceService,
  ],
  exports: [IStateRepository, StatePersistenceService],
})
export class StorageModule {}
