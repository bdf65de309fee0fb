import { Module } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';
import { CommonModule } from './common/common.module';
import { EventsModule } from './events/events.module';
import { StateModule } from './state/state.module';
import { StorageModule } from './storage/storage.module';
import { TokenModule } from './token/token.module';

/**
 * AppModule
 *
 * Global Modules:
 * - CommonModule: 설정, 시계, 암호화, 재진입 가드
 * - StateModule: 저널 상태 (StateManager, OperationRunner)
 * - StorageModule: 상태 영속화 (memory / LevelDB)
 * - EventsModule: 이벤트 로그
 *
 * Feature Modules:
 * - TokenModule: 원장, 수수료, 합의, 스테이킹, 베스팅, 거버넌스를 묶는다
 */
@Module({
  imports: [
    ScheduleModule.forRoot(),

    // Global Modules
    CommonModule,
    StateModule,
    StorageModule,
    EventsModule,

    // Feature Modules
    TokenModule,
  ],
})
export class AppModule {}
