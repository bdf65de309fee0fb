import { Global, Module } from '@nestjs/common';
import { OperationRunner } from './operation-runner';
import { StateManager } from './state-manager';

/**
 * StateModule
 *
 * 전역 모듈. 각 도메인 서비스는 StateManager에서 자기 namespace의
 * 맵을 받아 상태를 보관하고, 공개 작업은 OperationRunner로 실행한다.
 */
@Global()
@Module({
  providers: [StateManager, OperationRunner],
  exports: [StateManager, OperationRunner],
})
export class StateModule {}
