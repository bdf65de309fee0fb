import { Global, Module } from '@nestjs/common';
import { ClockService } from './clock/clock.service';
import { ReentrancyGuard } from './concurrency/reentrancy.guard';
import { APP_CONFIG, loadAppConfig } from './config/app.config';
import { CryptoService } from './crypto/crypto.service';

/**
 * CommonModule
 *
 * 전역 모듈. 모든 모듈에서 import 없이 사용 가능.
 *
 * 포함된 서비스:
 * - CryptoService: 해싱, RLP, 키 생성
 * - ClockService: 현재 시각 (초)
 * - ReentrancyGuard: 자금 이동 진입점의 배타적 가드
 * - APP_CONFIG: 검증된 환경 설정
 */
@Global()
@Module({
  providers: [
    CryptoService,
    ClockService,
    ReentrancyGuard,
    {
      provide: APP_CONFIG,
      useFactory: () => loadAppConfig(),
    },
  ],
  exports: [CryptoService, ClockService, ReentrancyGuard, APP_CONFIG],
})
export class CommonModule {}
