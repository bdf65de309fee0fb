import { Module } from '@nestjs/common';
import { LedgerService } from './ledger.service';
import { SystemAccountsService } from './system-accounts.service';

/**
 * LedgerModule
 *
 * 잔액 원장과 시스템 계정.
 * 다른 모든 도메인 모듈 (수수료, 스테이킹, 베스팅, 거버넌스)이 의존한다.
 */
@Module({
  providers: [LedgerService, SystemAccountsService],
  exports: [LedgerService, SystemAccountsService],
})
export class LedgerModule {}
