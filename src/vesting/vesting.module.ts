import { Module } from '@nestjs/common';
import { LedgerModule } from '../ledger/ledger.module';
import { VestingService } from './vesting.service';

@Module({
  imports: [LedgerModule],
  providers: [VestingService],
  exports: [VestingService],
})
export class VestingModule {}
