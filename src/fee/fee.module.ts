import { Module } from '@nestjs/common';
import { LedgerModule } from '../ledger/ledger.module';
import { FeeService } from './fee.service';

@Module({
  imports: [LedgerModule],
  providers: [FeeService],
  exports: [FeeService],
})
export class FeeModule {}
