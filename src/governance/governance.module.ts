import { Module } from '@nestjs/common';
import { FeeModule } from '../fee/fee.module';
import { LedgerModule } from '../ledger/ledger.module';
import { GovernanceService } from './governance.service';

@Module({
  imports: [LedgerModule, FeeModule],
  providers: [GovernanceService],
  exports: [GovernanceService],
})
export class GovernanceModule {}
