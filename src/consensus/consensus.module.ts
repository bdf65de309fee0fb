import { Module } from '@nestjs/common';
import { TimelockModule } from '../timelock/timelock.module';
import { ValidatorModule } from '../validator/validator.module';
import { ConsensusService } from './consensus.service';
import { PrivilegedActionService } from './privileged-action.service';

/**
 * Consensus Module
 *
 * 구성:
 * - ConsensusService: 액션 레코드, 확인 수집, 정족수 판정
 * - PrivilegedActionService: Timelock → Consensus → apply 절차
 */
@Module({
  imports: [ValidatorModule, TimelockModule],
  providers: [ConsensusService, PrivilegedActionService],
  exports: [ConsensusService, PrivilegedActionService, TimelockModule],
})
export class ConsensusModule {}
