import { Module } from '@nestjs/common';
import { ConsensusModule } from '../consensus/consensus.module';
import { FeeModule } from '../fee/fee.module';
import { GovernanceModule } from '../governance/governance.module';
import { LedgerModule } from '../ledger/ledger.module';
import { StakingModule } from '../staking/staking.module';
import { ValidatorModule } from '../validator/validator.module';
import { VestingModule } from '../vesting/vesting.module';
import { AdminController } from './controllers/admin.controller';
import { ConsensusController } from './controllers/consensus.controller';
import { GovernanceController } from './controllers/governance.controller';
import { StakingController } from './controllers/staking.controller';
import { TokenController } from './controllers/token.controller';
import { VestingController } from './controllers/vesting.controller';
import { GenesisBootstrap } from './genesis.bootstrap';
import { TokenAdminService } from './token-admin.service';
import { TokenFactoryService } from './token-factory.service';
import { TokenService } from './token.service';
import { UpgradeService } from './upgrade.service';

/**
 * Token Module
 *
 * 구성:
 * - TokenService: 오케스트레이터 (ERC-20, 스테이킹/베스팅/거버넌스 위임)
 * - TokenAdminService: 특권 변경 (합의 / 타임락)
 * - TokenFactoryService: 배포, 주소 파생
 * - UpgradeService: 로직 버전 기록
 * - GenesisBootstrap: 설정된 제네시스 지갑으로 자동 배포
 */
@Module({
  imports: [
    LedgerModule,
    FeeModule,
    ValidatorModule,
    ConsensusModule,
    StakingModule,
    VestingModule,
    GovernanceModule,
  ],
  controllers: [
    TokenController,
    StakingController,
    VestingController,
    GovernanceController,
    ConsensusController,
    AdminController,
  ],
  providers: [
    TokenService,
    TokenAdminService,
    TokenFactoryService,
    UpgradeService,
    GenesisBootstrap,
  ],
  exports: [TokenService, TokenAdminService, TokenFactoryService],
})
export class TokenModule {}
