import { Address, Hash, Timestamp } from '../../common/types/common.types';
import { FeeRates } from '../../fee/entities/fee.entity';
import { SystemAccounts } from '../../ledger/entities/system-accounts.entity';

/**
 * 배포 파라미터
 */
export interface DeployTokenParams {
  owner: Address;
  teamWallet: Address;
  stakingPool: Address;
  treasuryWallet: Address;
  name?: string;
  symbol?: string;
}

/**
 * 배포 결과 (파라미터로부터 결정적으로 계산됨)
 */
export interface DeploymentResult {
  instanceAddress: Address;
  logicAddress: Address;
}

/**
 * 현재 로직 버전
 */
export interface LogicVersion {
  readonly logicAddress: Address;
  readonly version: number;
  readonly activatedAt: Timestamp;
}

/**
 * 특권 호출이 참조하는 액션 (둘 다 없으면 새로 제안)
 */
export interface ActionReference {
  actionId?: Hash;
  timestamp?: Timestamp;
}

export interface TokenInfo {
  name: string;
  symbol: string;
  decimals: number;
  totalSupply: bigint;
  totalSupplyFormatted: string;
  paused: boolean;
  accounts: SystemAccounts;
  feeRates: FeeRates;
  transactionFeeRate: number;
  totalStaked: bigint;
  rewardRate: bigint;
  performanceFeeRate: number;
  validatorCount: number;
  requiredConfirmations: number;
  logic: LogicVersion;
}
