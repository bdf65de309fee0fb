import { Address, Hash, Timestamp } from '../common/types/common.types';

/**
 * 수수료 신호 태그
 */
export type FeeType =
  | 'TEAM_FEE'
  | 'STAKING_FEE'
  | 'BURN_FEE'
  | 'PERFORMANCE_FEE'
  | 'STAKING_REWARD'
  | 'PROPOSAL_FEE'
  | 'VOTING_FEE';

/**
 * 이벤트 타입별 페이로드
 */
export interface LedgerEventPayloads {
  Transfer: { from: Address; to: Address; amount: bigint };
  Approval: { owner: Address; spender: Address; amount: bigint };
  /** payee가 null이면 소각 */
  FeeCollected: {
    payer: Address;
    payee: Address | null;
    amount: bigint;
    feeType: FeeType;
  };
  FeeRatesUpdated: {
    teamFeeRate: number;
    stakingFeeRate: number;
    burnFeeRate: number;
  };
  FeeExemptionUpdated: { account: Address; exempt: boolean };

  ActionProposed: { actionId: Hash; kind: string; proposer: Address };
  ActionConfirmed: {
    actionId: Hash;
    validator: Address;
    confirmations: number;
  };
  ActionExecuted: { actionId: Hash; kind: string; executor: Address };
  TimelockSet: { actionId: Hash; expiry: Timestamp };

  ValidatorAdded: { validator: Address };
  ValidatorRemoved: { validator: Address };
  ValidatorSlashed: { validator: Address; missedConfirmations: number };
  MissedConfirmationsRecorded: { actionId: Hash; validators: Address[] };
  RequiredConfirmationsUpdated: { requiredConfirmations: number };
  MaxMissedConfirmationsUpdated: { maxMissedConfirmations: number };

  Staked: { account: Address; amount: bigint };
  Withdrawn: { account: Address; amount: bigint };
  RewardPaid: { account: Address; reward: bigint; fee: bigint };
  RewardRateUpdated: { rewardRate: bigint };
  PerformanceFeeRateUpdated: { performanceFeeRate: number };

  VestingScheduleCreated: {
    beneficiary: Address;
    amount: bigint;
    startTime: Timestamp;
    duration: number;
    cliffDuration: number;
  };
  TokensReleased: { beneficiary: Address; amount: bigint };

  Paused: { account: Address };
  Unpaused: { account: Address };
  BuybackAndBurn: { account: Address; amount: bigint };
  Upgraded: { logicAddress: Address; version: number };
  TokenDeployed: {
    instanceAddress: Address;
    logicAddress: Address;
    owner: Address;
  };

  ProposalCreated: { proposalId: number; proposer: Address };
  VoteCast: { proposalId: number; voter: Address };
  ProposalFeeUpdated: { proposalFee: bigint };
  VotingFeeUpdated: { votingFee: bigint };
  SnapshotTaken: { snapshotId: number };
}

export type LedgerEventType = keyof LedgerEventPayloads;

/**
 * 이벤트 로그 레코드
 */
export interface LedgerEventRecord<
  K extends LedgerEventType = LedgerEventType,
> {
  seq: number;
  type: K;
  timestamp: Timestamp;
  data: LedgerEventPayloads[K];
}

export const LEDGER_EVENT_TYPES: readonly LedgerEventType[] = [
  'Transfer',
  'Approval',
  'FeeCollected',
  'FeeRatesUpdated',
  'FeeExemptionUpdated',
  'ActionProposed',
  'ActionConfirmed',
  'ActionExecuted',
  'TimelockSet',
  'ValidatorAdded',
  'ValidatorRemoved',
  'ValidatorSlashed',
  'MissedConfirmationsRecorded',
  'RequiredConfirmationsUpdated',
  'MaxMissedConfirmationsUpdated',
  'Staked',
  'Withdrawn',
  'RewardPaid',
  'RewardRateUpdated',
  'PerformanceFeeRateUpdated',
  'VestingScheduleCreated',
  'TokensReleased',
  'Paused',
  'Unpaused',
  'BuybackAndBurn',
  'Upgraded',
  'TokenDeployed',
  'ProposalCreated',
  'VoteCast',
  'ProposalFeeUpdated',
  'VotingFeeUpdated',
  'SnapshotTaken',
];
