import { Injectable, Logger } from '@nestjs/common';
import { ClockService } from '../common/clock/clock.service';
import {
  DEFAULT_PROPOSAL_FEE,
  DEFAULT_VOTING_FEE,
} from '../common/constants/token.constants';
import {
  AlreadyDoneError,
  InsufficientFundsError,
  InvariantViolationError,
  NotFoundError,
} from '../common/errors/ledger.errors';
import { Address, normalizeAddress } from '../common/types/common.types';
import { EventLogService } from '../events/event-log.service';
import { FeeService } from '../fee/fee.service';
import { LedgerService } from '../ledger/ledger.service';
import { SystemAccountsService } from '../ledger/system-accounts.service';
import { JournaledCell, JournaledMap } from '../state/journaled-map';
import { StateManager } from '../state/state-manager';
import {
  BalanceSnapshot,
  GovernanceFees,
  Proposal,
} from './entities/governance.entity';

/**
 * Governance Service
 *
 * 역할:
 * - 제안 생성 / 투표 시 수수료 징수 (팀 지갑)
 * - 잔액 스냅샷 (특정 시점의 보유량 조회)
 *
 * 투표 집계와 제안 실행은 하지 않는다.
 */
@Injectable()
export class GovernanceService {
  private readonly logger = new Logger(GovernanceService.name);
  private readonly fees: JournaledCell<GovernanceFees>;
  private readonly proposals: JournaledMap<Proposal>;
  private readonly votes: JournaledMap<boolean>;
  private readonly proposalCount: JournaledCell<number>;
  private readonly snapshots: JournaledMap<BalanceSnapshot>;
  private readonly snapshotCount: JournaledCell<number>;

  constructor(
    stateManager: StateManager,
    private readonly ledgerService: LedgerService,
    private readonly feeService: FeeService,
    private readonly systemAccounts: SystemAccountsService,
    private readonly clock: ClockService,
    private readonly eventLog: EventLogService,
  ) {
    this.fees = stateManager.createCell<GovernanceFees>('governance.fees');
    this.proposals = stateManager.createMap<Proposal>('governance.proposals');
    this.votes = stateManager.createMap<boolean>('governance.votes');
    this.proposalCount = stateManager.createCell<number>(
      'governance.proposalCount',
    );
    this.snapshots = stateManager.createMap<BalanceSnapshot>(
      'governance.snapshots',
    );
    this.snapshotCount = stateManager.createCell<number>(
      'governance.snapshotCount',
    );
  }

  initialize(): void {
    this.fees.set({
      proposalFee: DEFAULT_PROPOSAL_FEE,
      votingFee: DEFAULT_VOTING_FEE,
    });
  }

  getFees(): GovernanceFees {
    return this.fees.getOr({
      proposalFee: DEFAULT_PROPOSAL_FEE,
      votingFee: DEFAULT_VOTING_FEE,
    });
  }

  getProposal(proposalId: number): Proposal {
    const proposal = this.proposals.get(String(proposalId));
    if (!proposal) {
      throw new NotFoundError(
        'UnknownProposal',
        `Proposal ${proposalId} does not exist`,
      );
    }
    return proposal;
  }

  getProposalCount(): number {
    return this.proposalCount.getOr(0);
  }

  hasVoted(proposalId: number, voter: Address): boolean {
    return this.votes.has(this.voteKey(proposalId, normalizeAddress(voter)));
  }

  /**
   * 제안 생성: proposalFee를 팀 지갑으로 납부
   */
  createProposal(caller: Address): Proposal {
    const proposer = normalizeAddress(caller);
    const { proposalFee } = this.getFees();

    this.collectFee(
      proposer,
      proposalFee,
      'PROPOSAL_FEE',
      'Insufficient balance for proposal fee',
    );

    const id = this.getProposalCount() + 1;
    const proposal: Proposal = {
      id,
      proposer,
      createdAt: this.clock.now(),
      voteCount: 0,
    };
    this.proposals.set(String(id), proposal);
    this.proposalCount.set(id);

    this.eventLog.emit('ProposalCreated', { proposalId: id, proposer });
    this.logger.log(`Proposal #${id} created by ${proposer}`);
    return proposal;
  }

  /**
   * 투표: votingFee를 팀 지갑으로 납부 (제안당 한 번)
   */
  vote(proposalId: number, caller: Address): Proposal {
    const voter = normalizeAddress(caller);
    const proposal = this.getProposal(proposalId);

    if (this.hasVoted(proposalId, voter)) {
      throw new AlreadyDoneError('AlreadyVoted', 'Already voted');
    }

    const { votingFee } = this.getFees();
    this.collectFee(
      voter,
      votingFee,
      'VOTING_FEE',
      'Insufficient balance for voting fee',
    );

    const updated: Proposal = {
      ...proposal,
      voteCount: proposal.voteCount + 1,
    };
    this.proposals.set(String(proposalId), updated);
    this.votes.set(this.voteKey(proposalId, voter), true);

    this.eventLog.emit('VoteCast', { proposalId, voter });
    return updated;
  }

  setProposalFee(proposalFee: bigint): void {
    this.assertFee(proposalFee);
    this.fees.set({ ...this.getFees(), proposalFee });
    this.eventLog.emit('ProposalFeeUpdated', { proposalFee });
  }

  setVotingFee(votingFee: bigint): void {
    this.assertFee(votingFee);
    this.fees.set({ ...this.getFees(), votingFee });
    this.eventLog.emit('VotingFeeUpdated', { votingFee });
  }

  /**
   * 현재 잔액 스냅샷 저장
   *
   * @returns 스냅샷 ID (1부터 증가)
   */
  snapshot(): BalanceSnapshot {
    const id = this.snapshotCount.getOr(0) + 1;
    const snapshot: BalanceSnapshot = {
      id,
      takenAt: this.clock.now(),
      totalSupply: this.ledgerService.totalSupply(),
      balances: Object.fromEntries(this.ledgerService.holders()),
    };

    this.snapshots.set(String(id), snapshot);
    this.snapshotCount.set(id);

    this.eventLog.emit('SnapshotTaken', { snapshotId: id });
    return snapshot;
  }

  getSnapshot(snapshotId: number): BalanceSnapshot {
    const snapshot = this.snapshots.get(String(snapshotId));
    if (!snapshot) {
      throw new NotFoundError(
        'UnknownSnapshot',
        `Snapshot ${snapshotId} does not exist`,
      );
    }
    return snapshot;
  }

  balanceOfAt(account: Address, snapshotId: number): bigint {
    const snapshot = this.getSnapshot(snapshotId);
    return snapshot.balances[normalizeAddress(account)] ?? 0n;
  }

  totalSupplyAt(snapshotId: number): bigint {
    return this.getSnapshot(snapshotId).totalSupply;
  }

  private collectFee(
    payer: Address,
    amount: bigint,
    feeType: 'PROPOSAL_FEE' | 'VOTING_FEE',
    insufficientMessage: string,
  ): void {
    if (this.ledgerService.balanceOf(payer) < amount) {
      throw new InsufficientFundsError(
        'InsufficientBalance',
        insufficientMessage,
      );
    }
    if (amount === 0n) {
      return;
    }

    const { teamWallet } = this.systemAccounts.get();
    this.feeService.applyTransfer(payer, teamWallet, amount);
    this.eventLog.emit('FeeCollected', {
      payer,
      payee: teamWallet,
      amount,
      feeType,
    });
  }

  private assertFee(fee: bigint): void {
    if (fee < 0n) {
      throw new InvariantViolationError(
        'InvalidFee',
        'Fee must not be negative',
      );
    }
  }

  private voteKey(proposalId: number, voter: Address): string {
    return `${proposalId}:${voter}`;
  }
}
