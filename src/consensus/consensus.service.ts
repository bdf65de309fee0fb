import { Injectable, Logger } from '@nestjs/common';
import { ClockService } from '../common/clock/clock.service';
import { ACTION_TTL } from '../common/constants/token.constants';
import { CryptoService } from '../common/crypto/crypto.service';
import {
  AlreadyDoneError,
  AuthorizationError,
  InvariantViolationError,
  NotFoundError,
} from '../common/errors/ledger.errors';
import {
  Address,
  Hash,
  normalizeAddress,
  Timestamp,
} from '../common/types/common.types';
import { EventLogService } from '../events/event-log.service';
import { JournaledMap } from '../state/journaled-map';
import { StateManager } from '../state/state-manager';
import { ValidatorService } from '../validator/validator.service';
import {
  ActionKind,
  ActionParam,
  encodeActionParams,
} from './entities/action-kind';
import { ActionRecord, ActionStatus } from './entities/action.entity';

/**
 * Consensus Service
 *
 * 특권 액션의 N-of-M 밸리데이터 확인을 관리한다.
 *
 * 액션 ID:
 * - keccak256(RLP([kind, ...params, timestamp]))
 * - 첫 제안자가 현재 시각으로 할당하고 다른 밸리데이터와 공유하거나,
 *   모두가 같은 timestamp로 각자 계산할 수 있다
 *
 * 규칙:
 * - 밸리데이터만 확인 가능 (NotAValidator)
 * - 같은 밸리데이터의 중복 확인 불가 (AlreadyConfirmed)
 * - 확인 수 >= requiredConfirmations 이면 confirmed (되돌아가지 않음)
 * - 생성 후 ACTION_TTL이 지난 액션은 확인/실행 불가 (ActionExpired)
 * - 실행된 액션은 최종 (ActionAlreadyExecuted)
 */
@Injectable()
export class ConsensusService {
  private readonly logger = new Logger(ConsensusService.name);
  private readonly actions: JournaledMap<ActionRecord>;

  constructor(
    stateManager: StateManager,
    private readonly validatorService: ValidatorService,
    private readonly cryptoService: CryptoService,
    private readonly clock: ClockService,
    private readonly eventLog: EventLogService,
  ) {
    this.actions = stateManager.createMap<ActionRecord>('consensus.actions');
  }

  deriveActionId(
    kind: ActionKind,
    params: readonly ActionParam[],
    timestamp: Timestamp,
  ): Hash {
    return this.cryptoService.hashRlp([
      kind,
      ...encodeActionParams(params),
      timestamp,
    ]);
  }

  getAction(actionId: Hash): ActionRecord | undefined {
    return this.actions.get(actionId.toLowerCase());
  }

  requireAction(actionId: Hash): ActionRecord {
    const record = this.getAction(actionId);
    if (!record) {
      throw new NotFoundError('UnknownAction', `Action ${actionId} not found`);
    }
    return record;
  }

  isConfirmed(actionId: Hash): boolean {
    return this.getAction(actionId)?.confirmed ?? false;
  }

  getConfirmationCount(actionId: Hash): number {
    return this.getAction(actionId)?.confirmations.length ?? 0;
  }

  hasConfirmed(actionId: Hash, validator: Address): boolean {
    const record = this.getAction(actionId);
    return record?.confirmations.includes(normalizeAddress(validator)) ?? false;
  }

  getStatus(record: ActionRecord): ActionStatus {
    if (record.executedAt !== null) {
      return 'executed';
    }
    if (this.isExpired(record)) {
      return 'expired';
    }
    return record.confirmed ? 'confirmed' : 'open';
  }

  /**
   * 액션 확인
   *
   * 처음 보는 actionId이면 종류 미지정 레코드를 만든다. 이후 같은 ID를
   * 계산한 특권 호출이 도착하면 종류와 파라미터가 채워진다.
   */
  confirm(actionId: Hash, caller: Address): ActionRecord {
    const validator = normalizeAddress(caller);
    const id = actionId.toLowerCase();

    if (!this.validatorService.isValidator(validator)) {
      throw new AuthorizationError('NotAValidator', 'Not a validator');
    }

    const record = this.actions.get(id) ?? this.createRecord(id);
    this.assertOpen(record);

    if (record.confirmations.includes(validator)) {
      throw new AlreadyDoneError('AlreadyConfirmed', 'Already confirmed');
    }

    const confirmations = [...record.confirmations, validator];
    const required = this.validatorService.getRequiredConfirmations();
    const updated: ActionRecord = {
      ...record,
      confirmations,
      confirmed: record.confirmed || confirmations.length >= required,
    };
    this.actions.set(id, updated);

    this.eventLog.emit('ActionConfirmed', {
      actionId: id,
      validator,
      confirmations: confirmations.length,
    });
    return updated;
  }

  /**
   * 액션 제안: 현재 시각으로 ID를 할당하고, 제안자가 밸리데이터면
   * 제안자의 확인을 함께 기록한다.
   */
  propose(
    kind: ActionKind,
    params: readonly ActionParam[],
    proposer: Address,
  ): ActionRecord {
    const record = this.open(kind, params, this.clock.now(), proposer);
    this.assertOpen(record);

    if (
      this.validatorService.isValidator(proposer) &&
      !this.hasConfirmed(record.id, proposer)
    ) {
      return this.confirm(record.id, proposer);
    }
    return record;
  }

  /**
   * (kind, params, timestamp)에 해당하는 레코드 조회 또는 생성
   */
  open(
    kind: ActionKind,
    params: readonly ActionParam[],
    timestamp: Timestamp,
    proposer: Address,
  ): ActionRecord {
    const id = this.deriveActionId(kind, params, timestamp);
    const existing = this.actions.get(id);

    if (existing && existing.kind !== null) {
      return existing;
    }
    return this.bind(existing ?? this.createRecord(id), kind, params, proposer);
  }

  /**
   * 종류 미지정 레코드 (확인이 먼저 들어온 액션)에 내용 채우기
   */
  bind(
    record: ActionRecord,
    kind: ActionKind,
    params: readonly ActionParam[],
    proposer: Address,
  ): ActionRecord {
    if (record.kind !== null) {
      throw new InvariantViolationError(
        'ActionMismatch',
        `Action ${record.id} is already bound to ${record.kind}`,
      );
    }

    const owner = normalizeAddress(proposer);
    const bound: ActionRecord = {
      ...record,
      kind,
      params: encodeActionParams(params),
      proposer: owner,
    };
    this.actions.set(record.id, bound);

    this.eventLog.emit('ActionProposed', {
      actionId: record.id,
      kind,
      proposer: owner,
    });
    return bound;
  }

  /**
   * 정족수가 낮아진 경우 등, 이미 모인 확인으로 confirmed 재평가
   */
  refreshConfirmed(actionId: Hash): boolean {
    const record = this.requireAction(actionId);
    if (record.confirmed) {
      return true;
    }

    if (
      record.confirmations.length >=
      this.validatorService.getRequiredConfirmations()
    ) {
      this.actions.set(record.id, { ...record, confirmed: true });
      return true;
    }
    return false;
  }

  markExecuted(actionId: Hash, executor: Address): ActionRecord {
    const record = this.requireAction(actionId);
    this.assertOpen(record);

    const executed: ActionRecord = { ...record, executedAt: this.clock.now() };
    this.actions.set(record.id, executed);

    this.eventLog.emit('ActionExecuted', {
      actionId: record.id,
      kind: record.kind ?? 'unknown',
      executor: normalizeAddress(executor),
    });
    this.logger.log(`Action executed: ${record.kind} (${record.id})`);
    return executed;
  }

  /**
   * 실행 가능한 (만료되지 않고 아직 실행되지 않은) 액션인지 확인
   */
  assertOpen(record: ActionRecord): void {
    if (record.executedAt !== null) {
      throw new AlreadyDoneError(
        'ActionAlreadyExecuted',
        'Action has already been executed',
      );
    }
    if (this.isExpired(record)) {
      throw new InvariantViolationError('ActionExpired', 'Action has expired');
    }
  }

  isExpired(record: ActionRecord): boolean {
    return this.clock.now() > record.createdAt + ACTION_TTL;
  }

  private createRecord(id: Hash): ActionRecord {
    return {
      id,
      kind: null,
      params: null,
      proposer: null,
      createdAt: this.clock.now(),
      confirmations: [],
      confirmed: false,
      executedAt: null,
    };
  }
}
