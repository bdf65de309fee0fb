import { Injectable, Logger } from '@nestjs/common';
import { ClockService } from '../common/clock/clock.service';
import { TIMELOCK_PERIOD } from '../common/constants/token.constants';
import { InvariantViolationError } from '../common/errors/ledger.errors';
import { normalizeAddress } from '../common/types/common.types';
import { TimelockService } from '../timelock/timelock.service';
import { ValidatorService } from '../validator/validator.service';
import { ConsensusService } from './consensus.service';
import { encodeActionParams, isTimelocked } from './entities/action-kind';
import { ActionRecord } from './entities/action.entity';
import {
  ActionOutcome,
  PrivilegedRequest,
} from './entities/action-outcome';

/**
 * PrivilegedActionService
 *
 * 모든 특권 변경 함수가 따르는 공통 절차:
 *
 * 1. 액션 레코드 결정 (actionId / timestamp / 새 제안)
 * 2. 타임락 대상 (pause, upgrade)이면 TimelockGate 먼저
 *    - 첫 호출은 만료 시각만 기록하고 pending
 * 3. 호출자가 아직 확인하지 않은 밸리데이터면 호출자의 확인 기록
 * 4. 정족수 미달이면 pending (보호 대상 상태 변경 없음)
 * 5. 정족수 충족이면 실행 표시 후 apply
 *
 * apply가 실패하면 OperationRunner가 확인/실행 표시까지 모두 되돌린다.
 * 역할 검사 (owner, treasury 등)는 호출하는 쪽에서 먼저 한다.
 */
@Injectable()
export class PrivilegedActionService {
  private readonly logger = new Logger(PrivilegedActionService.name);

  constructor(
    private readonly consensusService: ConsensusService,
    private readonly timelockService: TimelockService,
    private readonly validatorService: ValidatorService,
    private readonly clock: ClockService,
  ) {}

  execute<T>(request: PrivilegedRequest, apply: () => T): ActionOutcome<T> {
    const caller = normalizeAddress(request.caller);
    const record = this.resolve(request);
    const actionId = record.id;

    if (isTimelocked(request.kind)) {
      const timelock = this.timelockService.ensureElapsed(
        actionId,
        TIMELOCK_PERIOD,
      );
      if (timelock.status === 'pending') {
        return {
          status: 'pending',
          reason: 'timelock',
          actionId,
          executableAt: timelock.expiry,
        };
      }
    }

    if (
      this.validatorService.isValidator(caller) &&
      !this.consensusService.hasConfirmed(actionId, caller)
    ) {
      this.consensusService.confirm(actionId, caller);
    }

    if (!this.consensusService.refreshConfirmed(actionId)) {
      const confirmations =
        this.consensusService.getConfirmationCount(actionId);
      const requiredConfirmations =
        this.validatorService.getRequiredConfirmations();

      this.logger.debug(
        `${request.kind} pending consensus (${confirmations}/${requiredConfirmations}): ${actionId}`,
      );
      return {
        status: 'pending',
        reason: 'consensus',
        actionId,
        confirmations,
        requiredConfirmations,
      };
    }

    this.consensusService.markExecuted(actionId, caller);
    const result = apply();

    this.logger.log(`${request.kind} applied (${actionId})`);
    return { status: 'applied', actionId, result };
  }

  private resolve(request: PrivilegedRequest): ActionRecord {
    if (request.actionId !== undefined) {
      const record = this.consensusService.requireAction(request.actionId);
      this.consensusService.assertOpen(record);

      if (record.kind === null) {
        return this.bindImplicit(record, request);
      }

      const params = encodeActionParams(request.params);
      if (
        record.kind !== request.kind ||
        record.params === null ||
        record.params.length !== params.length ||
        record.params.some((param, index) => param !== params[index])
      ) {
        throw new InvariantViolationError(
          'ActionMismatch',
          `Action ${record.id} does not match ${request.kind}`,
        );
      }
      return record;
    }

    const record = this.consensusService.open(
      request.kind,
      request.params,
      request.timestamp ?? this.clock.now(),
      request.caller,
    );
    this.consensusService.assertOpen(record);
    return record;
  }

  /**
   * 확인만 모인 actionId를 이 호출의 내용으로 확정
   *
   * timestamp가 함께 오면 (kind, params, timestamp)의 ID와 같아야 한다.
   */
  private bindImplicit(
    record: ActionRecord,
    request: PrivilegedRequest,
  ): ActionRecord {
    if (
      request.timestamp !== undefined &&
      this.consensusService.deriveActionId(
        request.kind,
        request.params,
        request.timestamp,
      ) !== record.id
    ) {
      throw new InvariantViolationError(
        'ActionMismatch',
        `Action ${record.id} was not derived from ${request.kind}`,
      );
    }

    return this.consensusService.bind(
      record,
      request.kind,
      request.params,
      request.caller,
    );
  }
}
