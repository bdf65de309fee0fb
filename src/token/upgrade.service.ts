import { Injectable, Logger } from '@nestjs/common';
import { ClockService } from '../common/clock/clock.service';
import { ZERO_ADDRESS } from '../common/constants/token.constants';
import {
  AuthorizationError,
  InvariantViolationError,
} from '../common/errors/ledger.errors';
import { Address, normalizeAddress } from '../common/types/common.types';
import { ActionOutcome } from '../consensus/entities/action-outcome';
import { PrivilegedActionService } from '../consensus/privileged-action.service';
import { EventLogService } from '../events/event-log.service';
import { JournaledCell, JournaledMap } from '../state/journaled-map';
import { StateManager } from '../state/state-manager';
import { ValidatorService } from '../validator/validator.service';
import { ActionReference, LogicVersion } from './entities/token.entity';

/**
 * Upgrade Service
 *
 * 로직 주소와 버전을 기록한다. 실제 코드 교체는 하지 않는다.
 *
 * 업그레이드 권한:
 * - 밸리데이터만 요청 가능
 * - Timelock → Consensus 절차를 거친다
 */
@Injectable()
export class UpgradeService {
  private readonly logger = new Logger(UpgradeService.name);
  private readonly current: JournaledCell<LogicVersion>;
  private readonly history: JournaledMap<LogicVersion>;

  constructor(
    stateManager: StateManager,
    private readonly privilegedActions: PrivilegedActionService,
    private readonly validatorService: ValidatorService,
    private readonly clock: ClockService,
    private readonly eventLog: EventLogService,
  ) {
    this.current = stateManager.createCell<LogicVersion>('upgrade.current');
    this.history = stateManager.createMap<LogicVersion>('upgrade.history');
  }

  initialize(logicAddress: Address): LogicVersion {
    return this.activate(normalizeAddress(logicAddress), 1);
  }

  getCurrent(): LogicVersion {
    const current = this.current.get();
    if (!current) {
      throw new InvariantViolationError(
        'NotInitialized',
        'Token has not been deployed yet',
      );
    }
    return current;
  }

  getHistory(): LogicVersion[] {
    return this.history
      .entries()
      .map(([, version]) => version)
      .sort((a, b) => a.version - b.version);
  }

  /**
   * 업그레이드 요청 (밸리데이터, Timelock → Consensus)
   */
  authorizeUpgrade(
    caller: Address,
    newLogicAddress: Address,
    reference: ActionReference = {},
  ): ActionOutcome<LogicVersion> {
    if (!this.validatorService.isValidator(caller)) {
      throw new AuthorizationError('NotAValidator', 'Not a validator');
    }

    const logicAddress = normalizeAddress(newLogicAddress);
    return this.privilegedActions.execute(
      { kind: 'upgrade', params: [logicAddress], caller, ...reference },
      () => this.upgradeTo(logicAddress),
    );
  }

  private upgradeTo(logicAddress: Address): LogicVersion {
    const current = this.getCurrent();

    if (logicAddress === ZERO_ADDRESS) {
      throw new InvariantViolationError(
        'InvalidImplementation',
        'New implementation cannot be the zero address',
      );
    }
    if (logicAddress === current.logicAddress) {
      throw new InvariantViolationError(
        'InvalidImplementation',
        'New implementation is already active',
      );
    }

    const next = this.activate(logicAddress, current.version + 1);
    this.eventLog.emit('Upgraded', {
      logicAddress,
      version: next.version,
    });
    this.logger.log(`Upgraded to ${logicAddress} (v${next.version})`);
    return next;
  }

  private activate(logicAddress: Address, version: number): LogicVersion {
    const record: LogicVersion = {
      logicAddress,
      version,
      activatedAt: this.clock.now(),
    };
    this.current.set(record);
    this.history.set(String(version), record);
    return record;
  }
}
