import { Injectable, Logger } from '@nestjs/common';
import { ClockService } from '../common/clock/clock.service';
import {
  DEFAULT_MAX_MISSED_CONFIRMATIONS,
  DEFAULT_REQUIRED_CONFIRMATIONS,
  ZERO_ADDRESS,
} from '../common/constants/token.constants';
import {
  AlreadyDoneError,
  InvariantViolationError,
  NotFoundError,
} from '../common/errors/ledger.errors';
import { Address, Hash, normalizeAddress } from '../common/types/common.types';
import { EventLogService } from '../events/event-log.service';
import { JournaledCell, JournaledMap } from '../state/journaled-map';
import { StateManager } from '../state/state-manager';
import {
  ValidatorRecord,
  ValidatorSettings,
  ValidatorStats,
} from './entities/validator.entity';

/**
 * Validator Service
 *
 * 역할:
 * - 밸리데이터 집합 관리 (추가, 제거, 슬래싱)
 * - 정족수 (requiredConfirmations) 및 슬래싱 기준 (maxMissedConfirmations) 관리
 * - 미확인 횟수 기록
 *
 * 저장 구조:
 * - slots: 위치 → 주소 (삽입 순서 목록)
 * - records: 주소 → 레코드 (위치 포함, O(1) 조회)
 * - 제거 시 마지막 원소를 빈 자리로 옮기는 swap-and-pop
 *
 * 불변식:
 * - 0 주소는 밸리데이터가 될 수 없음
 * - 중복 없음
 * - 1 <= requiredConfirmations <= validatorCount
 *
 * 권한 검사 (합의 게이트, owner)는 호출하는 쪽에서 처리한다.
 */
@Injectable()
export class ValidatorService {
  private readonly logger = new Logger(ValidatorService.name);
  private readonly records: JournaledMap<ValidatorRecord>;
  private readonly slots: JournaledMap<Address>;
  private readonly size: JournaledCell<number>;
  private readonly settings: JournaledCell<ValidatorSettings>;

  constructor(
    stateManager: StateManager,
    private readonly clock: ClockService,
    private readonly eventLog: EventLogService,
  ) {
    this.records = stateManager.createMap<ValidatorRecord>(
      'validator.records',
    );
    this.slots = stateManager.createMap<Address>('validator.slots');
    this.size = stateManager.createCell<number>('validator.size');
    this.settings = stateManager.createCell<ValidatorSettings>(
      'validator.settings',
    );
  }

  /**
   * 제네시스: genesisValidator 한 명, 정족수 1, 슬래싱 기준 10
   */
  initialize(genesisValidator: Address): void {
    if (this.count() > 0) {
      throw new AlreadyDoneError(
        'AlreadyInitialized',
        'Validator set is already initialized',
      );
    }

    this.settings.set({
      requiredConfirmations: DEFAULT_REQUIRED_CONFIRMATIONS,
      maxMissedConfirmations: DEFAULT_MAX_MISSED_CONFIRMATIONS,
    });
    this.add(genesisValidator);
  }

  isValidator(address: Address): boolean {
    return this.records.has(normalizeAddress(address));
  }

  count(): number {
    return this.size.getOr(0);
  }

  /**
   * 모든 밸리데이터 주소 (목록 순서)
   */
  getValidators(): Address[] {
    const validators: Address[] = [];
    for (let position = 0; position < this.count(); position++) {
      const address = this.slots.get(String(position));
      if (address !== undefined) {
        validators.push(address);
      }
    }
    return validators;
  }

  getValidator(address: Address): ValidatorRecord {
    const record = this.records.get(normalizeAddress(address));
    if (!record) {
      throw new NotFoundError(
        'UnknownValidator',
        `Validator ${address} does not exist`,
      );
    }
    return record;
  }

  getRecords(): ValidatorRecord[] {
    return this.getValidators().map((address) => this.getValidator(address));
  }

  getMissedConfirmations(address: Address): number {
    const record = this.records.get(normalizeAddress(address));
    return record?.missedConfirmations ?? 0;
  }

  getRequiredConfirmations(): number {
    return this.getSettings().requiredConfirmations;
  }

  getMaxMissedConfirmations(): number {
    return this.getSettings().maxMissedConfirmations;
  }

  getStats(): ValidatorStats {
    return {
      validatorCount: this.count(),
      ...this.getSettings(),
    };
  }

  /**
   * 밸리데이터 추가 (목록 끝에 삽입)
   */
  add(address: Address): ValidatorRecord {
    const validator = normalizeAddress(address);

    if (validator === ZERO_ADDRESS) {
      throw new InvariantViolationError(
        'ZeroAddress',
        'Invalid validator address',
      );
    }
    if (this.records.has(validator)) {
      throw new InvariantViolationError(
        'DuplicateValidator',
        'Validator already exists',
      );
    }

    const position = this.count();
    const record: ValidatorRecord = {
      address: validator,
      position,
      missedConfirmations: 0,
      addedAt: this.clock.now(),
    };

    this.records.set(validator, record);
    this.slots.set(String(position), validator);
    this.size.set(position + 1);

    this.eventLog.emit('ValidatorAdded', { validator });
    this.logger.log(`Validator added: ${validator} (count: ${position + 1})`);
    return record;
  }

  /**
   * 밸리데이터 제거
   *
   * 제거 후에도 validatorCount >= requiredConfirmations 이어야 한다.
   */
  remove(address: Address): void {
    const record = this.assertRemovable(address);
    this.detach(record);

    this.eventLog.emit('ValidatorRemoved', { validator: record.address });
    this.logger.log(`Validator removed: ${record.address}`);
  }

  /**
   * 밸리데이터 슬래싱
   *
   * 전제: missedConfirmations >= maxMissedConfirmations
   */
  slash(address: Address): void {
    const record = this.assertRemovable(address);

    if (record.missedConfirmations < this.getMaxMissedConfirmations()) {
      throw new InvariantViolationError(
        'BelowSlashThreshold',
        'Validator has not missed enough confirmations',
      );
    }

    this.detach(record);

    this.eventLog.emit('ValidatorSlashed', {
      validator: record.address,
      missedConfirmations: record.missedConfirmations,
    });
    this.logger.warn(
      `Validator slashed: ${record.address} (missed: ${record.missedConfirmations})`,
    );
  }

  /**
   * 액션을 확인하지 않은 모든 밸리데이터의 미확인 횟수 +1
   *
   * @param hasConfirmed - 해당 밸리데이터가 액션을 확인했는지
   * @returns 횟수가 증가한 밸리데이터 목록
   */
  recordMissed(
    actionId: Hash,
    hasConfirmed: (validator: Address) => boolean,
  ): Address[] {
    const missed: Address[] = [];

    for (const record of this.getRecords()) {
      if (hasConfirmed(record.address)) {
        continue;
      }
      this.records.set(record.address, {
        ...record,
        missedConfirmations: record.missedConfirmations + 1,
      });
      missed.push(record.address);
    }

    this.eventLog.emit('MissedConfirmationsRecorded', {
      actionId,
      validators: missed,
    });
    return missed;
  }

  setRequiredConfirmations(required: number): void {
    if (!Number.isInteger(required) || required <= 0) {
      throw new InvariantViolationError(
        'InvalidRequiredConfirmations',
        'Required confirmations must be greater than 0',
      );
    }
    if (required > this.count()) {
      throw new InvariantViolationError(
        'InvalidRequiredConfirmations',
        'Required confirmations cannot exceed validator count',
      );
    }

    this.settings.set({
      ...this.getSettings(),
      requiredConfirmations: required,
    });
    this.eventLog.emit('RequiredConfirmationsUpdated', {
      requiredConfirmations: required,
    });
  }

  setMaxMissedConfirmations(maxMissed: number): void {
    if (!Number.isInteger(maxMissed) || maxMissed <= 0) {
      throw new InvariantViolationError(
        'InvalidMaxMissedConfirmations',
        'Max missed confirmations must be greater than 0',
      );
    }

    this.settings.set({
      ...this.getSettings(),
      maxMissedConfirmations: maxMissed,
    });
    this.eventLog.emit('MaxMissedConfirmationsUpdated', {
      maxMissedConfirmations: maxMissed,
    });
  }

  private getSettings(): ValidatorSettings {
    return this.settings.getOr({
      requiredConfirmations: DEFAULT_REQUIRED_CONFIRMATIONS,
      maxMissedConfirmations: DEFAULT_MAX_MISSED_CONFIRMATIONS,
    });
  }

  private assertRemovable(address: Address): ValidatorRecord {
    const record = this.getValidator(address);

    if (this.count() <= this.getRequiredConfirmations()) {
      throw new InvariantViolationError(
        'BelowMinimum',
        'Cannot remove validator below required confirmations',
      );
    }
    return record;
  }

  /**
   * swap-and-pop: 마지막 밸리데이터를 빈 위치로 이동
   */
  private detach(record: ValidatorRecord): void {
    const lastPosition = this.count() - 1;

    if (record.position !== lastPosition) {
      const lastAddress = this.slots.get(String(lastPosition));
      const lastRecord =
        lastAddress !== undefined ? this.records.get(lastAddress) : undefined;
      if (!lastAddress || !lastRecord) {
        throw new Error(`Validator slot ${lastPosition} is empty`);
      }
      this.slots.set(String(record.position), lastAddress);
      this.records.set(lastAddress, {
        ...lastRecord,
        position: record.position,
      });
    }

    this.slots.delete(String(lastPosition));
    this.records.delete(record.address);
    this.size.set(lastPosition);
  }
}
