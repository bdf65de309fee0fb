import { ZERO_ADDRESS } from '../../src/common/constants/token.constants';
import {
  ALICE,
  createLedgerFixture,
  LedgerFixture,
  OWNER,
  VALIDATOR_2,
  VALIDATOR_3,
} from '../helpers/ledger-fixture';
import { catchLedgerError, codeOf } from '../helpers/ledger-error';

const ACTION_ID = '0x' + 'f'.repeat(64);

describe('ValidatorService', () => {
  let fixture: LedgerFixture;

  beforeEach(async () => {
    fixture = await createLedgerFixture();
  });

  afterEach(async () => {
    await fixture.moduleRef.close();
  });

  it('제네시스 후 owner 한 명, 정족수 1', () => {
    expect(fixture.validators.getValidators()).toEqual([OWNER]);
    expect(fixture.validators.getStats()).toEqual({
      validatorCount: 1,
      requiredConfirmations: 1,
      maxMissedConfirmations: 10,
    });
  });

  it('두 번 초기화할 수 없어야 함', () => {
    expect(codeOf(() => fixture.validators.initialize(ALICE))).toBe(
      'AlreadyInitialized',
    );
  });

  describe('add', () => {
    it('목록 끝에 추가해야 함', () => {
      fixture.validators.add(VALIDATOR_2);
      const record = fixture.validators.add(VALIDATOR_3);

      expect(record.position).toBe(2);
      expect(fixture.validators.getValidators()).toEqual([
        OWNER,
        VALIDATOR_2,
        VALIDATOR_3,
      ]);
    });

    it('중복과 0 주소는 거부해야 함', () => {
      const duplicate = catchLedgerError(() => fixture.validators.add(OWNER));
      expect(duplicate.category).toBe('InvariantViolation');
      expect(duplicate.code).toBe('DuplicateValidator');

      expect(codeOf(() => fixture.validators.add(ZERO_ADDRESS))).toBe(
        'ZeroAddress',
      );
    });
  });

  describe('remove', () => {
    beforeEach(() => {
      fixture.validators.add(VALIDATOR_2);
      fixture.validators.add(VALIDATOR_3);
    });

    it('마지막 원소를 빈 자리로 옮겨야 함', () => {
      fixture.validators.remove(VALIDATOR_2);

      expect(fixture.validators.getValidators()).toEqual([OWNER, VALIDATOR_3]);
      expect(fixture.validators.getValidator(VALIDATOR_3).position).toBe(1);
      expect(fixture.validators.isValidator(VALIDATOR_2)).toBe(false);
      expect(fixture.validators.count()).toBe(2);
    });

    it('마지막 원소 제거도 목록을 유지해야 함', () => {
      fixture.validators.remove(VALIDATOR_3);

      expect(fixture.validators.getValidators()).toEqual([OWNER, VALIDATOR_2]);
    });

    it('정족수 이하로 줄일 수 없어야 함', () => {
      fixture.validators.setRequiredConfirmations(3);

      expect(codeOf(() => fixture.validators.remove(VALIDATOR_2))).toBe(
        'BelowMinimum',
      );
      expect(fixture.validators.count()).toBe(3);
    });

    it('없는 밸리데이터는 UnknownValidator (NotFound)', () => {
      const removeError = catchLedgerError(() =>
        fixture.validators.remove(ALICE),
      );
      const readError = catchLedgerError(() =>
        fixture.validators.getValidator(ALICE),
      );

      expect(removeError.code).toBe('UnknownValidator');
      expect(removeError.category).toBe('NotFound');
      expect(readError.code).toBe('UnknownValidator');
      expect(readError.category).toBe('NotFound');
    });
  });

  describe('정족수 설정', () => {
    it('0이나 밸리데이터 수 초과는 거부해야 함', () => {
      fixture.validators.add(VALIDATOR_2);

      expect(codeOf(() => fixture.validators.setRequiredConfirmations(0))).toBe(
        'InvalidRequiredConfirmations',
      );
      expect(codeOf(() => fixture.validators.setRequiredConfirmations(3))).toBe(
        'InvalidRequiredConfirmations',
      );

      fixture.validators.setRequiredConfirmations(2);
      expect(fixture.validators.getRequiredConfirmations()).toBe(2);
    });

    it('maxMissedConfirmations는 양의 정수여야 함', () => {
      expect(
        codeOf(() => fixture.validators.setMaxMissedConfirmations(0)),
      ).toBe('InvalidMaxMissedConfirmations');

      fixture.validators.setMaxMissedConfirmations(3);
      expect(fixture.validators.getMaxMissedConfirmations()).toBe(3);
    });
  });

  describe('미확인 기록과 슬래싱', () => {
    beforeEach(() => {
      fixture.validators.add(VALIDATOR_2);
      fixture.validators.add(VALIDATOR_3);
      fixture.validators.setMaxMissedConfirmations(2);
    });

    it('확인하지 않은 밸리데이터만 증가해야 함', () => {
      const missed = fixture.validators.recordMissed(
        ACTION_ID,
        (validator) => validator === OWNER,
      );

      expect(missed).toEqual([VALIDATOR_2, VALIDATOR_3]);
      expect(fixture.validators.getMissedConfirmations(OWNER)).toBe(0);
      expect(fixture.validators.getMissedConfirmations(VALIDATOR_2)).toBe(1);
    });

    it('기준 미만이면 슬래싱할 수 없어야 함', () => {
      fixture.validators.recordMissed(ACTION_ID, () => false);

      expect(codeOf(() => fixture.validators.slash(VALIDATOR_2))).toBe(
        'BelowSlashThreshold',
      );
    });

    it('기준에 도달하면 슬래싱으로 제거해야 함', () => {
      fixture.validators.recordMissed(ACTION_ID, () => false);
      fixture.validators.recordMissed(ACTION_ID, () => false);

      fixture.validators.slash(VALIDATOR_2);

      expect(fixture.validators.getValidators()).toEqual([OWNER, VALIDATOR_3]);
      expect(fixture.events.ofType('ValidatorSlashed')[0].data).toEqual({
        validator: VALIDATOR_2,
        missedConfirmations: 2,
      });
    });
  });
});
