import { ACTION_TTL } from '../../src/common/constants/token.constants';
import {
  ALICE,
  createLedgerFixture,
  LedgerFixture,
  OWNER,
  VALIDATOR_2,
  VALIDATOR_3,
} from '../helpers/ledger-fixture';
import { catchLedgerError, codeOf } from '../helpers/ledger-error';
import { GENESIS_TIME } from '../helpers/manual-clock';

const UNKNOWN_ID = '0x' + 'e'.repeat(64);

/**
 * ConsensusService 테스트
 *
 * 테스트 범위:
 * - 액션 ID 파생
 * - 확인 규칙 (밸리데이터 전용, 중복 불가, 정족수)
 * - 만료 / 실행 후 최종
 */
describe('ConsensusService', () => {
  let fixture: LedgerFixture;

  beforeEach(async () => {
    fixture = await createLedgerFixture();
    fixture.validators.add(VALIDATOR_2);
    fixture.validators.add(VALIDATOR_3);
    fixture.validators.setRequiredConfirmations(2);
  });

  afterEach(async () => {
    await fixture.moduleRef.close();
  });

  describe('deriveActionId', () => {
    it('같은 입력이면 같은 ID, 주소 대소문자는 무시해야 함', () => {
      const lower = fixture.consensus.deriveActionId(
        'addValidator',
        [ALICE],
        GENESIS_TIME,
      );
      const upper = fixture.consensus.deriveActionId(
        'addValidator',
        ['0x' + 'A'.repeat(40)],
        GENESIS_TIME,
      );

      expect(lower).toMatch(/^0x[0-9a-f]{64}$/);
      expect(upper).toBe(lower);
    });

    it('timestamp나 종류가 다르면 다른 ID', () => {
      const base = fixture.consensus.deriveActionId('pause', [], GENESIS_TIME);

      expect(
        fixture.consensus.deriveActionId('pause', [], GENESIS_TIME + 1),
      ).not.toBe(base);
      expect(
        fixture.consensus.deriveActionId('unpause', [], GENESIS_TIME),
      ).not.toBe(base);
    });
  });

  describe('confirm', () => {
    it('밸리데이터가 아니면 NotAValidator', () => {
      const error = catchLedgerError(() =>
        fixture.consensus.confirm(UNKNOWN_ID, ALICE),
      );

      expect(error.category).toBe('AuthorizationError');
      expect(error.code).toBe('NotAValidator');
    });

    it('처음 보는 ID는 종류 미지정 레코드를 만들어야 함', () => {
      const record = fixture.consensus.confirm(UNKNOWN_ID, VALIDATOR_2);

      expect(record).toEqual({
        id: UNKNOWN_ID,
        kind: null,
        params: null,
        proposer: null,
        createdAt: GENESIS_TIME,
        confirmations: [VALIDATOR_2],
        confirmed: false,
        executedAt: null,
      });
    });

    it('같은 밸리데이터는 두 번 확인할 수 없어야 함', () => {
      fixture.consensus.confirm(UNKNOWN_ID, VALIDATOR_2);

      const error = catchLedgerError(() =>
        fixture.consensus.confirm(UNKNOWN_ID, VALIDATOR_2),
      );
      expect(error.category).toBe('AlreadyDone');
      expect(error.code).toBe('AlreadyConfirmed');
    });

    it('정족수에 도달하면 confirmed', () => {
      fixture.consensus.confirm(UNKNOWN_ID, OWNER);
      expect(fixture.consensus.isConfirmed(UNKNOWN_ID)).toBe(false);

      fixture.consensus.confirm(UNKNOWN_ID, VALIDATOR_3);
      expect(fixture.consensus.isConfirmed(UNKNOWN_ID)).toBe(true);
      expect(fixture.consensus.getConfirmationCount(UNKNOWN_ID)).toBe(2);
      expect(
        fixture.events.ofType('ActionConfirmed').map((event) => event.data),
      ).toEqual([
        { actionId: UNKNOWN_ID, validator: OWNER, confirmations: 1 },
        { actionId: UNKNOWN_ID, validator: VALIDATOR_3, confirmations: 2 },
      ]);
    });

    it('정족수가 낮아지면 refreshConfirmed가 반영해야 함', () => {
      fixture.consensus.confirm(UNKNOWN_ID, OWNER);
      expect(fixture.consensus.refreshConfirmed(UNKNOWN_ID)).toBe(false);

      fixture.validators.setRequiredConfirmations(1);

      expect(fixture.consensus.refreshConfirmed(UNKNOWN_ID)).toBe(true);
      expect(fixture.consensus.isConfirmed(UNKNOWN_ID)).toBe(true);
    });

    it('TTL이 지나면 ActionExpired', () => {
      fixture.consensus.confirm(UNKNOWN_ID, OWNER);
      fixture.clock.advance(ACTION_TTL + 1);

      expect(
        codeOf(() => fixture.consensus.confirm(UNKNOWN_ID, VALIDATOR_2)),
      ).toBe(
        'ActionExpired',
      );
      expect(
        fixture.consensus.getStatus(
          fixture.consensus.requireAction(UNKNOWN_ID),
        ),
      ).toBe('expired');
    });

    it('실행된 액션은 더 확인할 수 없어야 함', () => {
      fixture.consensus.confirm(UNKNOWN_ID, OWNER);
      fixture.consensus.confirm(UNKNOWN_ID, VALIDATOR_2);
      fixture.consensus.markExecuted(UNKNOWN_ID, OWNER);

      expect(
        codeOf(() => fixture.consensus.confirm(UNKNOWN_ID, VALIDATOR_3)),
      ).toBe(
        'ActionAlreadyExecuted',
      );
      expect(fixture.events.ofType('ActionExecuted')[0].data).toEqual({
        actionId: UNKNOWN_ID,
        kind: 'unknown',
        executor: OWNER,
      });
    });
  });

  describe('propose / open', () => {
    it('밸리데이터의 제안은 확인 한 표를 포함해야 함', () => {
      const record = fixture.consensus.propose('pause', [], OWNER);

      expect(record.kind).toBe('pause');
      expect(record.proposer).toBe(OWNER);
      expect(record.confirmations).toEqual([OWNER]);
      expect(fixture.consensus.getStatus(record)).toBe('open');
    });

    it('밸리데이터가 아닌 제안자는 확인 없이 레코드만', () => {
      const record = fixture.consensus.propose('pause', [], ALICE);

      expect(record.confirmations).toEqual([]);
    });

    it('확인이 먼저 들어온 레코드에 종류와 파라미터를 채워야 함', () => {
      const id = fixture.consensus.deriveActionId(
        'setRequiredConfirmations',
        [3],
        GENESIS_TIME,
      );
      fixture.consensus.confirm(id, VALIDATOR_2);

      const record = fixture.consensus.open(
        'setRequiredConfirmations',
        [3],
        GENESIS_TIME,
        OWNER,
      );

      expect(record.kind).toBe('setRequiredConfirmations');
      expect(record.params).toEqual(['3']);
      expect(record.confirmations).toEqual([VALIDATOR_2]);
    });

    it('이미 내용이 채워진 레코드는 다시 bind할 수 없어야 함', () => {
      const record = fixture.consensus.propose(
        'setRequiredConfirmations',
        [1],
        OWNER,
      );

      expect(
        codeOf(() =>
          fixture.consensus.bind(record, 'setVotingFee', [5n], OWNER),
        ),
      ).toBe('ActionMismatch');
      expect(fixture.consensus.requireAction(record.id).kind).toBe(
        'setRequiredConfirmations',
      );
    });

    it('없는 ID 조회는 UnknownAction', () => {
      const error = catchLedgerError(() =>
        fixture.consensus.requireAction(UNKNOWN_ID),
      );

      expect(error.category).toBe('NotFound');
      expect(error.code).toBe('UnknownAction');
    });
  });
});
