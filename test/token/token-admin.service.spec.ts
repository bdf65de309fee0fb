import {
  INITIAL_SUPPLY,
  SECONDS_PER_DAY,
} from '../../src/common/constants/token.constants';
import { TimelockNotElapsedError } from '../../src/common/errors/ledger.errors';
import {
  ALICE,
  BOB,
  createLedgerFixture,
  fund,
  LedgerFixture,
  OWNER,
  TREASURY,
  VALIDATOR_2,
  VALIDATOR_3,
} from '../helpers/ledger-fixture';
import { catchLedgerError, codeOf } from '../helpers/ledger-error';
import { GENESIS_TIME } from '../helpers/manual-clock';

const RAISED_RATES = {
  teamFeeRate: 200,
  stakingFeeRate: 200,
  burnFeeRate: 100,
};

/**
 * owner 한 명으로 V2, V3를 추가하고 정족수를 2로 올린다
 */
function enableQuorum(fixture: LedgerFixture): void {
  fixture.admin.addValidator(OWNER, VALIDATOR_2);
  fixture.admin.addValidator(OWNER, VALIDATOR_3);
  fixture.admin.setRequiredConfirmations(OWNER, 2);
}

/**
 * TokenAdminService 테스트
 *
 * 테스트 범위:
 * - 합의 게이트 (정족수 1 / 2)
 * - 타임락 (pause)
 * - buybackAndBurn (treasury 전용)
 * - 밸리데이터 관리, 미확인 기록, 슬래싱
 */
describe('TokenAdminService', () => {
  let fixture: LedgerFixture;

  beforeEach(async () => {
    fixture = await createLedgerFixture();
  });

  afterEach(async () => {
    await fixture.moduleRef.close();
  });

  describe('합의 게이트', () => {
    it('밸리데이터가 owner 한 명이면 바로 적용해야 함', () => {
      const outcome = fixture.admin.setFeeRates(OWNER, RAISED_RATES);

      expect(outcome).toEqual({
        status: 'applied',
        actionId: fixture.consensus.deriveActionId(
          'setFeeRates',
          [200, 200, 100],
          GENESIS_TIME,
        ),
        result: RAISED_RATES,
      });
      expect(fixture.events.ofType('ActionExecuted')[0].data).toEqual({
        actionId: outcome.actionId,
        kind: 'setFeeRates',
        executor: OWNER,
      });
    });

    it('정족수 미달이면 pending, 확인이 모이면 적용해야 함', () => {
      enableQuorum(fixture);

      const pending = fixture.admin.setFeeRates(OWNER, RAISED_RATES);
      expect(pending).toEqual({
        status: 'pending',
        reason: 'consensus',
        actionId: pending.actionId,
        confirmations: 1,
        requiredConfirmations: 2,
      });
      expect(fixture.fees.getTransactionFeeRate()).toBe(300);

      fixture.token.confirmAction(VALIDATOR_2, pending.actionId);
      const applied = fixture.admin.setFeeRates(OWNER, RAISED_RATES, {
        actionId: pending.actionId,
      });

      expect(applied.status).toBe('applied');
      expect(fixture.fees.getFeeRates()).toEqual(RAISED_RATES);
    });

    it('같은 timestamp로 각자 계산한 ID를 공유할 수 있어야 함', () => {
      enableQuorum(fixture);
      const timestamp = fixture.clock.now();
      const actionId = fixture.token.deriveActionId(
        'setVotingFee',
        [5n],
        timestamp,
      );

      fixture.token.confirmAction(VALIDATOR_2, actionId);
      const outcome = fixture.admin.setVotingFee(OWNER, 5n, { timestamp });

      expect(outcome).toEqual({
        status: 'applied',
        actionId,
        result: undefined,
      });
      expect(fixture.governance.getFees().votingFee).toBe(5n);
    });

    it('확인이 먼저 모인 actionId로 호출하면 내용을 채우고 실행해야 함', () => {
      enableQuorum(fixture);
      const actionId = fixture.token.deriveActionId(
        'setVotingFee',
        [5n],
        fixture.clock.now(),
      );

      fixture.token.confirmAction(VALIDATOR_2, actionId);
      const outcome = fixture.admin.setVotingFee(OWNER, 5n, { actionId });

      expect(outcome).toEqual({
        status: 'applied',
        actionId,
        result: undefined,
      });
      expect(fixture.consensus.requireAction(actionId)).toMatchObject({
        kind: 'setVotingFee',
        params: ['5'],
        proposer: OWNER,
        confirmations: [VALIDATOR_2, OWNER],
      });
      expect(fixture.governance.getFees().votingFee).toBe(5n);
    });

    it('확인만 모인 actionId와 timestamp가 맞지 않으면 ActionMismatch', () => {
      enableQuorum(fixture);
      const timestamp = fixture.clock.now();
      const actionId = fixture.token.deriveActionId(
        'setVotingFee',
        [5n],
        timestamp,
      );
      fixture.token.confirmAction(VALIDATOR_2, actionId);

      expect(
        codeOf(() =>
          fixture.admin.setVotingFee(OWNER, 5n, {
            actionId,
            timestamp: timestamp + 1,
          }),
        ),
      ).toBe('ActionMismatch');
      expect(fixture.consensus.requireAction(actionId).kind).toBeNull();
    });

    it('actionId의 내용이 다르면 ActionMismatch', () => {
      enableQuorum(fixture);
      const pending = fixture.admin.setFeeRates(OWNER, RAISED_RATES);

      expect(
        codeOf(() =>
          fixture.admin.setFeeRates(
            OWNER,
            { teamFeeRate: 0, stakingFeeRate: 0, burnFeeRate: 0 },
            { actionId: pending.actionId },
          ),
        ),
      ).toBe('ActionMismatch');
    });

    it('실행된 액션은 다시 실행할 수 없어야 함', () => {
      const outcome = fixture.admin.setFeeRates(OWNER, RAISED_RATES);

      const error = catchLedgerError(() =>
        fixture.admin.setFeeRates(OWNER, RAISED_RATES, {
          actionId: outcome.actionId,
        }),
      );
      expect(error.category).toBe('AlreadyDone');
      expect(error.code).toBe('ActionAlreadyExecuted');
    });

    it('적용이 실패하면 확인과 실행 표시도 되돌려야 함', () => {
      expect(
        codeOf(() =>
          fixture.admin.setFeeRates(OWNER, {
            teamFeeRate: 300,
            stakingFeeRate: 300,
            burnFeeRate: 0,
          }),
        ),
      ).toBe('FeeTooHigh');

      const actionId = fixture.consensus.deriveActionId(
        'setFeeRates',
        [300, 300, 0],
        GENESIS_TIME,
      );
      expect(fixture.consensus.getAction(actionId)).toBeUndefined();
      expect(fixture.events.ofType('ActionConfirmed')).toEqual([]);
    });
  });

  describe('pause / unpause', () => {
    it('첫 호출은 타임락만 걸고 상태를 바꾸지 않아야 함', () => {
      const outcome = fixture.admin.pause(OWNER);

      expect(outcome).toEqual({
        status: 'pending',
        reason: 'timelock',
        actionId: fixture.consensus.deriveActionId('pause', [], GENESIS_TIME),
        executableAt: GENESIS_TIME + SECONDS_PER_DAY,
      });
      expect(fixture.ledger.isPaused()).toBe(false);
      expect(
        fixture.consensus.requireAction(outcome.actionId).confirmations,
      ).toEqual([]);
    });

    it('타임락 만료 전 재호출은 TimelockNotElapsed', () => {
      const { actionId } = fixture.admin.pause(OWNER);
      fixture.clock.advance(SECONDS_PER_DAY - 1);

      const error = catchLedgerError(() =>
        fixture.admin.pause(OWNER, { actionId }),
      );

      expect(error).toBeInstanceOf(TimelockNotElapsedError);
      expect(error.category).toBe('TimelockNotElapsed');
      expect(fixture.ledger.isPaused()).toBe(false);
    });

    it('만료 후 재호출하면 정지하고 모든 이동을 막아야 함', () => {
      fund(fixture, ALICE, 100n);
      const { actionId } = fixture.admin.pause(OWNER);
      fixture.clock.advance(SECONDS_PER_DAY);

      const outcome = fixture.admin.pause(OWNER, { actionId });

      expect(outcome.status).toBe('applied');
      expect(fixture.ledger.isPaused()).toBe(true);
      expect(codeOf(() => fixture.token.transfer(ALICE, BOB, 1n))).toBe(
        'TokenPaused',
      );
      expect(codeOf(() => fixture.admin.pause(OWNER))).toBe('AlreadyPaused');
    });

    it('정족수가 2면 타임락 후 합의까지 거쳐야 함', () => {
      enableQuorum(fixture);
      const { actionId } = fixture.admin.pause(OWNER);
      fixture.clock.advance(SECONDS_PER_DAY);

      expect(fixture.admin.pause(OWNER, { actionId })).toEqual({
        status: 'pending',
        reason: 'consensus',
        actionId,
        confirmations: 1,
        requiredConfirmations: 2,
      });

      fixture.token.confirmAction(VALIDATOR_3, actionId);
      expect(fixture.admin.pause(OWNER, { actionId }).status).toBe('applied');
      expect(fixture.ledger.isPaused()).toBe(true);
    });

    it('unpause는 타임락 없이 적용해야 함', () => {
      const { actionId } = fixture.admin.pause(OWNER);
      fixture.clock.advance(SECONDS_PER_DAY);
      fixture.admin.pause(OWNER, { actionId });

      expect(fixture.admin.unpause(OWNER).status).toBe('applied');
      expect(fixture.ledger.isPaused()).toBe(false);
      expect(codeOf(() => fixture.admin.unpause(OWNER))).toBe('NotPaused');
    });

    it('owner가 아니면 NotOwner', () => {
      expect(codeOf(() => fixture.admin.pause(ALICE))).toBe('NotOwner');
    });
  });

  describe('buybackAndBurn', () => {
    it('밸리데이터 확인 후 트레저리 잔액을 소각해야 함', () => {
      const pending = fixture.admin.buybackAndBurn(TREASURY, 1000n);
      expect(pending).toEqual({
        status: 'pending',
        reason: 'consensus',
        actionId: pending.actionId,
        confirmations: 0,
        requiredConfirmations: 1,
      });

      fixture.token.confirmAction(OWNER, pending.actionId);
      const outcome = fixture.admin.buybackAndBurn(TREASURY, 1000n, {
        actionId: pending.actionId,
      });

      expect(outcome).toEqual({
        status: 'applied',
        actionId: pending.actionId,
        result: INITIAL_SUPPLY - 1000n,
      });
      expect(fixture.token.balanceOf(TREASURY)).toBe(
        INITIAL_SUPPLY - INITIAL_SUPPLY / 10n - 1000n,
      );
      expect(fixture.events.ofType('BuybackAndBurn')[0].data).toEqual({
        account: TREASURY,
        amount: 1000n,
      });
    });

    it('treasury가 아니거나 금액이 0이면 실패해야 함', () => {
      expect(codeOf(() => fixture.admin.buybackAndBurn(OWNER, 1000n))).toBe(
        'NotTreasury',
      );
      expect(codeOf(() => fixture.admin.buybackAndBurn(TREASURY, 0n))).toBe(
        'ZeroAmount',
      );
    });
  });

  describe('밸리데이터 관리', () => {
    it('추가와 제거', () => {
      fixture.admin.addValidator(OWNER, VALIDATOR_2);
      expect(fixture.validators.getValidators()).toEqual([OWNER, VALIDATOR_2]);

      fixture.admin.removeValidator(OWNER, VALIDATOR_2);
      expect(fixture.validators.getValidators()).toEqual([OWNER]);
    });

    it('미확인 기록 후 슬래싱', () => {
      fixture.admin.addValidator(OWNER, VALIDATOR_2);
      fixture.admin.setMaxMissedConfirmations(OWNER, 1);
      const proposal = fixture.token.proposeAction(OWNER, 'unpause', []);

      expect(
        fixture.token.recordMissedConfirmations(OWNER, proposal.id),
      ).toEqual([VALIDATOR_2]);
      expect(
        codeOf(() =>
          fixture.token.recordMissedConfirmations(ALICE, proposal.id),
        ),
      ).toBe('NotOwner');

      expect(fixture.admin.slashValidator(OWNER, VALIDATOR_2).status).toBe(
        'applied',
      );
      expect(fixture.validators.getValidators()).toEqual([OWNER]);
    });

    it('정족수를 밸리데이터 수보다 크게 할 수 없어야 함', () => {
      expect(
        codeOf(() => fixture.admin.setRequiredConfirmations(OWNER, 2)),
      ).toBe('InvalidRequiredConfirmations');
    });
  });
});
