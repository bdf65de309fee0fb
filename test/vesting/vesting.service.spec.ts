import {
  INITIAL_SUPPLY,
  SECONDS_PER_DAY,
} from '../../src/common/constants/token.constants';
import { ReentrancyError } from '../../src/common/errors/ledger.errors';
import {
  ALICE,
  CAROL,
  createLedgerFixture,
  LedgerFixture,
  TEAM,
} from '../helpers/ledger-fixture';
import { catchLedgerError, codeOf } from '../helpers/ledger-error';
import { GENESIS_TIME } from '../helpers/manual-clock';

const DURATION = 730 * SECONDS_PER_DAY;
const CLIFF = 180 * SECONDS_PER_DAY;

describe('VestingService', () => {
  let fixture: LedgerFixture;

  beforeEach(async () => {
    fixture = await createLedgerFixture();
  });

  afterEach(async () => {
    await fixture.moduleRef.close();
  });

  it('제네시스에서 팀 지갑에 발행량의 10%를 베스팅해야 함', () => {
    expect(fixture.vesting.getVestingSchedule(TEAM)).toEqual({
      totalAmount: INITIAL_SUPPLY / 10n,
      releasedAmount: 0n,
      startTime: GENESIS_TIME,
      duration: DURATION,
      cliffDuration: CLIFF,
    });
    expect(fixture.token.balanceOf(TEAM)).toBe(0n);
  });

  describe('선형 베스팅', () => {
    beforeEach(() => {
      fixture.vesting.grant(CAROL, 1_000_000n, DURATION, CLIFF);
    });

    it('클리프 전에는 0, release는 NothingToRelease', () => {
      fixture.clock.advance(179 * SECONDS_PER_DAY);

      expect(fixture.vesting.vestedAmount(CAROL)).toBe(0n);
      const error = catchLedgerError(() => fixture.token.releaseVested(CAROL));
      expect(error.category).toBe('NothingToDo');
      expect(error.code).toBe('NothingToRelease');
    });

    it('클리프 시점부터 경과 비율만큼 (내림)', () => {
      fixture.clock.advance(CLIFF);

      expect(fixture.vesting.vestedAmount(CAROL)).toBe(246575n);
      expect(fixture.token.releaseVested(CAROL)).toBe(246575n);
      expect(fixture.token.balanceOf(CAROL)).toBe(246575n);
      expect(fixture.vesting.releasableAmount(CAROL)).toBe(0n);
    });

    it('기간이 끝나면 나머지 전부', () => {
      fixture.clock.advance(CLIFF);
      fixture.token.releaseVested(CAROL);
      fixture.clock.advance(DURATION - CLIFF);

      expect(fixture.token.releaseVested(CAROL)).toBe(753425n);
      expect(fixture.token.balanceOf(CAROL)).toBe(1_000_000n);
      expect(fixture.vesting.getVestingSchedule(CAROL)?.releasedAmount).toBe(
        1_000_000n,
      );
    });

    it('release는 새로 발행해 총 공급량을 늘려야 함', () => {
      fixture.clock.advance(DURATION);
      fixture.token.releaseVested(CAROL);

      expect(fixture.ledger.totalSupply()).toBe(INITIAL_SUPPLY + 1_000_000n);
    });

    it('수신 훅에서 다시 release하면 ReentrancyError', () => {
      fixture.clock.advance(DURATION);
      const reentryErrors: unknown[] = [];

      fixture.ledger.registerReceiveHook(CAROL, () => {
        try {
          fixture.token.releaseVested(CAROL);
        } catch (error: unknown) {
          reentryErrors.push(error);
        }
      });

      expect(fixture.token.releaseVested(CAROL)).toBe(1_000_000n);
      expect(reentryErrors).toHaveLength(1);
      expect(reentryErrors[0]).toBeInstanceOf(ReentrancyError);
      expect(fixture.token.balanceOf(CAROL)).toBe(1_000_000n);
      expect(fixture.vesting.getVestingSchedule(CAROL)?.releasedAmount).toBe(
        1_000_000n,
      );
    });

    it('수혜자당 스케줄은 하나', () => {
      expect(
        codeOf(() => fixture.vesting.grant(CAROL, 1n, DURATION, CLIFF)),
      ).toBe('ScheduleExists');
    });
  });

  it('잘못된 스케줄은 거부해야 함', () => {
    expect(codeOf(() => fixture.vesting.grant(ALICE, 0n, DURATION, 0))).toBe(
      'ZeroAmount',
    );
    expect(codeOf(() => fixture.vesting.grant(ALICE, 1n, 0, 0))).toBe(
      'InvalidDuration',
    );
    expect(codeOf(() => fixture.vesting.grant(ALICE, 1n, 10, 11))).toBe(
      'InvalidCliff',
    );
  });

  it('스케줄이 없으면 release할 것이 없음', () => {
    expect(codeOf(() => fixture.token.releaseVested(ALICE))).toBe(
      'NothingToRelease',
    );
  });
});
