import { SECONDS_PER_DAY } from '../../src/common/constants/token.constants';
import {
  ALICE,
  createLedgerFixture,
  LedgerFixture,
  OWNER,
  POOL,
  TEAM,
  TREASURY,
} from '../helpers/ledger-fixture';
import { codeOf } from '../helpers/ledger-error';
import { GENESIS_TIME } from '../helpers/manual-clock';

const NEXT_LOGIC = '0x' + '7'.repeat(40);

describe('UpgradeService', () => {
  let fixture: LedgerFixture;

  beforeEach(async () => {
    fixture = await createLedgerFixture();
  });

  afterEach(async () => {
    await fixture.moduleRef.close();
  });

  it('배포 시 버전 1', () => {
    expect(fixture.upgrade.getCurrent()).toEqual({
      logicAddress: fixture.factory.computeAddresses({
        owner: OWNER,
        teamWallet: TEAM,
        stakingPool: POOL,
        treasuryWallet: TREASURY,
      }).logicAddress,
      version: 1,
      activatedAt: GENESIS_TIME,
    });
  });

  it('밸리데이터만 요청할 수 있어야 함', () => {
    expect(codeOf(() => fixture.admin.upgradeTo(ALICE, NEXT_LOGIC))).toBe(
      'NotAValidator',
    );
  });

  it('타임락이 지난 뒤 버전을 올려야 함', () => {
    const pending = fixture.admin.upgradeTo(OWNER, NEXT_LOGIC);
    expect(pending).toEqual({
      status: 'pending',
      reason: 'timelock',
      actionId: pending.actionId,
      executableAt: GENESIS_TIME + SECONDS_PER_DAY,
    });
    expect(fixture.upgrade.getCurrent().version).toBe(1);

    fixture.clock.advance(SECONDS_PER_DAY);
    const outcome = fixture.admin.upgradeTo(OWNER, NEXT_LOGIC, {
      actionId: pending.actionId,
    });

    expect(outcome).toEqual({
      status: 'applied',
      actionId: pending.actionId,
      result: {
        logicAddress: NEXT_LOGIC,
        version: 2,
        activatedAt: GENESIS_TIME + SECONDS_PER_DAY,
      },
    });
    expect(fixture.upgrade.getHistory().map((v) => v.version)).toEqual([1, 2]);
  });

  it('현재 로직으로는 업그레이드할 수 없어야 함', () => {
    const current = fixture.upgrade.getCurrent().logicAddress;
    const { actionId } = fixture.admin.upgradeTo(OWNER, current);
    fixture.clock.advance(SECONDS_PER_DAY);

    expect(
      codeOf(() => fixture.admin.upgradeTo(OWNER, current, { actionId })),
    ).toBe('InvalidImplementation');
    expect(fixture.consensus.requireAction(actionId).executedAt).toBeNull();
  });
});
