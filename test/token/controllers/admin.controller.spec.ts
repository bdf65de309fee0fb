import { SECONDS_PER_DAY } from '../../../src/common/constants/token.constants';
import { AdminController } from '../../../src/token/controllers/admin.controller';
import {
  createLedgerFixture,
  LedgerFixture,
  OWNER,
  TREASURY,
} from '../../helpers/ledger-fixture';
import { GENESIS_TIME } from '../../helpers/manual-clock';
import { ResponseRecorder } from '../../helpers/response-recorder';

/**
 * AdminController 테스트
 *
 * 적용은 200, 대기는 202. bigint는 문자열로 응답한다.
 */
describe('AdminController', () => {
  let fixture: LedgerFixture;
  let controller: AdminController;

  beforeEach(async () => {
    fixture = await createLedgerFixture();
    controller = fixture.moduleRef.get(AdminController);
  });

  afterEach(async () => {
    await fixture.moduleRef.close();
  });

  it('적용된 변경은 200', () => {
    const response = new ResponseRecorder();

    controller.setFeeRates(
      OWNER,
      { teamFeeRate: 50, stakingFeeRate: 50, burnFeeRate: 50 },
      response,
    );

    expect(response.statusCode).toBe(200);
    expect(response.body).toEqual({
      status: 'applied',
      actionId: fixture.consensus.deriveActionId(
        'setFeeRates',
        [50, 50, 50],
        GENESIS_TIME,
      ),
      result: { teamFeeRate: 50, stakingFeeRate: 50, burnFeeRate: 50 },
    });
  });

  it('타임락 대기는 202와 실행 가능 시각', () => {
    const response = new ResponseRecorder();

    controller.pause(OWNER, {}, response);

    expect(response.statusCode).toBe(202);
    expect(response.body).toEqual({
      status: 'pending',
      reason: 'timelock',
      actionId: fixture.consensus.deriveActionId('pause', [], GENESIS_TIME),
      executableAt: GENESIS_TIME + SECONDS_PER_DAY,
    });
  });

  it('bigint 결과는 문자열로', () => {
    const pending = new ResponseRecorder();
    controller.buybackAndBurn(TREASURY, { amount: '500' }, pending);
    expect(pending.statusCode).toBe(202);

    const actionId = fixture.consensus.deriveActionId(
      'buybackAndBurn',
      [500n],
      GENESIS_TIME,
    );
    fixture.token.confirmAction(OWNER, actionId);

    const applied = new ResponseRecorder();
    controller.buybackAndBurn(TREASURY, { amount: '500', actionId }, applied);

    expect(applied.statusCode).toBe(200);
    expect(applied.body).toEqual({
      status: 'applied',
      actionId,
      result: fixture.ledger.totalSupply().toString(),
    });
  });

  it('도메인 에러는 응답 전에 그대로 던져야 함', () => {
    const response = new ResponseRecorder();

    expect(() =>
      controller.setRewardRate(OWNER, { rewardRate: '5' }, response),
    ).not.toThrow();
    expect(fixture.staking.getRewardRate()).toBe(5n);

    expect(() => controller.unpause(OWNER, {}, new ResponseRecorder())).toThrow(
      'Pausable: not paused',
    );
  });
});
