import {
  INITIAL_SUPPLY,
  ZERO_ADDRESS,
} from '../../src/common/constants/token.constants';
import {
  ALICE,
  BOB,
  createLedgerFixture,
  fund,
  LedgerFixture,
  OWNER,
  POOL,
  TEAM,
  TREASURY,
} from '../helpers/ledger-fixture';
import { catchLedgerError } from '../helpers/ledger-error';

/**
 * TokenService 테스트
 *
 * 테스트 범위:
 * - 제네시스 배분
 * - ERC-20 표면과 원자성
 */
describe('TokenService', () => {
  let fixture: LedgerFixture;

  beforeEach(async () => {
    fixture = await createLedgerFixture();
  });

  afterEach(async () => {
    await fixture.moduleRef.close();
  });

  describe('제네시스', () => {
    it('풀 10%, 트레저리 90%를 발행해야 함', () => {
      expect(fixture.token.balanceOf(POOL)).toBe(INITIAL_SUPPLY / 10n);
      expect(fixture.token.balanceOf(TREASURY)).toBe(
        INITIAL_SUPPLY - INITIAL_SUPPLY / 10n,
      );
      expect(fixture.token.balanceOf(TEAM)).toBe(0n);
      expect(fixture.ledger.totalSupply()).toBe(INITIAL_SUPPLY);
    });

    it('토큰 정보를 반환해야 함', () => {
      const info = fixture.token.getInfo();

      expect(info).toMatchObject({
        name: 'Test Ledger Token',
        symbol: 'TLT',
        decimals: 18,
        totalSupply: INITIAL_SUPPLY,
        totalSupplyFormatted: '3000000000 TLT',
        paused: false,
        transactionFeeRate: 300,
        totalStaked: 0n,
        performanceFeeRate: 1000,
        validatorCount: 1,
        requiredConfirmations: 1,
      });
      expect(info.accounts.owner).toBe(OWNER);
      expect(info.logic.version).toBe(1);
    });

    it('인스턴스 주소와 시스템 계정은 수수료 면제', () => {
      const { self } = fixture.systemAccounts.get();

      for (const account of [self, TREASURY, TEAM, POOL]) {
        expect(fixture.fees.isExempt(account)).toBe(true);
      }
      expect(fixture.fees.isExempt(OWNER)).toBe(false);
    });
  });

  describe('transfer', () => {
    it('0 주소로 보내면 ZeroAddress', () => {
      fund(fixture, ALICE, 10n);

      const error = catchLedgerError(() =>
        fixture.token.transfer(ALICE, ZERO_ADDRESS, 1n),
      );
      expect(error.code).toBe('ZeroAddress');
      expect(error.message).toBe('ERC20: transfer to the zero address');
    });

    it('실패한 작업은 잔액과 이벤트를 남기지 않아야 함', () => {
      fund(fixture, ALICE, 100n);
      const eventCount = fixture.events.count;

      catchLedgerError(() => fixture.token.transfer(ALICE, BOB, 101n));

      expect(fixture.token.balanceOf(ALICE)).toBe(100n);
      expect(fixture.token.balanceOf(BOB)).toBe(0n);
      expect(fixture.events.count).toBe(eventCount);
    });

    it('수신 훅이 실패하면 전송 전체가 취소되어야 함', () => {
      fund(fixture, ALICE, 1000n);
      fixture.ledger.registerReceiveHook(BOB, () => {
        throw new Error('rejected by receiver');
      });

      expect(() => fixture.token.transfer(ALICE, BOB, 1000n)).toThrow(
        'rejected by receiver',
      );
      expect(fixture.token.balanceOf(ALICE)).toBe(1000n);
      expect(fixture.token.balanceOf(TEAM)).toBe(0n);
      expect(fixture.ledger.totalSupply()).toBe(INITIAL_SUPPLY);
    });
  });

  describe('approve / transferFrom', () => {
    it('allowance를 넘는 transferFrom은 실패해야 함', () => {
      fund(fixture, ALICE, 1000n);
      fixture.token.approve(ALICE, BOB, 10n);

      const error = catchLedgerError(() =>
        fixture.token.transferFrom(BOB, ALICE, BOB, 11n),
      );

      expect(error.code).toBe('InsufficientAllowance');
      expect(fixture.token.allowance(ALICE, BOB)).toBe(10n);
    });
  });
});
