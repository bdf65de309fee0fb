import * as fc from 'fast-check';
import { SECONDS_PER_DAY } from '../../src/common/constants/token.constants';
import { LedgerError } from '../../src/common/errors/ledger.errors';
import { tokenToWei } from '../../src/common/utils/units.util';
import {
  ALICE,
  BOB,
  CAROL,
  createLedgerFixture,
  fund,
  LedgerFixture,
  OWNER,
  VALIDATOR_2,
  VALIDATOR_3,
} from '../helpers/ledger-fixture';

const W = tokenToWei(1);
const ACTORS = [ALICE, BOB, CAROL];

type Step =
  | { kind: 'transfer'; from: number; to: number; amount: bigint }
  | { kind: 'stake' | 'withdraw'; actor: number; amount: bigint }
  | { kind: 'claim' | 'release'; actor: number }
  | { kind: 'advance'; seconds: number }
  | { kind: 'exemptSelf'; exempt: boolean };

const actorArb = fc.integer({ min: 0, max: ACTORS.length - 1 });
const amountArb = fc.bigInt({ min: 0n, max: 500n * W });

const stepArb: fc.Arbitrary<Step> = fc.oneof(
  fc.record({
    kind: fc.constant('transfer' as const),
    from: actorArb,
    to: actorArb,
    amount: amountArb,
  }),
  fc.record({
    kind: fc.constantFrom('stake' as const, 'withdraw' as const),
    actor: actorArb,
    amount: amountArb,
  }),
  fc.record({
    kind: fc.constantFrom('claim' as const, 'release' as const),
    actor: actorArb,
  }),
  fc.record({
    kind: fc.constant('advance' as const),
    seconds: fc.integer({ min: 1, max: 3 * SECONDS_PER_DAY }),
  }),
  fc.record({
    kind: fc.constant('exemptSelf' as const),
    exempt: fc.boolean(),
  }),
);

function apply(fixture: LedgerFixture, step: Step): void {
  switch (step.kind) {
    case 'transfer':
      fixture.token.transfer(ACTORS[step.from], ACTORS[step.to], step.amount);
      return;
    case 'stake':
      fixture.token.stake(ACTORS[step.actor], step.amount);
      return;
    case 'withdraw':
      fixture.token.withdraw(ACTORS[step.actor], step.amount);
      return;
    case 'claim':
      fixture.token.claimRewards(ACTORS[step.actor]);
      return;
    case 'release':
      fixture.token.releaseVested(ACTORS[step.actor]);
      return;
    case 'advance':
      fixture.clock.advance(step.seconds);
      return;
    case 'exemptSelf':
      fixture.fees.setFeeExemption(
        fixture.systemAccounts.get().self,
        step.exempt,
      );
      return;
  }
}

function sumOfBalances(fixture: LedgerFixture): bigint {
  return fixture.ledger
    .holders()
    .reduce((total, [, balance]) => total + balance, 0n);
}

/**
 * 임의의 작업 순서에서도 유지되어야 하는 불변식
 */
describe('Ledger invariants', () => {
  let fixture: LedgerFixture;

  beforeAll(async () => {
    fixture = await createLedgerFixture();
    for (const actor of ACTORS) {
      fund(fixture, actor, 1000n * W);
    }
    fixture.vesting.grant(CAROL, 100n * W, SECONDS_PER_DAY, 0);
  });

  afterAll(async () => {
    await fixture.moduleRef.close();
  });

  it('잔액의 합은 항상 총 공급량과 같아야 함', () => {
    fc.assert(
      fc.property(fc.array(stepArb, { maxLength: 30 }), (steps) => {
        for (const step of steps) {
          try {
            apply(fixture, step);
          } catch (error: unknown) {
            if (!(error instanceof LedgerError)) {
              throw error;
            }
          }
          expect(sumOfBalances(fixture)).toBe(fixture.ledger.totalSupply());
          expect(fixture.staking.getTotalStaked()).toBe(
            fixture.token.balanceOf(fixture.systemAccounts.get().self),
          );
        }
      }),
      { numRuns: 50 },
    );
  });

  it('밸리데이터 수는 정족수 아래로 내려가지 않아야 함', () => {
    const validators = [OWNER, VALIDATOR_2, VALIDATOR_3];
    const opArb = fc.record({
      op: fc.constantFrom('add', 'remove', 'require'),
      target: fc.integer({ min: 0, max: validators.length - 1 }),
      required: fc.integer({ min: 0, max: 4 }),
    });

    fc.assert(
      fc.property(fc.array(opArb, { maxLength: 20 }), (ops) => {
        for (const { op, target, required } of ops) {
          try {
            if (op === 'add') {
              fixture.validators.add(validators[target]);
            } else if (op === 'remove') {
              fixture.validators.remove(validators[target]);
            } else {
              fixture.validators.setRequiredConfirmations(required);
            }
          } catch (error: unknown) {
            if (!(error instanceof LedgerError)) {
              throw error;
            }
          }

          const { validatorCount, requiredConfirmations } =
            fixture.validators.getStats();
          expect(requiredConfirmations).toBeGreaterThanOrEqual(1);
          expect(validatorCount).toBeGreaterThanOrEqual(requiredConfirmations);
          expect(new Set(fixture.validators.getValidators()).size).toBe(
            validatorCount,
          );
        }
      }),
      { numRuns: 50 },
    );
  });
});
