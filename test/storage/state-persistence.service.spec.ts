import { StateManager } from '../../src/state/state-manager';
import { StateMemoryRepository } from '../../src/storage/repositories/state-memory.repository';
import { IStateRepository } from '../../src/storage/repositories/state.repository.interface';
import { StatePersistenceService } from '../../src/storage/state-persistence.service';
import { StateChange } from '../../src/state/state.types';
import {
  ALICE,
  createLedgerFixture,
  fund,
  OWNER,
  TREASURY,
} from '../helpers/ledger-fixture';

/**
 * StatePersistenceService 테스트
 *
 * 테스트 범위:
 * - 시작 시 복원
 * - 순서대로 기록
 * - 기록 실패 시 로그만 남기고 계속
 * - 재시작 후 원장 상태 유지
 */
describe('StatePersistenceService', () => {
  it('시작 시 저장소 항목으로 상태를 복원해야 함', async () => {
    const stateManager = new StateManager();
    const balances = stateManager.createMap<bigint>('balances');
    const repository = new StateMemoryRepository();
    await repository.writeBatch([
      { key: 'balances:alice', value: '{"$bigint":"9"}' },
    ]);

    await new StatePersistenceService(repository, stateManager).onModuleInit();

    expect(balances.get('alice')).toBe(9n);
  });

  it('기록을 순서대로 반영해야 함', async () => {
    const repository = new StateMemoryRepository();
    const service = new StatePersistenceService(
      repository,
      new StateManager(),
    );

    service.persist([{ key: 'a:value', value: '1' }]);
    service.persist([{ key: 'a:value', value: '2' }]);
    service.persist([{ key: 'b:value', value: '3' }]);
    service.persist([{ key: 'b:value', value: null }]);
    await service.flush();

    expect(await repository.loadAll()).toEqual([['a:value', '2']]);
  });

  it('기록이 실패해도 이후 기록은 계속되어야 함', async () => {
    const written: StateChange[][] = [];
    const failing: IStateRepository = {
      initialize: jest.fn().mockResolvedValue(undefined),
      loadAll: jest.fn().mockResolvedValue([]),
      writeBatch: jest
        .fn()
        .mockRejectedValueOnce(new Error('disk full'))
        .mockImplementation(async (changes: StateChange[]) => {
          written.push(changes);
        }),
      close: jest.fn().mockResolvedValue(undefined),
    };
    const service = new StatePersistenceService(failing, new StateManager());

    service.persist([{ key: 'a:value', value: '1' }]);
    service.persist([{ key: 'a:value', value: '2' }]);
    await service.flush();

    expect(written).toEqual([[{ key: 'a:value', value: '2' }]]);
  });

  it('같은 저장소로 다시 시작하면 원장 상태가 유지되어야 함', async () => {
    const repository = new StateMemoryRepository();

    const first = await createLedgerFixture({ repository });
    fund(first, ALICE, 1000n);
    await first.persistence.flush();
    const supply = first.ledger.totalSupply();
    await first.moduleRef.close();

    const second = await createLedgerFixture({ repository, deploy: false });

    expect(second.token.isInitialized()).toBe(true);
    expect(second.ledger.balanceOf(ALICE)).toBe(1000n);
    expect(second.ledger.totalSupply()).toBe(supply);
    expect(second.validators.getValidators()).toEqual([OWNER]);
    expect(second.ledger.balanceOf(TREASURY)).toBe(
      first.ledger.balanceOf(TREASURY),
    );
    expect(second.events.count).toBe(first.events.count);
    await second.moduleRef.close();
  });
});
