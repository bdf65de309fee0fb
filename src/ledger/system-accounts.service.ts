import { Injectable } from '@nestjs/common';
import {
  AlreadyDoneError,
  AuthorizationError,
  InvariantViolationError,
} from '../common/errors/ledger.errors';
import { Address, normalizeAddress } from '../common/types/common.types';
import { JournaledCell } from '../state/journaled-map';
import { StateManager } from '../state/state-manager';
import {
  SystemAccounts,
  TokenMetadata,
} from './entities/system-accounts.entity';

/**
 * SystemAccountsService
 *
 * 초기화 시 한 번 기록되는 시스템 계정과 토큰 메타데이터,
 * 그리고 역할 검사 (owner / treasury).
 */
@Injectable()
export class SystemAccountsService {
  private readonly accounts: JournaledCell<SystemAccounts>;
  private readonly metadata: JournaledCell<TokenMetadata>;

  constructor(stateManager: StateManager) {
    this.accounts = stateManager.createCell<SystemAccounts>('system.accounts');
    this.metadata = stateManager.createCell<TokenMetadata>('system.metadata');
  }

  isInitialized(): boolean {
    return this.accounts.get() !== undefined;
  }

  initialize(accounts: SystemAccounts, metadata: TokenMetadata): void {
    if (this.isInitialized()) {
      throw new AlreadyDoneError(
        'AlreadyInitialized',
        'Initializable: contract is already initialized',
      );
    }
    this.accounts.set(accounts);
    this.metadata.set(metadata);
  }

  /**
   * 시스템 계정 조회 (초기화 전이면 실패)
   */
  get(): SystemAccounts {
    const accounts = this.accounts.get();
    if (!accounts) {
      throw new InvariantViolationError(
        'NotInitialized',
        'Token has not been deployed yet',
      );
    }
    return accounts;
  }

  getMetadata(): TokenMetadata {
    const metadata = this.metadata.get();
    if (!metadata) {
      throw new InvariantViolationError(
        'NotInitialized',
        'Token has not been deployed yet',
      );
    }
    return metadata;
  }

  assertOwner(caller: Address): void {
    if (this.get().owner !== normalizeAddress(caller)) {
      throw new AuthorizationError(
        'NotOwner',
        'Ownable: caller is not the owner',
      );
    }
  }

  assertTreasury(caller: Address): void {
    if (this.get().treasuryWallet !== normalizeAddress(caller)) {
      throw new AuthorizationError(
        'NotTreasury',
        'Only treasury can perform buybacks',
      );
    }
  }
}
