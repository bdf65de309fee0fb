import { Inject, Injectable, Logger } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../common/config/app.config';
import { CryptoService } from '../common/crypto/crypto.service';
import { normalizeAddress } from '../common/types/common.types';
import { EventLogService } from '../events/event-log.service';
import { OperationRunner } from '../state/operation-runner';
import { DeployTokenParams, DeploymentResult } from './entities/token.entity';
import { TokenService } from './token.service';

/**
 * TokenFactoryService
 *
 * 배포 진입점. 인스턴스/로직 주소를 파라미터에서 결정적으로 계산하고
 * TokenService.initialize를 정확히 한 번 호출한다.
 *
 * 주소 파생:
 * - instance = keccak256(rlp(["instance", owner, team, pool, treasury]))[12:]
 * - logic    = keccak256(rlp(["logic", instance, 1]))[12:]
 */
@Injectable()
export class TokenFactoryService {
  private readonly logger = new Logger(TokenFactoryService.name);

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    private readonly runner: OperationRunner,
    private readonly cryptoService: CryptoService,
    private readonly tokenService: TokenService,
    private readonly eventLog: EventLogService,
  ) {}

  computeAddresses(params: DeployTokenParams): DeploymentResult {
    const instanceAddress = this.cryptoService.hashToAddress(
      this.cryptoService.hashRlp([
        'instance',
        normalizeAddress(params.owner),
        normalizeAddress(params.teamWallet),
        normalizeAddress(params.stakingPool),
        normalizeAddress(params.treasuryWallet),
      ]),
    );
    const logicAddress = this.cryptoService.hashToAddress(
      this.cryptoService.hashRlp(['logic', instanceAddress, 1]),
    );

    return { instanceAddress, logicAddress };
  }

  deploy(params: DeployTokenParams): DeploymentResult {
    return this.runner.execute('deploy', () => {
      const result = this.computeAddresses(params);
      const owner = normalizeAddress(params.owner);

      this.tokenService.initialize({
        accounts: {
          self: result.instanceAddress,
          owner,
          teamWallet: params.teamWallet,
          stakingPool: params.stakingPool,
          treasuryWallet: params.treasuryWallet,
        },
        name: params.name ?? this.config.tokenName,
        symbol: params.symbol ?? this.config.tokenSymbol,
        logicAddress: result.logicAddress,
      });

      this.eventLog.emit('TokenDeployed', { ...result, owner });
      this.logger.log(
        `Token deployed: instance=${result.instanceAddress} logic=${result.logicAddress}`,
      );
      return result;
    });
  }
}
