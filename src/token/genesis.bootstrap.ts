import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
} from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../common/config/app.config';
import { TokenFactoryService } from './token-factory.service';
import { TokenService } from './token.service';

/**
 * 부트스트랩 시 제네시스 지갑 설정이 있으면 토큰 배포
 *
 * 저장소에서 복원된 상태가 이미 초기화되어 있으면 건너뛴다.
 */
@Injectable()
export class GenesisBootstrap implements OnApplicationBootstrap {
  private readonly logger = new Logger(GenesisBootstrap.name);

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    private readonly tokenService: TokenService,
    private readonly tokenFactory: TokenFactoryService,
  ) {}

  onApplicationBootstrap(): void {
    if (this.tokenService.isInitialized()) {
      this.logger.log('Token state restored from storage');
      return;
    }
    if (!this.config.genesis) {
      this.logger.warn(
        'Genesis wallets not configured; waiting for POST /token/deploy',
      );
      return;
    }

    const { instanceAddress } = this.tokenFactory.deploy(this.config.genesis);
    this.logger.log(`Genesis token deployed at ${instanceAddress}`);
  }
}
