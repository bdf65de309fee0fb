import { plainToInstance, Type } from 'class-transformer';
import {
  IsEthereumAddress,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  Max,
  Min,
  MinLength,
  validateSync,
} from 'class-validator';
import {
  DEFAULT_TOKEN_NAME,
  DEFAULT_TOKEN_SYMBOL,
} from '../constants/token.constants';
import { Address, normalizeAddress } from '../types/common.types';

export const APP_CONFIG = Symbol('APP_CONFIG');

export type StorageDriver = 'memory' | 'leveldb';

export interface GenesisWallets {
  owner: Address;
  teamWallet: Address;
  stakingPool: Address;
  treasuryWallet: Address;
}

/**
 * 애플리케이션 설정 (환경 변수에서 한 번 로드)
 */
export interface AppConfig {
  port: number;
  storageDriver: StorageDriver;
  dataDir: string;
  /** 0이면 보상 누적 스케줄러 비활성화 */
  accrualIntervalMs: number;
  tokenName: string;
  tokenSymbol: string;
  /** 네 지갑이 모두 지정된 경우에만 부트스트랩 시 자동 배포 */
  genesis: GenesisWallets | null;
}

/**
 * 환경 변수 스키마
 */
export class EnvironmentVariables {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  @Max(65535)
  PORT?: number;

  @IsOptional()
  @IsIn(['memory', 'leveldb'])
  STORAGE_DRIVER?: StorageDriver;

  @IsOptional()
  @IsString()
  @MinLength(1)
  DATA_DIR?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  ACCRUAL_INTERVAL_MS?: number;

  @IsOptional()
  @IsString()
  @MinLength(1)
  TOKEN_NAME?: string;

  @IsOptional()
  @IsString()
  @MinLength(1)
  TOKEN_SYMBOL?: string;

  @IsOptional()
  @IsEthereumAddress()
  GENESIS_OWNER?: string;

  @IsOptional()
  @IsEthereumAddress()
  GENESIS_TEAM_WALLET?: string;

  @IsOptional()
  @IsEthereumAddress()
  GENESIS_STAKING_POOL?: string;

  @IsOptional()
  @IsEthereumAddress()
  GENESIS_TREASURY_WALLET?: string;
}

/**
 * 환경 변수 검증 후 AppConfig 생성
 *
 * 검증 실패 시 예외를 던져 애플리케이션 시작을 중단한다.
 */
export function loadAppConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const variables = plainToInstance(EnvironmentVariables, env);
  const errors = validateSync(variables);

  if (errors.length > 0) {
    const details = errors
      .map((error) => Object.values(error.constraints ?? {}).join(', '))
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  return {
    port: variables.PORT ?? 3000,
    storageDriver: variables.STORAGE_DRIVER ?? 'memory',
    dataDir: variables.DATA_DIR ?? 'data/ledger',
    accrualIntervalMs: variables.ACCRUAL_INTERVAL_MS ?? 60_000,
    tokenName: variables.TOKEN_NAME ?? DEFAULT_TOKEN_NAME,
    tokenSymbol: variables.TOKEN_SYMBOL ?? DEFAULT_TOKEN_SYMBOL,
    genesis: readGenesisWallets(variables),
  };
}

function readGenesisWallets(
  variables: EnvironmentVariables,
): GenesisWallets | null {
  const {
    GENESIS_OWNER,
    GENESIS_TEAM_WALLET,
    GENESIS_STAKING_POOL,
    GENESIS_TREASURY_WALLET,
  } = variables;

  if (
    !GENESIS_OWNER ||
    !GENESIS_TEAM_WALLET ||
    !GENESIS_STAKING_POOL ||
    !GENESIS_TREASURY_WALLET
  ) {
    return null;
  }

  return {
    owner: normalizeAddress(GENESIS_OWNER),
    teamWallet: normalizeAddress(GENESIS_TEAM_WALLET),
    stakingPool: normalizeAddress(GENESIS_STAKING_POOL),
    treasuryWallet: normalizeAddress(GENESIS_TREASURY_WALLET),
  };
}
