import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  IsEthereumAddress,
  IsOptional,
  IsString,
  MaxLength,
  MinLength,
} from 'class-validator';
import { EXAMPLE_ADDRESS, IsWeiAmount } from './amount.validators';

/**
 * 토큰 배포 요청 DTO
 */
export class DeployTokenDto {
  @ApiProperty({
    description: 'owner (최초 밸리데이터)',
    example: EXAMPLE_ADDRESS,
  })
  @IsEthereumAddress()
  owner!: string;

  @ApiProperty({
    description: '팀 지갑 (팀 수수료, 베스팅)',
    example: EXAMPLE_ADDRESS,
  })
  @IsEthereumAddress()
  teamWallet!: string;

  @ApiProperty({ description: '스테이킹 풀', example: EXAMPLE_ADDRESS })
  @IsEthereumAddress()
  stakingPool!: string;

  @ApiProperty({ description: '트레저리 지갑', example: EXAMPLE_ADDRESS })
  @IsEthereumAddress()
  treasuryWallet!: string;

  @ApiPropertyOptional({ example: 'Quorum Ledger Token' })
  @IsOptional()
  @IsString()
  @MinLength(1)
  @MaxLength(64)
  name?: string;

  @ApiPropertyOptional({ example: 'QRM' })
  @IsOptional()
  @IsString()
  @MinLength(1)
  @MaxLength(11)
  symbol?: string;
}

/**
 * 전송 요청 DTO
 *
 * 검증 규칙:
 * - to: 이더리움 주소 형식
 * - amount: 0 이상 정수 문자열 (Wei 단위)
 */
export class TransferDto {
  @ApiProperty({ description: '받는 주소', example: EXAMPLE_ADDRESS })
  @IsEthereumAddress()
  to!: string;

  @ApiProperty({ description: '금액 (Wei)', example: '1000000000000000000' })
  @IsWeiAmount()
  amount!: string;
}

export class ApproveDto {
  @ApiProperty({ description: '위임받는 주소', example: EXAMPLE_ADDRESS })
  @IsEthereumAddress()
  spender!: string;

  @ApiProperty({
    description: '허용 금액 (Wei)',
    example: '1000000000000000000',
  })
  @IsWeiAmount()
  amount!: string;
}

export class TransferFromDto extends TransferDto {
  @ApiProperty({
    description: '보내는 주소 (allowance 소유자)',
    example: EXAMPLE_ADDRESS,
  })
  @IsEthereumAddress()
  from!: string;
}

/**
 * 금액만 받는 요청 (stake, withdraw)
 */
export class AmountDto {
  @ApiProperty({ description: '금액 (Wei)', example: '1000000000000000000' })
  @IsWeiAmount()
  amount!: string;
}
