import { ApiProperty } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsBoolean, IsEthereumAddress, IsInt, Min } from 'class-validator';
import { ActionReferenceDto } from './action.dto';
import { EXAMPLE_ADDRESS, IsWeiAmount } from './amount.validators';

/**
 * 관리 API 요청 DTO
 *
 * 모두 ActionReferenceDto를 확장한다. 같은 actionId로 다시 호출하면
 * 타임락 / 정족수 대기 중인 액션을 이어서 진행한다.
 */

export class SetFeeRatesDto extends ActionReferenceDto {
  @ApiProperty({ description: 'basis points', example: 100 })
  @Type(() => Number)
  @IsInt()
  @Min(0)
  teamFeeRate!: number;

  @ApiProperty({ description: 'basis points', example: 100 })
  @Type(() => Number)
  @IsInt()
  @Min(0)
  stakingFeeRate!: number;

  @ApiProperty({ description: 'basis points', example: 100 })
  @Type(() => Number)
  @IsInt()
  @Min(0)
  burnFeeRate!: number;
}

export class SetFeeExemptionDto extends ActionReferenceDto {
  @ApiProperty({ example: EXAMPLE_ADDRESS })
  @IsEthereumAddress()
  account!: string;

  @ApiProperty({ example: true })
  @IsBoolean()
  exempt!: boolean;
}

export class ValidatorTargetDto extends ActionReferenceDto {
  @ApiProperty({ example: EXAMPLE_ADDRESS })
  @IsEthereumAddress()
  validator!: string;
}

export class SetRequiredConfirmationsDto extends ActionReferenceDto {
  @ApiProperty({ example: 2 })
  @Type(() => Number)
  @IsInt()
  requiredConfirmations!: number;
}

export class SetMaxMissedConfirmationsDto extends ActionReferenceDto {
  @ApiProperty({ example: 10 })
  @Type(() => Number)
  @IsInt()
  maxMissedConfirmations!: number;
}

export class SetRewardRateDto extends ActionReferenceDto {
  @ApiProperty({
    description: '하루 보상 (Wei)',
    example: '100000000000000000000',
  })
  @IsWeiAmount()
  rewardRate!: string;
}

export class SetPerformanceFeeRateDto extends ActionReferenceDto {
  @ApiProperty({ description: 'basis points (최대 2000)', example: 1000 })
  @Type(() => Number)
  @IsInt()
  @Min(0)
  performanceFeeRate!: number;
}

export class SetGovernanceFeeDto extends ActionReferenceDto {
  @ApiProperty({ description: '수수료 (Wei)', example: '10000000000000000000' })
  @IsWeiAmount()
  fee!: string;
}

export class BuybackAndBurnDto extends ActionReferenceDto {
  @ApiProperty({
    description: '소각할 금액 (Wei)',
    example: '1000000000000000000',
  })
  @IsWeiAmount()
  amount!: string;
}

export class UpgradeDto extends ActionReferenceDto {
  @ApiProperty({ description: '새 로직 주소', example: EXAMPLE_ADDRESS })
  @IsEthereumAddress()
  logicAddress!: string;
}
