import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  IsArray,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  Matches,
  Min,
} from 'class-validator';
import { ACTION_KINDS, ActionKind } from '../../consensus/entities/action-kind';

const ACTION_ID_PATTERN = /^0x[0-9a-fA-F]{64}$/;
const EXAMPLE_ACTION_ID = '0x' + 'ab'.repeat(32);

/**
 * 특권 호출이 참조할 액션
 *
 * - actionId: 이미 제안된 액션 (종류와 파라미터가 같아야 함)
 * - timestamp: (kind, params, timestamp)로 ID 계산
 * - 둘 다 없으면 현재 시각으로 새 액션
 */
export class ActionReferenceDto {
  @ApiPropertyOptional({ example: EXAMPLE_ACTION_ID })
  @IsOptional()
  @Matches(ACTION_ID_PATTERN, {
    message: 'actionId must be 0x + 64 hex characters',
  })
  actionId?: string;

  @ApiPropertyOptional({ description: 'Unix seconds', example: 1700000000 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  timestamp?: number;
}

/**
 * 액션 제안 요청 DTO
 *
 * params는 문자열로 받는다. 숫자 "100"과 100은 같은 ID를 만든다.
 */
export class ProposeActionDto {
  @ApiProperty({ enum: ACTION_KINDS, example: 'setFeeRates' })
  @IsIn(ACTION_KINDS)
  kind!: ActionKind;

  @ApiProperty({ type: [String], example: ['100', '100', '100'] })
  @IsArray()
  @IsString({ each: true })
  params!: string[];
}

export class DeriveActionIdDto extends ProposeActionDto {
  @ApiProperty({ description: 'Unix seconds', example: 1700000000 })
  @Type(() => Number)
  @IsInt()
  @Min(0)
  timestamp!: number;
}
