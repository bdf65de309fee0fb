import { ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsIn, IsInt, IsOptional, Max, Min } from 'class-validator';
import { LEDGER_EVENT_TYPES, LedgerEventType } from '../ledger-event.types';

export class EventQueryDto {
  @ApiPropertyOptional({ enum: LEDGER_EVENT_TYPES, example: 'Transfer' })
  @IsOptional()
  @IsIn(LEDGER_EVENT_TYPES)
  type?: LedgerEventType;

  @ApiPropertyOptional({ default: 100, minimum: 1, maximum: 1000 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(1000)
  limit?: number;
}
