import { Controller, Get, HttpCode, Param, Post } from '@nestjs/common';
import { ApiHeader, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import {
  Caller,
  CALLER_HEADER,
} from '../../common/decorators/caller.decorator';
import { Address } from '../../common/types/common.types';
import { VestingService } from '../../vesting/vesting.service';
import { TokenService } from '../token.service';

@ApiTags('vesting')
@Controller('vesting')
export class VestingController {
  constructor(
    private readonly tokenService: TokenService,
    private readonly vestingService: VestingService,
  ) {}

  @Get(':address')
  @ApiOperation({ summary: '베스팅 스케줄, 베스팅된 양, 지급 가능 양' })
  getVesting(@Param('address') address: string) {
    return {
      schedule: this.vestingService.getVestingSchedule(address) ?? null,
      vestedAmount: this.vestingService.vestedAmount(address),
      releasableAmount: this.vestingService.releasableAmount(address),
    };
  }

  @Post('release')
  @HttpCode(200)
  @ApiHeader({ name: CALLER_HEADER, required: true })
  @ApiOperation({ summary: '베스팅된 토큰 지급 (수혜자 본인)' })
  @ApiResponse({ status: 400, description: '지급 가능한 토큰 없음' })
  release(@Caller() caller: Address) {
    const released = this.tokenService.releaseVested(caller);
    return { beneficiary: caller, released };
  }
}
