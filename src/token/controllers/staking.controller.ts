import { Body, Controller, Get, HttpCode, Param, Post } from '@nestjs/common';
import { ApiHeader, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import {
  Caller,
  CALLER_HEADER,
} from '../../common/decorators/caller.decorator';
import { Address } from '../../common/types/common.types';
import { StakingService } from '../../staking/staking.service';
import { AmountDto } from '../dto/token.dto';
import { TokenService } from '../token.service';

/**
 * Staking Controller
 *
 * 보상은 스테이킹 비율에 따라 연속적으로 누적된다.
 * 청구 시 성과 수수료 (기본 10%)가 팀 지갑으로 간다.
 */
@ApiTags('staking')
@Controller('staking')
export class StakingController {
  constructor(
    private readonly tokenService: TokenService,
    private readonly stakingService: StakingService,
  ) {}

  @Get('pool')
  @ApiOperation({ summary: '전역 스테이킹 상태' })
  getPool() {
    return {
      ...this.stakingService.getPoolState(),
      rewardPerToken: this.stakingService.rewardPerToken(),
    };
  }

  @Get(':address')
  @ApiOperation({ summary: '스테이킹 포지션과 청구 가능 보상' })
  getStakingInfo(@Param('address') address: string) {
    return this.stakingService.getStakingInfo(address);
  }

  @Post('stake')
  @HttpCode(200)
  @ApiHeader({ name: CALLER_HEADER, required: true })
  @ApiOperation({ summary: '스테이킹' })
  @ApiResponse({ status: 422, description: '금액 0 / 잔액 부족' })
  stake(@Caller() caller: Address, @Body() dto: AmountDto) {
    return this.tokenService.stake(caller, BigInt(dto.amount));
  }

  @Post('withdraw')
  @HttpCode(200)
  @ApiHeader({ name: CALLER_HEADER, required: true })
  @ApiOperation({ summary: '스테이킹 인출' })
  withdraw(@Caller() caller: Address, @Body() dto: AmountDto) {
    return this.tokenService.withdraw(caller, BigInt(dto.amount));
  }

  @Post('claim')
  @HttpCode(200)
  @ApiHeader({ name: CALLER_HEADER, required: true })
  @ApiOperation({ summary: '보상 청구' })
  claim(@Caller() caller: Address) {
    return this.tokenService.claimRewards(caller);
  }
}
