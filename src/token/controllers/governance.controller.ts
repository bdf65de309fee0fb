import {
  Controller,
  Get,
  HttpCode,
  Param,
  ParseIntPipe,
  Post,
} from '@nestjs/common';
import { ApiHeader, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import {
  Caller,
  CALLER_HEADER,
} from '../../common/decorators/caller.decorator';
import { Address } from '../../common/types/common.types';
import { GovernanceService } from '../../governance/governance.service';
import { TokenService } from '../token.service';

/**
 * Governance Controller
 *
 * 제안/투표는 수수료만 걷는다 (집계, 실행 없음).
 */
@ApiTags('governance')
@Controller('governance')
export class GovernanceController {
  constructor(
    private readonly tokenService: TokenService,
    private readonly governanceService: GovernanceService,
  ) {}

  @Get('fees')
  @ApiOperation({ summary: '제안/투표 수수료' })
  getFees() {
    return this.governanceService.getFees();
  }

  @Post('proposals')
  @ApiHeader({ name: CALLER_HEADER, required: true })
  @ApiOperation({ summary: '제안 생성 (제안 수수료 납부)' })
  @ApiResponse({ status: 422, description: '잔액 부족' })
  createProposal(@Caller() caller: Address) {
    return this.tokenService.createProposal(caller);
  }

  @Get('proposals/:id')
  @ApiOperation({ summary: '제안 조회' })
  getProposal(@Param('id', ParseIntPipe) id: number) {
    return this.governanceService.getProposal(id);
  }

  @Post('proposals/:id/vote')
  @HttpCode(200)
  @ApiHeader({ name: CALLER_HEADER, required: true })
  @ApiOperation({ summary: '투표 (투표 수수료 납부)' })
  @ApiResponse({ status: 409, description: '이미 투표함' })
  vote(@Caller() caller: Address, @Param('id', ParseIntPipe) id: number) {
    return this.tokenService.vote(caller, id);
  }

  @Post('snapshots')
  @ApiHeader({ name: CALLER_HEADER, required: true })
  @ApiOperation({ summary: '잔액 스냅샷 (owner)' })
  snapshot(@Caller() caller: Address) {
    const { id, takenAt, totalSupply } = this.tokenService.snapshot(caller);
    return { id, takenAt, totalSupply };
  }

  @Get('snapshots/:id')
  @ApiOperation({ summary: '스냅샷 조회' })
  getSnapshot(@Param('id', ParseIntPipe) id: number) {
    return this.governanceService.getSnapshot(id);
  }

  @Get('snapshots/:id/balance/:address')
  @ApiOperation({ summary: '스냅샷 시점 잔액' })
  balanceOfAt(
    @Param('id', ParseIntPipe) id: number,
    @Param('address') address: string,
  ) {
    return {
      snapshotId: id,
      address,
      balance: this.governanceService.balanceOfAt(address, id),
    };
  }
}
