import { Body, Controller, Get, HttpCode, Param, Post } from '@nestjs/common';
import { ApiHeader, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import {
  Caller,
  CALLER_HEADER,
} from '../../common/decorators/caller.decorator';
import { ParseHashPipe } from '../../common/pipes/parse-hash.pipe';
import { Address, Hash } from '../../common/types/common.types';
import { ConsensusService } from '../../consensus/consensus.service';
import { ActionRecord } from '../../consensus/entities/action.entity';
import { TimelockService } from '../../timelock/timelock.service';
import { DeriveActionIdDto, ProposeActionDto } from '../dto/action.dto';
import { TokenService } from '../token.service';

/**
 * Consensus Controller
 *
 * 특권 액션의 ID 할당과 확인.
 *
 * 흐름:
 * 1. POST /consensus/actions 로 ID 할당 (또는 derive-id로 계산)
 * 2. 다른 밸리데이터가 POST /consensus/actions/:id/confirm
 * 3. 관리 API를 같은 actionId로 다시 호출하면 실행
 */
@ApiTags('consensus')
@Controller('consensus')
export class ConsensusController {
  constructor(
    private readonly tokenService: TokenService,
    private readonly consensusService: ConsensusService,
    private readonly timelockService: TimelockService,
  ) {}

  @Post('actions/derive-id')
  @HttpCode(200)
  @ApiOperation({
    summary: '액션 ID 계산',
    description: 'keccak256(rlp([kind, ...params, timestamp]))',
  })
  deriveActionId(@Body() dto: DeriveActionIdDto) {
    return {
      actionId: this.tokenService.deriveActionId(
        dto.kind,
        dto.params,
        dto.timestamp,
      ),
    };
  }

  @Post('actions')
  @ApiHeader({ name: CALLER_HEADER, required: true })
  @ApiOperation({
    summary: '액션 제안',
    description: '현재 시각으로 ID를 할당하고 제안자가 밸리데이터면 확인도 기록합니다.',
  })
  propose(@Caller() caller: Address, @Body() dto: ProposeActionDto) {
    return this.describe(
      this.tokenService.proposeAction(caller, dto.kind, dto.params),
    );
  }

  @Get('actions/:actionId')
  @ApiOperation({ summary: '액션 조회' })
  @ApiResponse({ status: 404, description: '알 수 없는 액션' })
  getAction(@Param('actionId', ParseHashPipe) actionId: Hash) {
    return this.describe(this.consensusService.requireAction(actionId));
  }

  @Post('actions/:actionId/confirm')
  @HttpCode(200)
  @ApiHeader({ name: CALLER_HEADER, required: true })
  @ApiOperation({ summary: '액션 확인 (밸리데이터)' })
  @ApiResponse({ status: 403, description: '밸리데이터가 아님' })
  @ApiResponse({ status: 409, description: '이미 확인함' })
  confirm(
    @Caller() caller: Address,
    @Param('actionId', ParseHashPipe) actionId: Hash,
  ) {
    return this.describe(this.tokenService.confirmAction(caller, actionId));
  }

  @Post('actions/:actionId/record-missed')
  @HttpCode(200)
  @ApiHeader({ name: CALLER_HEADER, required: true })
  @ApiOperation({
    summary: '미확인 기록 (owner)',
    description: '이 액션을 확인하지 않은 모든 밸리데이터의 미확인 횟수를 올립니다.',
  })
  recordMissed(
    @Caller() caller: Address,
    @Param('actionId', ParseHashPipe) actionId: Hash,
  ) {
    const validators = this.tokenService.recordMissedConfirmations(
      caller,
      actionId,
    );
    return { actionId, validators };
  }

  private describe(record: ActionRecord) {
    return {
      ...record,
      status: this.consensusService.getStatus(record),
      timelockExpiry: this.timelockService.getExpiry(record.id) ?? null,
    };
  }
}
