import { Body, Controller, Post, Res } from '@nestjs/common';
import { ApiHeader, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import {
  Caller,
  CALLER_HEADER,
} from '../../common/decorators/caller.decorator';
import { Address } from '../../common/types/common.types';
import { ActionReferenceDto } from '../dto/action.dto';
import {
  BuybackAndBurnDto,
  SetFeeExemptionDto,
  SetFeeRatesDto,
  SetGovernanceFeeDto,
  SetMaxMissedConfirmationsDto,
  SetPerformanceFeeRateDto,
  SetRequiredConfirmationsDto,
  SetRewardRateDto,
  UpgradeDto,
  ValidatorTargetDto,
} from '../dto/admin.dto';
import { TokenAdminService } from '../token-admin.service';
import {
  OutcomeResponse,
  sendOutcome,
  toReference,
} from './outcome.response';

/**
 * Admin Controller
 *
 * 특권 변경 API. 모든 요청은 합의 게이트를 거친다.
 *
 * 응답:
 * - 200: 적용됨 { status: 'applied', actionId, result }
 * - 202: 대기 { status: 'pending', reason: 'timelock' | 'consensus', actionId, ... }
 *
 * 대기 응답의 actionId를 본문에 넣어 다시 호출하면 이어서 진행한다.
 */
@ApiTags('admin')
@ApiHeader({ name: CALLER_HEADER, required: true })
@ApiResponse({ status: 200, description: '적용됨' })
@ApiResponse({ status: 202, description: '타임락 또는 정족수 대기' })
@ApiResponse({ status: 403, description: '권한 없음' })
@Controller('admin')
export class AdminController {
  constructor(private readonly adminService: TokenAdminService) {}

  @Post('fee-rates')
  @ApiOperation({ summary: '수수료율 변경 (합계 최대 500bp)' })
  setFeeRates(
    @Caller() caller: Address,
    @Body() dto: SetFeeRatesDto,
    @Res() response: OutcomeResponse,
  ): void {
    const rates = {
      teamFeeRate: dto.teamFeeRate,
      stakingFeeRate: dto.stakingFeeRate,
      burnFeeRate: dto.burnFeeRate,
    };
    sendOutcome(
      response,
      this.adminService.setFeeRates(caller, rates, toReference(dto)),
    );
  }

  @Post('fee-exemptions')
  @ApiOperation({ summary: '수수료 면제 설정' })
  setFeeExemption(
    @Caller() caller: Address,
    @Body() dto: SetFeeExemptionDto,
    @Res() response: OutcomeResponse,
  ): void {
    sendOutcome(
      response,
      this.adminService.setFeeExemption(
        caller,
        dto.account,
        dto.exempt,
        toReference(dto),
      ),
    );
  }

  @Post('validators/add')
  @ApiOperation({ summary: '밸리데이터 추가' })
  addValidator(
    @Caller() caller: Address,
    @Body() dto: ValidatorTargetDto,
    @Res() response: OutcomeResponse,
  ): void {
    sendOutcome(
      response,
      this.adminService.addValidator(caller, dto.validator, toReference(dto)),
    );
  }

  @Post('validators/remove')
  @ApiOperation({ summary: '밸리데이터 제거' })
  removeValidator(
    @Caller() caller: Address,
    @Body() dto: ValidatorTargetDto,
    @Res() response: OutcomeResponse,
  ): void {
    sendOutcome(
      response,
      this.adminService.removeValidator(
        caller,
        dto.validator,
        toReference(dto),
      ),
    );
  }

  @Post('validators/slash')
  @ApiOperation({ summary: '밸리데이터 슬래싱 (미확인 횟수 기준 이상)' })
  slashValidator(
    @Caller() caller: Address,
    @Body() dto: ValidatorTargetDto,
    @Res() response: OutcomeResponse,
  ): void {
    sendOutcome(
      response,
      this.adminService.slashValidator(caller, dto.validator, toReference(dto)),
    );
  }

  @Post('required-confirmations')
  @ApiOperation({ summary: '정족수 변경' })
  setRequiredConfirmations(
    @Caller() caller: Address,
    @Body() dto: SetRequiredConfirmationsDto,
    @Res() response: OutcomeResponse,
  ): void {
    sendOutcome(
      response,
      this.adminService.setRequiredConfirmations(
        caller,
        dto.requiredConfirmations,
        toReference(dto),
      ),
    );
  }

  @Post('max-missed-confirmations')
  @ApiOperation({ summary: '슬래싱 기준 변경' })
  setMaxMissedConfirmations(
    @Caller() caller: Address,
    @Body() dto: SetMaxMissedConfirmationsDto,
    @Res() response: OutcomeResponse,
  ): void {
    sendOutcome(
      response,
      this.adminService.setMaxMissedConfirmations(
        caller,
        dto.maxMissedConfirmations,
        toReference(dto),
      ),
    );
  }

  @Post('reward-rate')
  @ApiOperation({ summary: '하루 보상량 변경' })
  setRewardRate(
    @Caller() caller: Address,
    @Body() dto: SetRewardRateDto,
    @Res() response: OutcomeResponse,
  ): void {
    sendOutcome(
      response,
      this.adminService.setRewardRate(
        caller,
        BigInt(dto.rewardRate),
        toReference(dto),
      ),
    );
  }

  @Post('performance-fee-rate')
  @ApiOperation({ summary: '성과 수수료율 변경 (최대 2000bp)' })
  setPerformanceFeeRate(
    @Caller() caller: Address,
    @Body() dto: SetPerformanceFeeRateDto,
    @Res() response: OutcomeResponse,
  ): void {
    sendOutcome(
      response,
      this.adminService.setPerformanceFeeRate(
        caller,
        dto.performanceFeeRate,
        toReference(dto),
      ),
    );
  }

  @Post('proposal-fee')
  @ApiOperation({ summary: '제안 수수료 변경' })
  setProposalFee(
    @Caller() caller: Address,
    @Body() dto: SetGovernanceFeeDto,
    @Res() response: OutcomeResponse,
  ): void {
    sendOutcome(
      response,
      this.adminService.setProposalFee(
        caller,
        BigInt(dto.fee),
        toReference(dto),
      ),
    );
  }

  @Post('voting-fee')
  @ApiOperation({ summary: '투표 수수료 변경' })
  setVotingFee(
    @Caller() caller: Address,
    @Body() dto: SetGovernanceFeeDto,
    @Res() response: OutcomeResponse,
  ): void {
    sendOutcome(
      response,
      this.adminService.setVotingFee(caller, BigInt(dto.fee), toReference(dto)),
    );
  }

  /**
   * 일시 정지
   *
   * 타임락 대상: 첫 호출은 만료 시각만 기록하고 202를 돌려준다.
   * 만료 후 같은 actionId로 다시 호출한다.
   */
  @Post('pause')
  @ApiOperation({ summary: '일시 정지 (타임락 1일)' })
  pause(
    @Caller() caller: Address,
    @Body() dto: ActionReferenceDto,
    @Res() response: OutcomeResponse,
  ): void {
    sendOutcome(response, this.adminService.pause(caller, toReference(dto)));
  }

  @Post('unpause')
  @ApiOperation({ summary: '일시 정지 해제' })
  unpause(
    @Caller() caller: Address,
    @Body() dto: ActionReferenceDto,
    @Res() response: OutcomeResponse,
  ): void {
    sendOutcome(response, this.adminService.unpause(caller, toReference(dto)));
  }

  @Post('buyback-and-burn')
  @ApiOperation({ summary: '트레저리 잔액 소각 (treasury)' })
  buybackAndBurn(
    @Caller() caller: Address,
    @Body() dto: BuybackAndBurnDto,
    @Res() response: OutcomeResponse,
  ): void {
    sendOutcome(
      response,
      this.adminService.buybackAndBurn(
        caller,
        BigInt(dto.amount),
        toReference(dto),
      ),
    );
  }

  @Post('upgrade')
  @ApiOperation({ summary: '로직 업그레이드 (밸리데이터, 타임락 1일)' })
  upgrade(
    @Caller() caller: Address,
    @Body() dto: UpgradeDto,
    @Res() response: OutcomeResponse,
  ): void {
    sendOutcome(
      response,
      this.adminService.upgradeTo(caller, dto.logicAddress, toReference(dto)),
    );
  }
}
