import { Controller, Get, Param } from '@nestjs/common';
import { ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ValidatorService } from './validator.service';

/**
 * Validator Controller
 *
 * Validator 조회 API (읽기 전용)
 *
 * 추가/제거/슬래싱은 합의 게이트를 거치는 관리 API
 * (POST /admin/validators/...)에서 처리한다.
 */
@ApiTags('validator')
@Controller('validator')
export class ValidatorController {
  constructor(private readonly validatorService: ValidatorService) {}

  /**
   * 모든 Validator 조회
   *
   * GET /validator/list
   */
  @Get('list')
  @ApiOperation({
    summary: '모든 Validator 조회',
    description: '현재 밸리데이터 목록과 미확인 횟수를 조회합니다.',
  })
  @ApiResponse({ status: 200, description: 'Validator 목록' })
  getValidators() {
    const validators = this.validatorService.getRecords();
    return {
      total: validators.length,
      validators,
    };
  }

  /**
   * Validator 통계
   *
   * GET /validator/stats
   */
  @Get('stats')
  @ApiOperation({
    summary: 'Validator 통계',
    description: '밸리데이터 수, 정족수, 슬래싱 기준을 조회합니다.',
  })
  @ApiResponse({ status: 200, description: 'Validator 통계' })
  getStats() {
    return this.validatorService.getStats();
  }

  /**
   * GET /validator/:address
   */
  @Get(':address')
  @ApiOperation({ summary: 'Validator 단건 조회' })
  @ApiParam({ name: 'address', example: '0x' + '1'.repeat(40) })
  @ApiResponse({ status: 200, description: 'Validator 레코드' })
  @ApiResponse({ status: 422, description: '밸리데이터가 아님' })
  getValidator(@Param('address') address: string) {
    return this.validatorService.getValidator(address);
  }
}
