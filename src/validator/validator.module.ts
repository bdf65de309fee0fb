import { Module } from '@nestjs/common';
import { ValidatorController } from './validator.controller';
import { ValidatorService } from './validator.service';

/**
 * Validator Module
 *
 * 구성:
 * - ValidatorService: 밸리데이터 집합, 정족수, 미확인 횟수
 * - ValidatorController: 조회 API
 */
@Module({
  controllers: [ValidatorController],
  providers: [ValidatorService],
  exports: [ValidatorService],
})
export class ValidatorModule {}
