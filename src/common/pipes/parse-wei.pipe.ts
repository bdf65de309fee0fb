import { BadRequestException, Injectable, PipeTransform } from '@nestjs/common';

/**
 * 경로 파라미터의 Wei 금액 문자열을 bigint로 변환
 */
@Injectable()
export class ParseWeiPipe implements PipeTransform<string, bigint> {
  transform(value: string): bigint {
    if (!/^\d+$/.test(value)) {
      throw new BadRequestException(
        'Amount must be a non-negative integer string (wei)',
      );
    }
    return BigInt(value);
  }
}
