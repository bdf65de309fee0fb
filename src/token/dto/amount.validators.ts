import { applyDecorators } from '@nestjs/common';
import { IsNotEmpty, IsString, Matches } from 'class-validator';

export const EXAMPLE_ADDRESS = '0x1234567890123456789012345678901234567890';

/**
 * Wei 금액 (0 이상 정수 문자열)
 *
 * JSON 숫자로는 2^53 이상을 표현할 수 없어 문자열로 받는다.
 */
export function IsWeiAmount(): PropertyDecorator {
  return applyDecorators(
    IsString(),
    IsNotEmpty(),
    Matches(/^\d+$/, {
      message: '$property must be a non-negative integer string (wei)',
    }),
  );
}
