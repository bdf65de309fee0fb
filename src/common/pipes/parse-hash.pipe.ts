import { BadRequestException, Injectable, PipeTransform } from '@nestjs/common';
import { Hash, isValidHash } from '../types/common.types';

/**
 * 경로 파라미터의 32바이트 해시 검증 (소문자로 정규화)
 */
@Injectable()
export class ParseHashPipe implements PipeTransform<string, Hash> {
  transform(value: string): Hash {
    if (!isValidHash(value)) {
      throw new BadRequestException('Expected 0x + 64 hex characters');
    }
    return value.toLowerCase();
  }
}
