import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import { LedgerError, LedgerErrorCategory } from '../errors/ledger.errors';

const STATUS_BY_CATEGORY: Record<LedgerErrorCategory, HttpStatus> = {
  AuthorizationError: HttpStatus.FORBIDDEN,
  TimelockNotElapsed: HttpStatus.CONFLICT,
  InvariantViolation: HttpStatus.UNPROCESSABLE_ENTITY,
  InsufficientFunds: HttpStatus.UNPROCESSABLE_ENTITY,
  AlreadyDone: HttpStatus.CONFLICT,
  NothingToDo: HttpStatus.BAD_REQUEST,
  ReentrancyDetected: HttpStatus.CONFLICT,
  NotFound: HttpStatus.NOT_FOUND,
};

export function statusForCategory(category: LedgerErrorCategory): HttpStatus {
  return STATUS_BY_CATEGORY[category];
}

/**
 * LedgerExceptionFilter
 *
 * 도메인 에러를 HTTP 응답으로 변환한다.
 *
 * 응답 형식:
 * { statusCode, error: category, code, message }
 */
@Catch(LedgerError)
export class LedgerExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(LedgerExceptionFilter.name);

  catch(exception: LedgerError, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const statusCode = statusForCategory(exception.category);

    this.logger.debug(
      `${exception.category}/${exception.code}: ${exception.message}`,
    );

    response.status(statusCode).json({
      statusCode,
      error: exception.category,
      code: exception.code,
      message: exception.message,
    });
  }
}
