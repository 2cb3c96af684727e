import {
  Catch,
  HttpStatus,
  Logger,
  type ArgumentsHost,
  type ExceptionFilter,
} from '@nestjs/common';
import type { Response } from 'express';
import {
  InsufficientFundsError,
  LedgerError,
  LedgerErrorCode,
} from '@app/common';

const STATUS_BY_CODE: Record<LedgerErrorCode, HttpStatus> = {
  [LedgerErrorCode.INVALID_AMOUNT]: HttpStatus.BAD_REQUEST,
  [LedgerErrorCode.INVALID_USER_DETAILS]: HttpStatus.BAD_REQUEST,
  [LedgerErrorCode.INSUFFICIENT_FUNDS]: HttpStatus.BAD_REQUEST,
  [LedgerErrorCode.USER_NOT_FOUND]: HttpStatus.NOT_FOUND,
  [LedgerErrorCode.DUPLICATE_EMAIL]: HttpStatus.CONFLICT,
  [LedgerErrorCode.STORAGE_FAILURE]: HttpStatus.SERVICE_UNAVAILABLE,
};

/**
 * Maps typed ledger failures to HTTP responses.
 * Insufficient funds carry the current balance, the requested amount and
 * the shortfall.
 */
@Catch(LedgerError)
export class LedgerExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(LedgerExceptionFilter.name);

  catch(exception: LedgerError, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const statusCode = STATUS_BY_CODE[exception.code];

    if (statusCode === HttpStatus.SERVICE_UNAVAILABLE) {
      this.logger.error(exception.message, exception.stack);
    }

    const body: Record<string, unknown> = {
      statusCode,
      error: exception.code,
      message: exception.message,
    };
    if (exception instanceof InsufficientFundsError) {
      body['currentBalance'] = exception.current.toString();
      body['requestedAmount'] = exception.requested.toString();
      body['shortfall'] = exception.shortfall.toString();
    }

    response.status(statusCode).json(body);
  }
}
