import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import { Response } from 'express';
import { InvalidMemoRequestError, MemoError, MemoErrorCode } from '@special-sits/memo/core';

const STATUS_BY_CODE: Record<MemoErrorCode, HttpStatus> = {
  UNSUPPORTED_SITUATION: HttpStatus.BAD_REQUEST,
  INVALID_REQUEST: HttpStatus.BAD_REQUEST,
  NO_SECTIONS_EXTRACTED: HttpStatus.UNPROCESSABLE_ENTITY,
  COMPLETION_SERVICE_FAILURE: HttpStatus.BAD_GATEWAY,
  SUMMARIZATION_FAILURE: HttpStatus.BAD_GATEWAY,
};

export interface MemoErrorBody {
  statusCode: number;
  error: MemoErrorCode;
  message: string;
  issues?: string[];
}

export function toErrorResponse(error: MemoError): MemoErrorBody {
  const body: MemoErrorBody = {
    statusCode: STATUS_BY_CODE[error.code],
    error: error.code,
    message: error.message,
  };
  if (error instanceof InvalidMemoRequestError && error.issues.length > 0) {
    body.issues = error.issues;
  }
  return body;
}

/**
 * Domain errors abort only the request that raised them; the message goes
 * back to the client verbatim.
 */
@Catch(MemoError)
export class MemoErrorFilter implements ExceptionFilter<MemoError> {
  private readonly logger = new Logger(MemoErrorFilter.name);

  catch(error: MemoError, host: ArgumentsHost) {
    const body = toErrorResponse(error);

    if (body.statusCode >= 500) {
      this.logger.error(`${error.code}: ${error.message}`);
    } else {
      this.logger.warn(`${error.code}: ${error.message}`);
    }

    host.switchToHttp().getResponse<Response>().status(body.statusCode).json(body);
  }
}
