import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from '@nestjs/common';
import { Request, Response } from 'express';
import { HttpExceptionResponse } from '../interfaces/http-exception.interface';
import { DataOrderingError } from '../../ledger/errors/data-ordering.error';
import { MalformedRecordError } from '../../ledger/errors/malformed-record.error';

interface ErrorDetails {
  statusCode: number;
  message: string | string[];
  error: string;
}

export function describeException(exception: unknown): ErrorDetails {
  if (exception instanceof DataOrderingError) {
    return { statusCode: HttpStatus.UNPROCESSABLE_ENTITY, message: exception.message, error: exception.name };
  }
  if (exception instanceof MalformedRecordError) {
    return { statusCode: HttpStatus.BAD_REQUEST, message: exception.message, error: exception.name };
  }
  if (exception instanceof HttpException) {
    const body = exception.getResponse();
    if (typeof body === 'string') {
      return { statusCode: exception.getStatus(), message: body, error: exception.name };
    }
    // ValidationPipe puts the per-field messages in `message`
    const message =
      'message' in body && (typeof body.message === 'string' || Array.isArray(body.message))
        ? body.message
        : exception.message;
    const error = 'error' in body && typeof body.error === 'string' ? body.error : exception.name;
    return { statusCode: exception.getStatus(), message, error };
  }
  return { statusCode: HttpStatus.INTERNAL_SERVER_ERROR, message: 'Internal Server Error', error: 'Error' };
}

// Maps ledger errors onto HTTP statuses; everything else keeps Nest's status.
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();
    const details = describeException(exception);

    if (details.statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(
        `${request.method} ${request.url} failed`,
        exception instanceof Error ? exception.stack : String(exception),
      );
    } else {
      this.logger.warn(`${request.method} ${request.url} -> ${details.statusCode}: ${String(details.message)}`);
    }

    const body: HttpExceptionResponse = {
      ...details,
      timestamp: new Date().toISOString(),
      path: request.url,
    };
    response.status(details.statusCode).json(body);
  }
}
