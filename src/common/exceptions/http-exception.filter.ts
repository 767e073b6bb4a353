import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { Logger } from '../interceptors/logging.interceptor';
import { isForeignKeyViolation } from '../utils/database.utils';

export interface ErrorResponseBody {
  statusCode: number;
  timestamp: string;
  path: string;
  error: string;
  message: string | string[];
}

function messageFrom(exceptionResponse: string | object): string | string[] {
  if (typeof exceptionResponse === 'string') return exceptionResponse;
  if ('message' in exceptionResponse) {
    const { message } = exceptionResponse;
    if (typeof message === 'string') return message;
    if (Array.isArray(message)) return message.map(String);
  }
  return 'Unexpected error';
}

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    let status: number = HttpStatus.INTERNAL_SERVER_ERROR;
    let message: string | string[] = 'Internal server error';
    let error = 'Internal Server Error';

    if (exception instanceof HttpException) {
      status = exception.getStatus();
      message = messageFrom(exception.getResponse());
      error = exception.name;
    } else if (isForeignKeyViolation(exception)) {
      status = HttpStatus.CONFLICT;
      message = 'Referenced student does not exist';
      error = 'ForeignKeyViolation';
    } else if (exception instanceof Error) {
      message = exception.message;
      error = exception.name;
    }

    Logger.error(
      `${request.method} ${request.url} ${status} - ${message}`,
      exception instanceof Error ? exception.stack || 'No stack trace available' : '',
      'HttpExceptionFilter',
    );

    const body: ErrorResponseBody = {
      statusCode: status,
      timestamp: new Date().toISOString(),
      path: request.url,
      error,
      message,
    };
    response.status(status).json(body);
  }
}
