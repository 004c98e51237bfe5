import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { SkyVisionError, SkyVisionErrorCode, isError } from '../errors/skyvision.errors';

const STATUS_BY_CODE: Partial<Record<SkyVisionErrorCode, HttpStatus>> = {
  QUERY_ERROR: HttpStatus.BAD_REQUEST,
  EMBEDDING_ERROR: HttpStatus.BAD_REQUEST,
  MODEL_UNAVAILABLE: HttpStatus.SERVICE_UNAVAILABLE,
  MODEL_LOAD_ERROR: HttpStatus.SERVICE_UNAVAILABLE,
  FETCH_ERROR: HttpStatus.BAD_GATEWAY,
};

export interface ErrorEnvelope {
  status: 'error';
  code: string;
  error: string;
  message: string;
  data: null;
}

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const { status, error, message } = describe(exception);

    if (status >= 500) {
      this.logger.error(
        `[ERROR] ${request.method} ${request.url} - Status: ${status}`,
        isError(exception) ? exception.stack : String(exception),
      );
    } else {
      this.logger.warn(`${request.method} ${request.url} - Status: ${status} - ${message}`);
    }

    const body: ErrorEnvelope = {
      status: 'error',
      code: status.toString(),
      error,
      message,
      data: null,
    };
    response.status(status).json(body);
  }
}

function describe(exception: unknown): { status: number; error: string; message: string } {
  if (exception instanceof SkyVisionError) {
    const status = STATUS_BY_CODE[exception.code];
    if (status !== undefined) {
      return { status, error: exception.code, message: exception.message };
    }
    // pipeline failures reaching HTTP are server bugs; keep their text out of the body
    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      error: 'INTERNAL_ERROR',
      message: 'Internal server error',
    };
  }

  if (exception instanceof HttpException) {
    const status = exception.getStatus();
    return {
      status,
      error: HttpStatus[status] ?? 'HTTP_ERROR',
      message: httpMessage(exception.getResponse()),
    };
  }

  return {
    status: HttpStatus.INTERNAL_SERVER_ERROR,
    error: 'INTERNAL_ERROR',
    message: 'Internal server error',
  };
}

// ValidationPipe reports a list; the first entry is the one shown
function httpMessage(payload: string | object): string {
  if (typeof payload === 'string') {
    return payload;
  }
  const message: unknown = Reflect.get(payload, 'message');
  if (typeof message === 'string') {
    return message;
  }
  if (Array.isArray(message) && typeof message[0] === 'string') {
    return message[0];
  }
  return 'An error occurred';
}
