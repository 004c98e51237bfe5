import {
  CallHandler,
  ExecutionContext,
  Injectable,
  HttpStatus,
  NestInterceptor,
  StreamableFile,
} from '@nestjs/common';
import { Response } from 'express';
import { Observable, map } from 'rxjs';

export interface ResponseEnvelope<T> {
  status: 'success' | 'error';
  code: string;
  message: string;
  data: T;
}

/**
 * Wraps controller results as `{ status, code, message, data }`. Handlers
 * that write the response themselves (`@Res()` without passthrough) return
 * nothing and are left alone.
 */
@Injectable()
export class ResponseInterceptor<T> implements NestInterceptor<T, ResponseEnvelope<T> | T> {
  intercept(context: ExecutionContext, next: CallHandler<T>): Observable<ResponseEnvelope<T> | T> {
    const response = context.switchToHttp().getResponse<Response>();

    return next.handle().pipe(
      map((data): ResponseEnvelope<T> | T => {
        if (data === undefined || data instanceof StreamableFile || Buffer.isBuffer(data)) {
          return data;
        }
        const statusCode = response.statusCode;
        const ok = statusCode < 400;
        return {
          status: ok ? 'success' : 'error',
          code: statusCode.toString(),
          // handlers may pick an error status themselves, as /readyz does
          message: ok ? 'OK' : (HttpStatus[statusCode] ?? 'Error'),
          data,
        };
      }),
    );
  }
}
