import {
  CallHandler,
  ExecutionContext,
  Injectable,
  NestInterceptor,
  RequestTimeoutException,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { Request } from 'express';
import { Observable, throwError, TimeoutError } from 'rxjs';
import { catchError, timeout } from 'rxjs/operators';
import { logger } from '../logger/logger.config';
import { TIMEOUT_KEY } from './timeout.decorator';

const DEFAULT_TIMEOUT_MS = 30000;

@Injectable()
export class TimeoutInterceptor implements NestInterceptor {
  private readonly logger = logger();

  constructor(private readonly reflector: Reflector) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const timeoutMs =
      this.reflector.get<number | undefined>(TIMEOUT_KEY, context.getHandler()) ||
      this.reflector.get<number | undefined>(TIMEOUT_KEY, context.getClass()) ||
      DEFAULT_TIMEOUT_MS;
    const path = context.switchToHttp().getRequest<Request>().url;

    return next.handle().pipe(
      timeout(timeoutMs),
      catchError((err: unknown) => {
        if (err instanceof TimeoutError) {
          this.logger.error(
            { timeoutMs, path },
            'TimeoutInterceptor: Request timed out',
          );
          return throwError(
            () =>
              new RequestTimeoutException(
                `Operation timed out after ${timeoutMs}ms`,
              ),
          );
        }
        return throwError(() => err);
      }),
    );
  }
}
