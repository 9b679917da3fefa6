import {
  CallHandler,
  ExecutionContext,
  HttpException,
  HttpStatus,
  Inject,
  Injectable,
  NestInterceptor,
} from '@nestjs/common';
import { FastifyReply, FastifyRequest } from 'fastify';
import { Observable, throwError } from 'rxjs';
import { catchError, tap } from 'rxjs/operators';
import { ILoggerPort } from '@application/ports/logger.port';
import { deepRedact } from './utils/redaction.util';

function headerValue(value: string | string[] | undefined): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function statusOf(error: unknown): number {
  return error instanceof HttpException ? error.getStatus() : HttpStatus.INTERNAL_SERVER_ERROR;
}

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  constructor(@Inject('ILoggerPort') private readonly logger: ILoggerPort) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const http = context.switchToHttp();
    const request = http.getRequest<FastifyRequest>();
    const { method, url } = request;
    const correlationId =
      headerValue(request.headers['x-correlation-id']) ??
      headerValue(request.headers['x-request-id']);
    const logContext = { serviceName: 'HTTP', correlationId };
    const startTime = Date.now();

    this.logger.debug('Request received', logContext, {
      method,
      url,
      body: deepRedact(request.body),
    });

    return next.handle().pipe(
      tap(() => {
        this.logger.info('Request completed', logContext, {
          method,
          url,
          statusCode: http.getResponse<FastifyReply>().statusCode,
          duration: Date.now() - startTime,
        });
      }),
      catchError((error: unknown) => {
        this.logger.error('Request failed', error, logContext, {
          method,
          url,
          statusCode: statusOf(error),
          duration: Date.now() - startTime,
        });
        return throwError(() => error);
      }),
    );
  }
}
