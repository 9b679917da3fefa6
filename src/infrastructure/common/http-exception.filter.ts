import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
} from '@nestjs/common';
import { FastifyReply, FastifyRequest } from 'fastify';
import { ILoggerPort } from '@application/ports/logger.port';
import { ScoringError } from '@domain/errors/scoring.errors';

const STATUS_BY_CODE: Record<string, HttpStatus> = {
  EMBEDDING_BACKEND_ERROR: HttpStatus.BAD_GATEWAY,
  LLM_CLIENT_ERROR: HttpStatus.BAD_GATEWAY,
  INVALID_LLM_REPLY: HttpStatus.BAD_GATEWAY,
};

export interface HttpErrorPayload {
  statusCode: number;
  error: string;
  message: string | string[];
  code?: string;
  path: string;
  timestamp: string;
  correlationId?: string;
}

function httpExceptionMessage(exception: HttpException): string | string[] {
  const response = exception.getResponse();
  if (typeof response === 'object' && response !== null && 'message' in response) {
    const { message } = response;
    if (typeof message === 'string') return message;
    if (Array.isArray(message) && message.every((m): m is string => typeof m === 'string')) {
      return message;
    }
  }
  return exception.message;
}

@Catch()
export class HttpErrorFilter implements ExceptionFilter {
  constructor(private readonly logger?: ILoggerPort) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const reply = ctx.getResponse<FastifyReply>();
    const request = ctx.getRequest<FastifyRequest>();

    let status: number = HttpStatus.INTERNAL_SERVER_ERROR;
    let message: string | string[] = 'Internal Server Error';
    let code: string | undefined;

    if (exception instanceof HttpException) {
      status = exception.getStatus();
      message = httpExceptionMessage(exception);
    } else if (exception instanceof ScoringError) {
      status = STATUS_BY_CODE[exception.code] ?? HttpStatus.INTERNAL_SERVER_ERROR;
      message = exception.message;
      code = exception.code;
    }

    if (status >= 500) {
      this.logger?.error(`${request.method} ${request.url} failed`, exception, 'HttpErrorFilter', {
        statusCode: status,
      });
    }

    const correlationId = request.headers['x-correlation-id'];
    const payload: HttpErrorPayload = {
      statusCode: status,
      error: HttpStatus[status] || 'Error',
      message,
      code,
      path: request.url,
      timestamp: new Date().toISOString(),
      correlationId: typeof correlationId === 'string' ? correlationId : undefined,
    };

    reply.status(status).send(payload);
  }
}
