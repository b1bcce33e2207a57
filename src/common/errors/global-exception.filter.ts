import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Injectable,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { AppError } from './app-error';
import { singleLineMessage } from './single-line-message';

const APP_ERROR_STATUSES: Readonly<Record<string, HttpStatus>> = {
  ERR_INVALID_PARAMS: HttpStatus.BAD_REQUEST,
  ERR_INVALID_REQUEST: HttpStatus.BAD_REQUEST,
  ERR_UNAUTHORIZED_REQUEST: HttpStatus.UNAUTHORIZED,
  ERR_ENCODING: HttpStatus.BAD_REQUEST,
  ERR_TRANSPORT: HttpStatus.BAD_GATEWAY,
  ERR_SERVER: HttpStatus.BAD_GATEWAY,
};

export interface ErrorResponseBody {
  statusCode: number;
  code: string;
  message: string;
  timestamp: string;
}

/**
 * Status carried by errors from express middleware (http-errors), e.g.
 * body-parser rejecting a payload
 */
function middlewareErrorStatus(exception: unknown): number | undefined {
  if (
    !(exception instanceof Error) ||
    !('status' in exception) ||
    typeof exception.status !== 'number'
  ) {
    return undefined;
  }
  const status = exception.status;
  return status >= 400 && status < 600 ? status : undefined;
}

function display(request: Request): string {
  return `${request.method} ${request.path}`;
}

/**
 * Global exception filter that turns app errors and unhandled exceptions
 * into JSON responses
 */
@Catch()
@Injectable()
export class GlobalExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GlobalExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const request = ctx.getRequest<Request>();
    const response = ctx.getResponse<Response>();

    const body = this.responseFor(exception);
    this.log(exception, body, display(request));

    response.status(body.statusCode).json(body);
  }

  // eslint-disable-next-line class-methods-use-this
  private responseFor(exception: unknown): ErrorResponseBody {
    const timestamp = new Date().toISOString();

    if (exception instanceof AppError) {
      return {
        statusCode:
          APP_ERROR_STATUSES[exception.code] ??
          HttpStatus.INTERNAL_SERVER_ERROR,
        code: exception.code,
        message: exception.message,
        timestamp,
      };
    }

    if (exception instanceof HttpException) {
      return {
        statusCode: exception.getStatus(),
        code: 'ERR_HTTP',
        message: exception.message,
        timestamp,
      };
    }

    const status = middlewareErrorStatus(exception);
    if (status !== undefined && exception instanceof Error) {
      return {
        statusCode: status,
        code: 'ERR_HTTP',
        message: exception.message,
        timestamp,
      };
    }

    return {
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      code: 'UNKNOWN_SERVER_ERROR',
      message: 'Internal server error',
      timestamp,
    };
  }

  private log(
    exception: unknown,
    body: ErrorResponseBody,
    requestText: string,
  ): void {
    if (exception instanceof AppError) {
      if (exception.shouldBeLogged()) {
        this.logger.warn(
          `${requestText} failed with ${exception.code}: ${exception.devMessage()}`,
        );
      }
      return;
    }

    // Skip 404 to avoid log spam from bots/scanners
    if (body.statusCode === HttpStatus.NOT_FOUND) {
      return;
    }

    if (body.code === 'ERR_HTTP' && body.statusCode < 500) {
      this.logger.warn(
        `${requestText} rejected with ${body.statusCode}: ${body.message}`,
      );
      return;
    }

    if (exception instanceof Error) {
      this.logger.error(
        `Unexpected error on ${requestText}: ${singleLineMessage(exception)}`,
      );
    } else {
      this.logger.error(
        `Unknown error on ${requestText}: ${JSON.stringify(exception)}`,
      );
    }
  }
}
