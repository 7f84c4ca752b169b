import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus } from '@nestjs/common';
import { Request, Response } from 'express';
import { Logger } from '../../utils/logger';
import { AppError, CancellationError } from '../../utils/errors';
import { toAppError } from '../../utils/error-utils';

export interface ErrorBody {
  error: string;
  message: string;
  details?: Record<string, unknown>;
}

export function toErrorBody(err: AppError): ErrorBody {
  return err.details
    ? { error: err.code, message: err.message, details: err.details }
    : { error: err.code, message: err.message };
}

/**
 * Maps everything thrown from a route to a JSON response. Framework
 * HttpExceptions (404, 429, ...) keep their own status and body.
 */
@Catch()
export class ErrorHandlerFilter implements ExceptionFilter {
  private logger = new Logger('ErrorHandler');

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const req = ctx.getRequest<Request>();
    const res = ctx.getResponse<Response>();
    const { method, originalUrl } = req;

    if (exception instanceof HttpException) {
      this.logger.warn(`${exception.name}: ${exception.message}, Route: ${method} ${originalUrl}`);
      if (!res.headersSent) {
        res.status(exception.getStatus()).json(exception.getResponse());
      }
      return;
    }

    const err = toAppError(
      exception,
      (message) => new AppError(message, 'INTERNAL_ERROR', HttpStatus.INTERNAL_SERVER_ERROR)
    );

    // Nobody is listening any more.
    if (err instanceof CancellationError || res.headersSent || req.socket.destroyed) {
      this.logger.info(`Request cancelled by client, Route: ${method} ${originalUrl}`);
      return;
    }

    if (!(exception instanceof AppError)) {
      this.logger.error(`Unhandled Error: ${err.message}`, exception);
      res.status(HttpStatus.INTERNAL_SERVER_ERROR).json({
        error: 'INTERNAL_ERROR',
        message: 'An unexpected error occurred',
      });
      return;
    }

    if (err.statusCode >= 500) {
      this.logger.error(`${err.name}: ${err.message}, Route: ${method} ${originalUrl}`, err.details);
    } else {
      this.logger.warn(`${err.name}: ${err.message}, Route: ${method} ${originalUrl}`);
    }

    res.status(err.statusCode).json(toErrorBody(err));
  }
}
