import { Request, Response, NextFunction, RequestHandler } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { Logger } from '../utils/logger';
import '../types';

export const CORRELATION_ID_HEADER = 'X-Correlation-Id';

export interface RequestLoggerOptions {
  slowRequestMs: number;
}

const logger = new Logger('RequestLogger');

/**
 * Logs one line per request once the response has been sent, and tags the
 * request with a correlation id (taken from the caller when supplied).
 */
export const requestLogger = (options: RequestLoggerOptions): RequestHandler =>
  (req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    const incoming = req.headers[CORRELATION_ID_HEADER.toLowerCase()];
    const correlationId = typeof incoming === 'string' && incoming.length > 0 ? incoming : uuidv4();

    req.correlationId = correlationId;
    res.setHeader(CORRELATION_ID_HEADER, correlationId);

    res.on('finish', () => {
      const duration = Date.now() - start;
      const path = req.originalUrl;
      const method = req.method;
      const status = res.statusCode;
      const clientId = req.user?.userId ?? 'anonymous';

      logger.info(
        `${method} ${path} by ${clientId} from ${req.ip} returned ${status} in ${duration}ms`,
        { correlationId }
      );

      if (duration > options.slowRequestMs) {
        logger.warn(`Slow API response: ${method} ${path} ${status} - ${duration}ms`, { correlationId });
      }
    });

    next();
  };
